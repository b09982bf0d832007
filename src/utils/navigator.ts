import {
  AutomationDriver,
  NavigationSettings,
  NavigationSettingsSchema,
} from '../types';
import { Logger, createLogger } from './logger';

// Classic Mac virtual key codes
export const MacKeyCode = {
  Return: 0x24,
  Tab: 0x30,
  Command: 0x37,
  Shift: 0x38,
  Option: 0x3a,
  O: 0x1f,
  W: 0x0d,
} as const;

const CLOSE_ALL_WINDOWS = [MacKeyCode.Command, MacKeyCode.Option, MacKeyCode.W];
const OPEN_SELECTION = [MacKeyCode.Command, MacKeyCode.O];
const CLOSE_WINDOW = [MacKeyCode.Command, MacKeyCode.W];

/**
 * Launches a guest application through the Finder, since the automation
 * protocol has no "run program" call.
 *
 * Type-ahead selection is not acknowledged by the guest: each step relies on
 * the configured settle delay. An occasional failed launch is expected and is
 * reported by the caller, not retried here.
 */
export class UiNavigator {
  private readonly settings: NavigationSettings;
  private readonly logger: Logger;

  constructor(
    private readonly driver: AutomationDriver,
    settings: Partial<NavigationSettings> = {},
    logger?: Logger
  ) {
    this.settings = NavigationSettingsSchema.parse(settings);
    this.logger = logger ?? createLogger('navigator');
  }

  async launchApplication(appName: string): Promise<void> {
    const { volumeName, desktopPoint, delays } = this.settings;
    const driver = this.driver;

    this.logger.info(`launching ${appName}`, { volumeName });

    this.logger.debug('closing all windows');
    await driver.pressChord(CLOSE_ALL_WINDOWS);
    await driver.waitMs(delays.closeWindows);

    this.logger.debug('focusing desktop', desktopPoint);
    await driver.click(desktopPoint.x, desktopPoint.y);
    await driver.waitMs(delays.focusDesktop);

    this.logger.debug(`opening volume ${volumeName}`);
    await driver.typeText(volumeName);
    await driver.waitMs(delays.typeAhead);
    await driver.pressChord(OPEN_SELECTION);
    await driver.waitMs(delays.openVolume);

    this.logger.debug(`opening ${appName}`);
    await driver.typeText(appName);
    await driver.waitMs(delays.typeAhead);
    await driver.pressChord(OPEN_SELECTION);
    await driver.waitMs(delays.launchApp);

    this.logger.debug('closing volume window');
    await driver.pressChord(CLOSE_WINDOW);
    await driver.waitMs(delays.closeFolder);
  }
}
