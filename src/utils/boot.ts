import fs from 'fs';
import {
  AutomationDriver,
  BootFailedError,
  BootSettings,
  BootSettingsSchema,
  ConnectionError,
  DisplayNotReadyError,
  EmulatorHandle,
  ProcessController,
  ScreenDescriptor,
  TimeoutError,
} from '../types';
import { Clock, systemClock } from './clock';
import { describeError, isRecoverableError, toError } from './error';
import { Logger, createLogger } from './logger';

export type BootState =
  | 'idle'
  | 'launching'
  | 'waiting-for-socket'
  | 'verifying'
  | 'ready'
  | 'failed';

export interface BootResult {
  driver: AutomationDriver;
  /** Absent when attached to an emulator somebody else launched. */
  handle?: EmulatorHandle;
  screen: ScreenDescriptor;
  attempts: number;
}

export interface BootOrchestratorOptions {
  driver: AutomationDriver;
  supervisor: ProcessController;
  socketPath: string;
  processName: string;
  settings?: Partial<BootSettings>;
  clock?: Clock;
  logger?: Logger;
  onStateChange?: (state: BootState, attempt: number) => void;
}

/**
 * Brings up a usable emulator connection. Emulator boots hang now and then, so
 * each attempt gets a fixed window before the process is killed and relaunched.
 */
export class BootOrchestrator {
  private readonly settings: BootSettings;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private current: BootState = 'idle';

  constructor(private readonly options: BootOrchestratorOptions) {
    this.settings = BootSettingsSchema.parse(options.settings ?? {});
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger('boot');
  }

  get state(): BootState {
    return this.current;
  }

  async boot(): Promise<BootResult> {
    const { maxAttempts } = this.settings;
    const driver = this.options.driver;
    let lastError: Error | undefined;
    let attempt = 0;

    while (attempt < maxAttempts) {
      attempt += 1;
      let handle: EmulatorHandle | undefined;

      try {
        this.transition('launching', attempt);
        await this.clearStaleState();
        handle = this.options.supervisor.launch();

        this.transition('waiting-for-socket', attempt);
        await this.waitForSocket();

        this.transition('verifying', attempt);
        const screen = await this.verify();

        // The automation server answers before the guest OS has finished booting.
        this.logger.info('emulator responsive, waiting for guest OS', {
          width: screen.width,
          height: screen.height,
          settleMs: this.settings.settleMs,
        });
        await this.clock.sleep(this.settings.settleMs);

        this.transition('ready', attempt);
        return { driver, handle, screen, attempts: attempt };
      } catch (error) {
        lastError = toError(error);
        this.logger.warn(`boot attempt ${attempt}/${maxAttempts} failed`, {
          error: lastError.message,
        });

        driver.disconnect();
        if (handle) {
          await this.options.supervisor.kill(handle);
        }
        if (!isRecoverableError(error)) {
          break;
        }
        if (attempt < maxAttempts) {
          await this.clock.sleep(this.settings.cooldownMs);
        }
      }
    }

    this.transition('failed', attempt);
    throw new BootFailedError(attempt, lastError);
  }

  // For operators who start the emulator themselves: no launch, no retries.
  async attach(): Promise<BootResult> {
    const driver = this.options.driver;

    try {
      this.transition('verifying', 1);
      await driver.connect(this.options.socketPath);
      if (!(await driver.ping())) {
        throw new ConnectionError(this.options.socketPath, 'emulator did not answer ping');
      }
      const screen = await this.verify();
      this.transition('ready', 1);
      return { driver, screen, attempts: 1 };
    } catch (error) {
      driver.disconnect();
      this.transition('failed', 1);
      throw error;
    }
  }

  private transition(state: BootState, attempt: number): void {
    this.current = state;
    this.logger.debug('boot state', { state, attempt });
    this.options.onStateChange?.(state, attempt);
  }

  private async clearStaleState(): Promise<void> {
    // The listening socket belongs to the process that created it.
    await fs.promises.rm(this.options.socketPath, { force: true });
    await this.options.supervisor.forceKill(this.options.processName);
  }

  private async waitForSocket(): Promise<void> {
    const { attemptTimeoutMs, pollIntervalMs } = this.settings;
    const driver = this.options.driver;
    const startedAt = this.clock.now();
    const deadline = startedAt + attemptTimeoutMs;

    while (this.clock.now() < deadline) {
      try {
        await driver.connect(this.options.socketPath);
        if (await this.pingBefore(deadline)) {
          return;
        }
        driver.disconnect();
      } catch (error) {
        // Refused or missing sockets are expected while the emulator boots.
        driver.disconnect();
        this.logger.debug('emulator not ready yet', { error: describeError(error) });
      }
      await this.clock.sleep(pollIntervalMs);
    }

    throw new TimeoutError(
      `Emulator did not respond within ${Math.round(attemptTimeoutMs / 1000)} seconds`,
      this.clock.now() - startedAt
    );
  }

  private async pingBefore(deadline: number): Promise<boolean> {
    const remaining = deadline - this.clock.now();
    if (remaining <= 0) {
      return false;
    }

    // A ping that never returns is abandoned by closing the socket, which
    // fails the pending read.
    const watchdog = setTimeout(() => this.options.driver.disconnect(), remaining);
    watchdog.unref();
    try {
      return await this.options.driver.ping();
    } finally {
      clearTimeout(watchdog);
    }
  }

  private async verify(): Promise<ScreenDescriptor> {
    const screen = await this.options.driver.getScreenSize();
    if (screen.width <= 0 || screen.height <= 0) {
      throw new DisplayNotReadyError(screen);
    }
    return screen;
  }
}
