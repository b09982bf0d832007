import fs from 'fs';
import path from 'path';
import {
  AutomationDriver,
  BuildCollaborator,
  BuildError,
  NavigationSettings,
  ProcessController,
  TargetOutcome,
  TestRunReport,
  TestTarget,
  TimeoutError,
} from '../types';
import { BootResult } from './boot';
import { deployArtifact } from './builder';
import { Clock, systemClock } from './clock';
import { describeError } from './error';
import { Logger, createLogger } from './logger';
import { UiNavigator } from './navigator';
import { ResultWatcher } from './results';
import { saveRawScreenshot } from './screenshot';

export interface TestRunOptions {
  targets: TestTarget[];
  /** Host path of the folder the guest mounts as its shared volume. */
  sharedFolder: string;
  resultTimeoutMs: number;
  skipBuild?: boolean;
  useExisting?: boolean;
  keepRunning?: boolean;
  screenshots?: boolean;
  interTargetDelayMs?: number;
}

export interface AppLauncher {
  launchApplication(appName: string): Promise<void>;
}

export interface TestOrchestratorDeps {
  builder: BuildCollaborator;
  boot: { boot(): Promise<BootResult>; attach(): Promise<BootResult> };
  supervisor: Pick<ProcessController, 'kill'>;
  watcher: Pick<ResultWatcher, 'waitForResults'>;
  createLauncher?: (driver: AutomationDriver) => AppLauncher;
  navigation?: Partial<NavigationSettings>;
  clock?: Clock;
  logger?: Logger;
}

export function summarizeOutcomes(outcomes: TargetOutcome[]): TestRunReport {
  let passed = 0;
  let failed = 0;

  for (const outcome of outcomes) {
    if (outcome.results) {
      passed += outcome.results.passed;
      failed += outcome.results.failed;
    }
    if (outcome.status !== 'completed') {
      failed += 1;
    }
  }

  const success = outcomes.every(
    outcome => outcome.status === 'completed' && outcome.results !== undefined && outcome.results.failed === 0
  );
  return { outcomes, passed, failed, success };
}

/**
 * build → deploy → boot → for each target: launch, wait for results,
 * screenshot → report. Build, deploy and boot failures abort the run; a
 * failing target is recorded and the remaining targets still run.
 */
export class TestOrchestrator {
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly createLauncher: (driver: AutomationDriver) => AppLauncher;

  constructor(private readonly deps: TestOrchestratorDeps) {
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? createLogger('tests');
    this.createLauncher =
      deps.createLauncher ??
      (driver => new UiNavigator(driver, deps.navigation, this.logger.child('navigator')));
  }

  async run(options: TestRunOptions): Promise<TestRunReport> {
    const { targets } = options;
    this.logger.info('tests to run', { targets: targets.map(target => target.name) });

    if (!options.skipBuild) {
      await this.buildAll(targets);
    }
    await this.deployAll(targets, options.sharedFolder);

    const session = options.useExisting ? await this.deps.boot.attach() : await this.deps.boot.boot();
    this.logger.info('emulator ready', { ...session.screen, attempts: session.attempts });

    try {
      const outcomes: TargetOutcome[] = [];
      for (const [index, target] of targets.entries()) {
        this.logger.info(`[${index + 1}/${targets.length}] running ${target.displayName}`);
        outcomes.push(await this.runTarget(session.driver, target, options));

        if (index < targets.length - 1) {
          await this.clock.sleep(options.interTargetDelayMs ?? 2000);
        }
      }
      return summarizeOutcomes(outcomes);
    } finally {
      session.driver.disconnect();
      if (!options.keepRunning && session.handle) {
        this.logger.info('shutting down emulator', { pid: session.handle.pid });
        await this.deps.supervisor.kill(session.handle);
      }
    }
  }

  private async buildAll(targets: TestTarget[]): Promise<void> {
    for (const target of targets) {
      this.logger.info(`building ${target.displayName}`);
      try {
        await this.deps.builder.build(target);
      } catch (error) {
        throw error instanceof BuildError ? error : new BuildError(target.name, describeError(error));
      }
    }
    this.logger.info('all tests built');
  }

  private async deployAll(targets: TestTarget[], sharedFolder: string): Promise<void> {
    for (const target of targets) {
      const artifact = await this.deps.builder.locateArtifact(target);
      const destination = await deployArtifact(artifact, sharedFolder);
      this.logger.debug('deployed test app', { target: target.name, destination });
    }
  }

  private async runTarget(
    driver: AutomationDriver,
    target: TestTarget,
    options: TestRunOptions
  ): Promise<TargetOutcome> {
    const resultsPath = path.join(options.sharedFolder, target.logFileName);

    try {
      await fs.promises.rm(resultsPath, { force: true });
      await this.createLauncher(driver).launchApplication(target.appName);
    } catch (error) {
      this.logger.error(`failed to launch ${target.name}`, { error: describeError(error) });
      const outcome: TargetOutcome = { target, status: 'launch-failed', error: describeError(error) };
      if (options.screenshots) {
        outcome.screenshotPath = await this.trySaveScreenshot(driver, options.sharedFolder, `error_${target.name}`);
      }
      return outcome;
    }

    let outcome: TargetOutcome;
    try {
      const results = await this.deps.watcher.waitForResults(resultsPath, options.resultTimeoutMs);
      outcome = { target, status: 'completed', results };
      const summary = `${target.displayName}: ${results.passed} passed, ${results.failed} failed`;
      if (results.failed > 0) {
        this.logger.warn(summary);
      } else {
        this.logger.info(summary);
      }
    } catch (error) {
      outcome = {
        target,
        status: error instanceof TimeoutError ? 'timed-out' : 'error',
        error: describeError(error),
      };
      this.logger.error(`${target.displayName} failed`, { error: outcome.error });
    }

    if (options.screenshots) {
      outcome.screenshotPath = await this.trySaveScreenshot(driver, options.sharedFolder, `after_${target.name}`);
    }
    return outcome;
  }

  private async trySaveScreenshot(
    driver: AutomationDriver,
    directory: string,
    name: string
  ): Promise<string | undefined> {
    try {
      const screenshotPath = await saveRawScreenshot(await driver.screenshot(), directory, name);
      this.logger.info('screenshot saved', { screenshotPath });
      return screenshotPath;
    } catch (error) {
      this.logger.warn('screenshot failed', { name, error: describeError(error) });
      return undefined;
    }
  }
}
