import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  CallToolRequestSchema,
  CallToolResult,
  ListToolsRequestSchema,
  Tool,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import pkg from '../package.json';
import {
  AppConfig,
  AutomationDriver,
  BootEmulatorInputSchema,
  BootEmulatorOutputSchema,
  BootEmulatorToolSchema,
  BuildCollaborator,
  ClickInputSchema,
  ClickToolSchema,
  ConfigError,
  EmulatorHandle,
  GetScreenSizeInputSchema,
  GetScreenSizeToolSchema,
  LaunchGuestAppInputSchema,
  LaunchGuestAppToolSchema,
  ListTestTargetsInputSchema,
  ListTestTargetsToolSchema,
  MoveMouseInputSchema,
  MoveMouseToolSchema,
  PingEmulatorInputSchema,
  PingEmulatorOutputSchema,
  PingEmulatorToolSchema,
  PressKeysInputSchema,
  PressKeysToolSchema,
  ProcessController,
  RunGuestTestsInputSchema,
  RunGuestTestsToolSchema,
  ScreenSizeOutputSchema,
  ShutdownEmulatorInputSchema,
  ShutdownEmulatorToolSchema,
  TakeScreenshotInputSchema,
  TakeScreenshotToolSchema,
  TestTarget,
  TypeTextInputSchema,
  TypeTextToolSchema,
} from './types';
import { AutomationClient } from './utils/automation-client';
import { BootOrchestrator } from './utils/boot';
import { CMakeBuilder } from './utils/builder';
import { Clock, systemClock } from './utils/clock';
import { defineTestTarget, parseConfig, resolveSharedFolder, selectTargets } from './utils/config';
import { formatErrorForResponse } from './utils/error';
import { Logger, createLogger } from './utils/logger';
import { UiNavigator } from './utils/navigator';
import { TestOrchestrator } from './utils/orchestrator';
import { ProcessSupervisor } from './utils/process-supervisor';
import { ResultWatcher, formatTestReport } from './utils/results';
import { saveRawScreenshot, toScreenshotResponse } from './utils/screenshot';

export interface ServerDependencies {
  config?: AppConfig;
  driver?: AutomationDriver;
  supervisor?: ProcessController;
  /** Replaces the CMake builder, e.g. for projects built some other way. */
  builder?: BuildCollaborator;
  watcher?: Pick<ResultWatcher, 'waitForResults'>;
  clock?: Clock;
  logger?: Logger;
}

const TOOLS: Tool[] = [
  {
    name: 'ping_emulator',
    description: 'Check that the emulator automation server answers',
    inputSchema: PingEmulatorToolSchema,
  },
  {
    name: 'get_emulator_screen_size',
    description: 'Get the guest display width, height and bit depth',
    inputSchema: GetScreenSizeToolSchema,
  },
  {
    name: 'take_emulator_screenshot',
    description: 'Capture the guest display as a PNG image',
    inputSchema: TakeScreenshotToolSchema,
  },
  {
    name: 'click_emulator',
    description: 'Click (or double click) at a point on the guest display',
    inputSchema: ClickToolSchema,
  },
  {
    name: 'move_emulator_mouse',
    description: 'Move the guest mouse pointer',
    inputSchema: MoveMouseToolSchema,
  },
  {
    name: 'press_emulator_keys',
    description: 'Press a key or key chord; keys go down in order and come up in reverse',
    inputSchema: PressKeysToolSchema,
  },
  {
    name: 'type_emulator_text',
    description: 'Type text into the frontmost guest application',
    inputSchema: TypeTextToolSchema,
  },
  {
    name: 'boot_emulator',
    description: 'Launch the emulator (with retries) or attach to a running one',
    inputSchema: BootEmulatorToolSchema,
  },
  {
    name: 'shutdown_emulator',
    description: 'Disconnect and stop the emulator',
    inputSchema: ShutdownEmulatorToolSchema,
  },
  {
    name: 'launch_guest_app',
    description: 'Open an application from the shared volume through the Finder',
    inputSchema: LaunchGuestAppToolSchema,
  },
  {
    name: 'list_test_targets',
    description: 'List the configured guest test targets',
    inputSchema: ListTestTargetsToolSchema,
  },
  {
    name: 'run_guest_tests',
    description: 'Build, deploy and run guest test apps, then collect their results',
    inputSchema: RunGuestTestsToolSchema,
  },
];

function textResult(text: string): CallToolResult {
  return { content: [{ type: 'text', text }] };
}

function jsonResult(value: unknown): CallToolResult {
  return textResult(JSON.stringify(value));
}

class ClassicMacMcpServer {
  private server: Server;
  private readonly config: AppConfig;
  private readonly driver: AutomationDriver;
  private readonly supervisor: ProcessController;
  private readonly bootOrchestrator: BootOrchestrator;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private handle?: EmulatorHandle;

  constructor(private readonly deps: ServerDependencies = {}) {
    this.config = deps.config ?? parseConfig({});
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? createLogger('server');
    this.driver =
      deps.driver ??
      new AutomationClient({ socketPath: this.config.socketPath, logger: this.logger.child('client') });
    this.supervisor =
      deps.supervisor ??
      new ProcessSupervisor({
        emulatorBinaries: this.config.emulatorBinaries,
        socketPath: this.config.socketPath,
        killGraceMs: this.config.boot.killGraceMs,
        logger: this.logger.child('process'),
      });
    this.bootOrchestrator = new BootOrchestrator({
      driver: this.driver,
      supervisor: this.supervisor,
      socketPath: this.config.socketPath,
      processName: this.config.emulatorProcessName,
      settings: this.config.boot,
      clock: this.clock,
      logger: this.logger.child('boot'),
    });

    this.server = new Server(
      {
        name: 'classic-mac-mcp',
        version: pkg.version,
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.setupToolHandlers();
  }

  private setupToolHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: this.listTools() }));

    this.server.setRequestHandler(CallToolRequestSchema, async request => {
      const { name, arguments: args } = request.params;
      return this.callTool(name, args);
    });
  }

  listTools(): Tool[] {
    return TOOLS;
  }

  async callTool(name: string, args: unknown = {}): Promise<CallToolResult> {
    try {
      switch (name) {
        case 'ping_emulator': {
          PingEmulatorInputSchema.parse(args);
          const driver = await this.requireDriver();
          return jsonResult(PingEmulatorOutputSchema.parse({ responsive: await driver.ping() }));
        }

        case 'get_emulator_screen_size': {
          GetScreenSizeInputSchema.parse(args);
          const driver = await this.requireDriver();
          return jsonResult(ScreenSizeOutputSchema.parse(await driver.getScreenSize()));
        }

        case 'take_emulator_screenshot': {
          const input = TakeScreenshotInputSchema.parse(args);
          return await this.takeScreenshot(input);
        }

        case 'click_emulator': {
          const input = ClickInputSchema.parse(args);
          const driver = await this.requireDriver();
          if (input.double) {
            await driver.doubleClick(input.x, input.y, input.button);
          } else {
            await driver.click(input.x, input.y, input.button);
          }
          return textResult(`${input.double ? 'Double clicked' : 'Clicked'} at (${input.x}, ${input.y})`);
        }

        case 'move_emulator_mouse': {
          const input = MoveMouseInputSchema.parse(args);
          const driver = await this.requireDriver();
          await driver.mouseMove(input.x, input.y);
          return textResult(`Moved mouse to (${input.x}, ${input.y})`);
        }

        case 'press_emulator_keys': {
          const input = PressKeysInputSchema.parse(args);
          const driver = await this.requireDriver();
          await driver.pressChord(input.keyCodes);
          return textResult(`Pressed keys ${input.keyCodes.join('+')}`);
        }

        case 'type_emulator_text': {
          const input = TypeTextInputSchema.parse(args);
          const driver = await this.requireDriver();
          await driver.typeText(input.text);
          return textResult(`Typed ${input.text.length} characters`);
        }

        case 'boot_emulator': {
          const input = BootEmulatorInputSchema.parse(args);
          return jsonResult(await this.bootEmulator(input));
        }

        case 'shutdown_emulator': {
          ShutdownEmulatorInputSchema.parse(args);
          return textResult(await this.shutdown());
        }

        case 'launch_guest_app': {
          const input = LaunchGuestAppInputSchema.parse(args);
          const driver = await this.requireDriver();
          const navigator = new UiNavigator(driver, this.config.navigation, this.logger.child('navigator'));
          await navigator.launchApplication(input.appName);
          return textResult(`Launch sequence sent for ${input.appName}`);
        }

        case 'list_test_targets': {
          ListTestTargetsInputSchema.parse(args);
          return jsonResult({ targets: this.testTargets() });
        }

        case 'run_guest_tests': {
          const input = RunGuestTestsInputSchema.parse(args);
          return await this.runGuestTests(input);
        }

        default:
          throw new Error(`Unknown tool: ${name}`);
      }
    } catch (error) {
      return {
        content: [
          {
            type: 'text',
            text: formatErrorForResponse(error),
          },
        ],
        isError: true,
      };
    }
  }

  // Tools that talk to the guest reuse the live connection or attach to a
  // running emulator; they never launch one.
  private async requireDriver(): Promise<AutomationDriver> {
    if (!this.driver.connected) {
      await this.bootOrchestrator.attach();
    }
    return this.driver;
  }

  private async takeScreenshot(input: z.infer<typeof TakeScreenshotInputSchema>): Promise<CallToolResult> {
    const driver = await this.requireDriver();
    const shot = await driver.screenshot();
    const response = toScreenshotResponse(shot);

    let note = '';
    if (input.saveRawTo) {
      const rawPath = await saveRawScreenshot(shot, input.saveRawTo, `screenshot_${this.clock.now()}`);
      note = `, raw framebuffer saved to ${rawPath}`;
    }

    return {
      content: [
        {
          type: 'image',
          data: response.data,
          mimeType: 'image/png',
        },
        {
          type: 'text',
          text: `Emulator screenshot captured: ${response.width}x${response.height} pixels, ${response.depth}-bit${note}`,
        },
      ],
    };
  }

  private async bootEmulator(
    input: z.infer<typeof BootEmulatorInputSchema>
  ): Promise<z.infer<typeof BootEmulatorOutputSchema>> {
    if (input.useExisting) {
      const result = await this.bootOrchestrator.attach();
      return BootEmulatorOutputSchema.parse({ mode: 'attached', attempts: result.attempts, screen: result.screen });
    }

    // boot() clears every emulator process by name, ours included.
    this.handle = undefined;
    const result = await this.bootOrchestrator.boot();
    this.handle = result.handle;
    return BootEmulatorOutputSchema.parse({
      mode: 'launched',
      attempts: result.attempts,
      pid: result.handle?.pid,
      screen: result.screen,
    });
  }

  private async shutdown(): Promise<string> {
    this.driver.disconnect();

    const handle = this.handle;
    if (handle) {
      this.handle = undefined;
      await this.supervisor.kill(handle);
      return `Emulator stopped (pid ${handle.pid ?? 'unknown'})`;
    }

    const killed = await this.supervisor.forceKill(this.config.emulatorProcessName);
    return killed ? `Stopped running ${this.config.emulatorProcessName} processes` : 'No emulator was running';
  }

  private testTargets(): TestTarget[] {
    return this.config.targets.map(defineTestTarget);
  }

  private createBuilder(): BuildCollaborator {
    if (this.deps.builder) {
      return this.deps.builder;
    }
    if (!this.config.projectPath) {
      throw new ConfigError(
        'No test project configured',
        undefined,
        'Set projectPath in the config or CLASSIC_MAC_MCP_PROJECT'
      );
    }
    return new CMakeBuilder({
      projectPath: this.config.projectPath,
      toolchainFile: this.config.toolchainFile,
      jobs: this.config.buildJobs,
      logger: this.logger.child('build'),
    });
  }

  private async runGuestTests(input: z.infer<typeof RunGuestTestsInputSchema>): Promise<CallToolResult> {
    const targets = selectTargets(this.testTargets(), input.filter);
    const sharedFolder = input.sharedFolder ?? resolveSharedFolder(this.config);

    const orchestrator = new TestOrchestrator({
      builder: this.createBuilder(),
      boot: this.bootOrchestrator,
      supervisor: this.supervisor,
      watcher:
        this.deps.watcher ??
        new ResultWatcher({
          pollIntervalMs: this.config.resultPollIntervalMs,
          clock: this.clock,
          logger: this.logger.child('results'),
        }),
      navigation: this.config.navigation,
      clock: this.clock,
      logger: this.logger.child('tests'),
    });

    if (!input.useExisting) {
      this.handle = undefined;
    }
    const report = await orchestrator.run({
      targets,
      sharedFolder,
      resultTimeoutMs: input.timeoutSeconds ? input.timeoutSeconds * 1000 : this.config.resultTimeoutMs,
      skipBuild: input.skipBuild,
      useExisting: input.useExisting,
      keepRunning: input.keepRunning,
      screenshots: input.screenshots,
      interTargetDelayMs: this.config.interTargetDelayMs,
    });

    return {
      content: [
        { type: 'text', text: formatTestReport(report) },
        {
          type: 'text',
          text: JSON.stringify({ success: report.success, passed: report.passed, failed: report.failed }),
        },
      ],
      isError: !report.success,
    };
  }

  async close(): Promise<void> {
    this.driver.disconnect();
    if (this.handle) {
      const handle = this.handle;
      this.handle = undefined;
      await this.supervisor.kill(handle);
    }
    await this.server.close();
  }

  async connect(transport: Transport): Promise<void> {
    await this.server.connect(transport);
  }

  async run(): Promise<void> {
    await this.connect(new StdioServerTransport());
    this.logger.info('Classic Mac MCP server started', { socketPath: this.config.socketPath });
  }
}

// Export the server class
export { ClassicMacMcpServer };
