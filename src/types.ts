import { z } from 'zod';

// Screen and screenshot interfaces
export interface ScreenDescriptor {
  width: number;
  height: number;
  depth: number;
}

export interface Screenshot extends ScreenDescriptor {
  /** Bytes per row; may exceed width * depth / 8 because of row padding. */
  stride: number;
  pixels: Buffer;
}

// Screenshot response interfaces
export interface ScreenshotResponse {
  data: string; // Base64 encoded PNG
  format: 'png';
  width: number;
  height: number;
  depth: number;
  timestamp: number;
}

export enum MouseButton {
  Primary = 0,
  Secondary = 1,
}

// Everything the orchestration layers need from an emulator connection.
// AutomationClient implements it over the RPC socket; tests substitute fakes.
export interface AutomationDriver {
  readonly connected: boolean;
  connect(socketPath?: string): Promise<void>;
  disconnect(): void;
  ping(): Promise<boolean>;
  getScreenSize(): Promise<ScreenDescriptor>;
  mouseMove(x: number, y: number): Promise<void>;
  click(x: number, y: number, button?: MouseButton): Promise<void>;
  doubleClick(x: number, y: number, button?: MouseButton): Promise<void>;
  mouseDown(button?: MouseButton): Promise<void>;
  mouseUp(button?: MouseButton): Promise<void>;
  keyDown(keyCode: number): Promise<void>;
  keyUp(keyCode: number): Promise<void>;
  pressChord(keyCodes: readonly number[]): Promise<void>;
  typeText(text: string): Promise<void>;
  waitMs(ms: number): Promise<void>;
  screenshot(): Promise<Screenshot>;
}

// Emulator process interfaces
export interface EmulatorHandle {
  pid: number | undefined;
  binaryPath: string;
  startedAt: number;
}

export interface ProcessController {
  launch(): EmulatorHandle;
  kill(handle: EmulatorHandle): Promise<void>;
  forceKill(processName: string): Promise<boolean>;
}

// Test target and result interfaces
export interface TestTarget {
  name: string;
  displayName: string;
  buildTarget: string;
  binaryName: string;
  appName: string;
  logFileName: string;
}

export interface TestCaseResult {
  name: string;
  passed: boolean;
  details?: string;
}

export interface TestResultSet {
  tests: TestCaseResult[];
  passed: number;
  failed: number;
  total: number;
}

export type TargetStatus = 'completed' | 'launch-failed' | 'timed-out' | 'error';

export interface TargetOutcome {
  target: TestTarget;
  status: TargetStatus;
  results?: TestResultSet;
  error?: string;
  screenshotPath?: string;
}

export interface TestRunReport {
  outcomes: TargetOutcome[];
  passed: number;
  failed: number;
  success: boolean;
}

export interface BuildCollaborator {
  build(target: TestTarget): Promise<void>;
  locateArtifact(target: TestTarget): Promise<string>;
}

// Error handling interfaces
export interface AutomationErrorInfo {
  code: string;
  message: string;
  details?: unknown;
  suggestion?: string;
}

export class AutomationError extends Error implements AutomationErrorInfo {
  code: string;
  details?: unknown;
  suggestion?: string;

  constructor(code: string, message: string, details?: unknown, suggestion?: string) {
    super(message);
    this.name = 'AutomationError';
    this.code = code;
    this.details = details;
    this.suggestion = suggestion;
  }
}

export class ConnectionError extends AutomationError {
  constructor(socketPath: string, reason: string, details?: unknown) {
    super(
      'CONNECTION_FAILED',
      `Failed to connect to automation socket '${socketPath}': ${reason}`,
      details,
      'Make sure the emulator is running with the --automation flag'
    );
    this.name = 'ConnectionError';
  }
}

export class TransportError extends AutomationError {
  constructor(message: string, details?: unknown) {
    super('TRANSPORT_FAILED', message, details);
    this.name = 'TransportError';
  }
}

export class ProtocolError extends AutomationError {
  constructor(message: string, details?: unknown) {
    super(
      'PROTOCOL_ERROR',
      message,
      details,
      'The emulator automation server does not speak the expected protocol version'
    );
    this.name = 'ProtocolError';
  }
}

export class TimeoutError extends AutomationError {
  elapsedMs: number;

  constructor(message: string, elapsedMs: number) {
    super('TIMEOUT', message, { elapsedMs });
    this.name = 'TimeoutError';
    this.elapsedMs = elapsedMs;
  }
}

export class BuildError extends AutomationError {
  constructor(target: string, output: string) {
    super('BUILD_FAILED', `Build failed for ${target}`, { output });
    this.name = 'BuildError';
  }
}

export class ArtifactNotFoundError extends AutomationError {
  constructor(artifactPath: string) {
    super(
      'ARTIFACT_NOT_FOUND',
      `Test app not found: ${artifactPath}`,
      { artifactPath },
      'Build the test target first or disable skipBuild'
    );
    this.name = 'ArtifactNotFoundError';
  }
}

export class EmulatorNotFoundError extends AutomationError {
  constructor(candidates: string[]) {
    super(
      'EMULATOR_NOT_FOUND',
      'No emulator binary with automation support found',
      { candidates },
      'Set emulatorBinaries in the config or CLASSIC_MAC_MCP_EMULATOR'
    );
    this.name = 'EmulatorNotFoundError';
  }
}

export class DisplayNotReadyError extends AutomationError {
  constructor(screen: ScreenDescriptor) {
    super(
      'DISPLAY_NOT_READY',
      `Emulator reported an unusable display (${screen.width}x${screen.height})`,
      screen
    );
    this.name = 'DisplayNotReadyError';
  }
}

export class BootFailedError extends AutomationError {
  attempts: number;
  lastError?: Error;

  constructor(attempts: number, lastError?: Error) {
    super(
      'BOOT_FAILED',
      `Failed to start emulator after ${attempts} attempt${attempts === 1 ? '' : 's'}` +
        (lastError ? `: ${lastError.message}` : ''),
      lastError ? { lastError: lastError.message } : undefined
    );
    this.name = 'BootFailedError';
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export class ConfigError extends AutomationError {
  constructor(message: string, details?: unknown, suggestion?: string) {
    super('INVALID_CONFIG', message, details, suggestion);
    this.name = 'ConfigError';
  }
}

// Configuration schemas
export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const TestTargetSchema = z.object({
  name: z.string().min(1).describe('Logical target name, also the guest application name'),
  displayName: z.string().min(1).optional(),
  buildTarget: z.string().min(1).optional(),
  binaryName: z.string().min(1).optional(),
  appName: z.string().min(1).optional(),
  logFileName: z.string().min(1).optional(),
});

export const BootSettingsSchema = z.object({
  maxAttempts: z.number().int().positive().default(3),
  attemptTimeoutMs: z.number().int().positive().default(30000),
  pollIntervalMs: z.number().int().positive().default(1000),
  settleMs: z.number().int().min(0).default(8000),
  cooldownMs: z.number().int().min(0).default(2000),
  killGraceMs: z.number().int().min(0).default(3000),
});

export const NavigationDelaysSchema = z.object({
  closeWindows: z.number().int().min(0).default(500),
  focusDesktop: z.number().int().min(0).default(500),
  typeAhead: z.number().int().min(0).default(300),
  openVolume: z.number().int().min(0).default(1500),
  launchApp: z.number().int().min(0).default(1000),
  closeFolder: z.number().int().min(0).default(500),
});

export const NavigationSettingsSchema = z.object({
  volumeName: z.string().min(1).default('Unix'),
  desktopPoint: z
    .object({ x: z.number().int().min(0), y: z.number().int().min(0) })
    .default({ x: 320, y: 300 }),
  delays: NavigationDelaysSchema.default({}),
});

export const ConfigSchema = z.object({
  socketPath: z.string().min(1).default('/tmp/basilisk_automation.sock'),
  emulatorBinaries: z
    .array(z.string().min(1))
    .min(1)
    .default([
      '/Applications/BasiliskII.app/Contents/MacOS/BasiliskII',
      '/usr/local/bin/BasiliskII',
      '/usr/bin/BasiliskII',
    ]),
  emulatorProcessName: z.string().min(1).default('BasiliskII'),
  sharedFolder: z.string().min(1).optional(),
  prefsFile: z.string().min(1).optional(),
  projectPath: z.string().min(1).optional(),
  toolchainFile: z.string().min(1).optional(),
  buildJobs: z.number().int().positive().default(4),
  targets: z.array(TestTargetSchema).default([]),
  boot: BootSettingsSchema.default({}),
  navigation: NavigationSettingsSchema.default({}),
  resultTimeoutMs: z.number().int().positive().default(60000),
  resultPollIntervalMs: z.number().int().positive().default(1000),
  interTargetDelayMs: z.number().int().min(0).default(2000),
  logLevel: LogLevelSchema.default('info'),
});

export type LogLevelName = z.infer<typeof LogLevelSchema>;
export type BootSettings = z.infer<typeof BootSettingsSchema>;
export type NavigationSettings = z.infer<typeof NavigationSettingsSchema>;
export type AppConfig = z.infer<typeof ConfigSchema>;
export type AppConfigInput = z.input<typeof ConfigSchema>;

// Tool input schemas
export const PingEmulatorInputSchema = z.object({});

export const GetScreenSizeInputSchema = z.object({});

export const TakeScreenshotInputSchema = z.object({
  saveRawTo: z
    .string()
    .optional()
    .describe('Optional directory; when set the raw framebuffer is also written there.'),
});

export const ClickInputSchema = z.object({
  x: z.number().int().min(0).describe('Click X coordinate in guest pixels.'),
  y: z.number().int().min(0).describe('Click Y coordinate in guest pixels.'),
  button: z.nativeEnum(MouseButton).default(MouseButton.Primary).describe('Mouse button (0 = primary).'),
  double: z.boolean().default(false).describe('Send a double click instead of a single click.'),
});

export const MoveMouseInputSchema = z.object({
  x: z.number().int().min(0).describe('Target X coordinate in guest pixels.'),
  y: z.number().int().min(0).describe('Target Y coordinate in guest pixels.'),
});

export const PressKeysInputSchema = z.object({
  keyCodes: z
    .array(z.number().int().min(0).max(0x7f))
    .min(1)
    .describe('Classic Mac virtual key codes, modifiers first (e.g. [55, 31] for Cmd+O).'),
});

export const TypeTextInputSchema = z.object({
  text: z.string().min(1).describe('Text typed into the guest by the emulator.'),
});

export const BootEmulatorInputSchema = z.object({
  useExisting: z
    .boolean()
    .default(false)
    .describe('Connect to an already running emulator instead of launching one.'),
});

export const ShutdownEmulatorInputSchema = z.object({});

export const LaunchGuestAppInputSchema = z.object({
  appName: z.string().min(1).describe('Name of the application on the shared volume.'),
});

export const ListTestTargetsInputSchema = z.object({});

export const RunGuestTestsInputSchema = z.object({
  filter: z.string().min(1).default('all').describe('"all" or part of a target name.'),
  skipBuild: z.boolean().default(false),
  useExisting: z.boolean().default(false),
  keepRunning: z.boolean().default(false),
  screenshots: z.boolean().default(false),
  timeoutSeconds: z.number().int().positive().optional(),
  sharedFolder: z.string().min(1).optional(),
});

// Tool output schemas
export const PingEmulatorOutputSchema = z.object({
  responsive: z.boolean(),
});

export const ScreenSizeOutputSchema = z.object({
  width: z.number().int().min(0),
  height: z.number().int().min(0),
  depth: z.number().int().min(0),
});

export const BootEmulatorOutputSchema = z.object({
  mode: z.enum(['launched', 'attached']),
  attempts: z.number().int().min(0),
  pid: z.number().int().optional(),
  screen: ScreenSizeOutputSchema,
});

// JSON schemas advertised to MCP clients
const NO_ARGUMENTS = {
  type: 'object' as const,
  properties: {},
  required: [] as string[],
};

export const PingEmulatorToolSchema = NO_ARGUMENTS;

export const GetScreenSizeToolSchema = NO_ARGUMENTS;

export const TakeScreenshotToolSchema = {
  type: 'object' as const,
  properties: {
    saveRawTo: {
      type: 'string' as const,
      description: 'Optional directory; when set the raw framebuffer is also written there.',
    },
  },
  required: [] as string[],
};

export const ClickToolSchema = {
  type: 'object' as const,
  properties: {
    x: { type: 'number' as const, description: 'Click X coordinate in guest pixels.' },
    y: { type: 'number' as const, description: 'Click Y coordinate in guest pixels.' },
    button: { type: 'number' as const, description: 'Mouse button (0 = primary).', default: 0 },
    double: {
      type: 'boolean' as const,
      description: 'Send a double click instead of a single click.',
      default: false,
    },
  },
  required: ['x', 'y'] as string[],
};

export const MoveMouseToolSchema = {
  type: 'object' as const,
  properties: {
    x: { type: 'number' as const, description: 'Target X coordinate in guest pixels.' },
    y: { type: 'number' as const, description: 'Target Y coordinate in guest pixels.' },
  },
  required: ['x', 'y'] as string[],
};

export const PressKeysToolSchema = {
  type: 'object' as const,
  properties: {
    keyCodes: {
      type: 'array' as const,
      items: { type: 'number' as const },
      description: 'Classic Mac virtual key codes, modifiers first (e.g. [55, 31] for Cmd+O).',
    },
  },
  required: ['keyCodes'] as string[],
};

export const TypeTextToolSchema = {
  type: 'object' as const,
  properties: {
    text: { type: 'string' as const, description: 'Text typed into the guest by the emulator.' },
  },
  required: ['text'] as string[],
};

export const BootEmulatorToolSchema = {
  type: 'object' as const,
  properties: {
    useExisting: {
      type: 'boolean' as const,
      description: 'Connect to an already running emulator instead of launching one.',
      default: false,
    },
  },
  required: [] as string[],
};

export const ShutdownEmulatorToolSchema = NO_ARGUMENTS;

export const LaunchGuestAppToolSchema = {
  type: 'object' as const,
  properties: {
    appName: {
      type: 'string' as const,
      description: 'Name of the application on the shared volume.',
    },
  },
  required: ['appName'] as string[],
};

export const ListTestTargetsToolSchema = NO_ARGUMENTS;

export const RunGuestTestsToolSchema = {
  type: 'object' as const,
  properties: {
    filter: {
      type: 'string' as const,
      description: '"all" or part of a target name.',
      default: 'all',
    },
    skipBuild: { type: 'boolean' as const, description: 'Skip building the test apps.' },
    useExisting: {
      type: 'boolean' as const,
      description: 'Use an already running emulator instead of launching one.',
    },
    keepRunning: {
      type: 'boolean' as const,
      description: 'Leave the emulator running after the tests.',
    },
    screenshots: {
      type: 'boolean' as const,
      description: 'Save a raw screenshot after each target.',
    },
    timeoutSeconds: {
      type: 'number' as const,
      description: 'Per-target result timeout in seconds.',
    },
    sharedFolder: {
      type: 'string' as const,
      description: 'Host path of the shared volume (overrides configuration).',
    },
  },
  required: [] as string[],
};
