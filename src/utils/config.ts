import fs from 'fs';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import { AppConfig, ConfigError, ConfigSchema, TestTarget, TestTargetSchema } from '../types';

export const CONFIG_FILE_NAME = 'classic-mac-mcp.config.json';
export const DEFAULT_HOME_DIR = path.join(os.homedir(), '.classic-mac-mcp');
export const DEFAULT_PREFS_FILE = path.join(os.homedir(), '.basilisk_ii_prefs');

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Explicit config file; otherwise CLASSIC_MAC_MCP_CONFIG or ./classic-mac-mcp.config.json. */
  configPath?: string;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

function readConfigFile(configPath: string): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, 'utf8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${configPath}`, {
      error: error instanceof Error ? error.message : String(error),
    });
  }

  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Config file ${configPath} is not valid JSON`, {
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

function resolveConfigPath(options: LoadConfigOptions, env: NodeJS.ProcessEnv): string | undefined {
  const cwd = options.cwd ?? process.cwd();
  const explicit = options.configPath ?? env.CLASSIC_MAC_MCP_CONFIG;
  if (explicit) {
    return path.resolve(cwd, explicit);
  }

  const candidate = path.join(cwd, CONFIG_FILE_NAME);
  return fs.existsSync(candidate) ? candidate : undefined;
}

function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  if (env.CLASSIC_MAC_MCP_SOCKET) overrides.socketPath = env.CLASSIC_MAC_MCP_SOCKET;
  if (env.CLASSIC_MAC_MCP_SHARED_FOLDER) overrides.sharedFolder = env.CLASSIC_MAC_MCP_SHARED_FOLDER;
  if (env.CLASSIC_MAC_MCP_EMULATOR) overrides.emulatorBinaries = [env.CLASSIC_MAC_MCP_EMULATOR];
  if (env.CLASSIC_MAC_MCP_PROJECT) overrides.projectPath = env.CLASSIC_MAC_MCP_PROJECT;
  if (env.CLASSIC_MAC_MCP_LOG_LEVEL) overrides.logLevel = env.CLASSIC_MAC_MCP_LOG_LEVEL.toLowerCase();
  return overrides;
}

export function parseConfig(input: unknown): AppConfig {
  const parsed = ConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`, {
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

// Defaults, then the JSON file, then environment variables.
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  const configPath = resolveConfigPath(options, env);
  const fromFile = configPath ? readConfigFile(configPath) : {};

  if (typeof fromFile !== 'object' || fromFile === null || Array.isArray(fromFile)) {
    throw new ConfigError(`Config file ${configPath ?? ''} must contain a JSON object`);
  }

  return parseConfig({ ...fromFile, ...envOverrides(env) });
}

export function defineTestTarget(definition: z.input<typeof TestTargetSchema>): TestTarget {
  const { name, ...overrides } = TestTargetSchema.parse(definition);
  return {
    name,
    displayName: overrides.displayName ?? name,
    buildTarget: overrides.buildTarget ?? `${name}_APPL`,
    binaryName: overrides.binaryName ?? `${name}.bin`,
    appName: overrides.appName ?? name,
    logFileName: overrides.logFileName ?? `${name}.log`,
  };
}

// "all" or a case-insensitive fragment of a target name; a fragment picks the first match.
export function selectTargets(targets: TestTarget[], filter = 'all'): TestTarget[] {
  if (targets.length === 0) {
    throw new ConfigError(
      'No test targets configured',
      undefined,
      `Add a "targets" list to ${CONFIG_FILE_NAME}`
    );
  }

  const wanted = filter.trim().toLowerCase();
  if (wanted === 'all') {
    return [...targets];
  }

  const match = targets.find(target => target.name.toLowerCase().includes(wanted));
  if (!match) {
    throw new ConfigError(
      `Unknown test: ${filter}. Available tests: ${targets.map(target => target.name).join(', ')}, all`
    );
  }
  return [match];
}

function isDirectory(candidate: string): boolean {
  try {
    return fs.statSync(candidate).isDirectory();
  } catch {
    return false;
  }
}

// Reads the host folder the emulator mounts as its shared volume ("extfs <path>").
export function readSharedFolderFromPrefs(prefsFile: string): string | undefined {
  let contents: string;
  try {
    contents = fs.readFileSync(prefsFile, 'utf8');
  } catch {
    return undefined;
  }

  for (const line of contents.split(/\r?\n/)) {
    if (line.startsWith('extfs ')) {
      const folder = line.slice('extfs '.length).trim();
      if (folder && isDirectory(folder)) {
        return folder;
      }
    }
  }
  return undefined;
}

export function resolveSharedFolder(
  config: Pick<AppConfig, 'sharedFolder' | 'prefsFile'>,
  homeDir: string = DEFAULT_HOME_DIR
): string {
  if (config.sharedFolder) {
    return path.resolve(config.sharedFolder);
  }

  const fromPrefs = readSharedFolderFromPrefs(config.prefsFile ?? DEFAULT_PREFS_FILE);
  if (fromPrefs) {
    return fromPrefs;
  }

  const fallback = path.join(homeDir, 'shared');
  if (isDirectory(fallback)) {
    return fallback;
  }

  throw new ConfigError(
    'Could not determine shared folder path',
    undefined,
    'Set sharedFolder in the config or CLASSIC_MAC_MCP_SHARED_FOLDER'
  );
}
