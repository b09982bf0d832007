import { LogLevelName, LogLevelSchema } from '../types';

type Level = Exclude<LogLevelName, 'silent'>;

const LEVEL_ORDER: Record<LogLevelName, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevelName;
  // stdout carries the MCP stdio transport, so everything goes to stderr
  write?: (line: string) => void;
}

let defaultLevel: LogLevelName = parseLevel(process.env.CLASSIC_MAC_MCP_LOG_LEVEL) ?? 'info';

function parseLevel(value: string | undefined): LogLevelName | undefined {
  if (!value) return undefined;
  const parsed = LogLevelSchema.safeParse(value.trim().toLowerCase());
  return parsed.success ? parsed.data : undefined;
}

export function setDefaultLogLevel(level: LogLevelName): void {
  defaultLevel = level;
}

function formatMeta(meta?: Record<string, unknown>): string {
  if (!meta || Object.keys(meta).length === 0) {
    return '';
  }

  try {
    return ` ${JSON.stringify(meta)}`;
  } catch {
    return ' [unserializable metadata]';
  }
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const write = options.write ?? ((line: string) => console.error(line));
  const threshold = (): LogLevelName => options.level ?? defaultLevel;

  const emit = (level: Level, message: string, meta?: Record<string, unknown>) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold()]) {
      return;
    }
    write(`[classic-mac-mcp:${scope}] ${level} ${message}${formatMeta(meta)}`);
  };

  return {
    debug: (message, meta) => emit('debug', message, meta),
    info: (message, meta) => emit('info', message, meta),
    warn: (message, meta) => emit('warn', message, meta),
    error: (message, meta) => emit('error', message, meta),
    child: (child: string) => createLogger(`${scope}:${child}`, options),
  };
}

export const silentLogger: Logger = createLogger('silent', { level: 'silent' });
