// ============================================================================
// Runtime Config & Logging
// ============================================================================
// Process-level knobs read straight from the environment (log level, JSON
// output). Everything the tools need lives in the settings tree instead
// (see src/settings/).
//
// All output goes to stderr: stdout belongs to the stdio MCP transport.
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Config {
  logLevel: LogLevel;
  jsonLogging: boolean;
}

let levelOverride: LogLevel | undefined;

function parseLevel(value: string | undefined): LogLevel | undefined {
  const lowered = value?.toLowerCase();
  if (lowered === 'debug' || lowered === 'info' || lowered === 'warn' || lowered === 'error') {
    return lowered;
  }
  if (lowered === 'warning') return 'warn';
  return undefined;
}

export function getConfig(): Config {
  return {
    logLevel: levelOverride ?? parseLevel(process.env.LOG_LEVEL) ?? 'info',
    jsonLogging: process.env.JSON_LOGGING !== undefined,
  };
}

/**
 * Force a log level for the rest of the process (CLI `--log-level`).
 * Pass undefined to fall back to LOG_LEVEL again.
 */
export function setLogLevel(level: LogLevel | undefined): void {
  levelOverride = level;
}

function emit(level: LogLevel, message: string, args: unknown[]): void {
  const config = getConfig();
  if (LEVEL_ORDER[level] < LEVEL_ORDER[config.logLevel]) return;

  if (config.jsonLogging) {
    const entry: Record<string, unknown> = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };
    if (args.length > 0) {
      entry.args = args.map(a => (a instanceof Error ? a.message : a));
    }
    console.error(JSON.stringify(entry));
    return;
  }

  console.error(`[dremio-mcp] ${level.toUpperCase()} ${message}`, ...args);
}

export function log(message: string, ...args: unknown[]): void {
  emit('info', message, args);
}

export function debug(message: string, ...args: unknown[]): void {
  emit('debug', message, args);
}

export function warn(message: string, ...args: unknown[]): void {
  emit('warn', message, args);
}

export function logError(message: string, ...args: unknown[]): void {
  emit('error', message, args);
}

export function parseLogLevel(value: string): LogLevel | undefined {
  return parseLevel(value);
}
