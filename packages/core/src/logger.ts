export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string, extra?: Record<string, unknown>): void;
  info(message: string, extra?: Record<string, unknown>): void;
  warn(message: string, extra?: Record<string, unknown>): void;
  error(message: string, extra?: Record<string, unknown>): void;
}

let globalLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL) ?? 'info';

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const v = value?.trim().toLowerCase();
  if (v === 'debug' || v === 'info' || v === 'warn' || v === 'error') return v;
  return undefined;
}

export function setLogLevel(level: LogLevel): void {
  globalLevel = level;
}

/**
 * Scoped logger. Everything goes to stderr: stdout carries the MCP stdio
 * transport and must stay clean.
 */
export function createLogger(scope: string): Logger {
  const write = (level: LogLevel, message: string, extra?: Record<string, unknown>) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[globalLevel]) return;
    const extraStr = extra ? ` ${JSON.stringify(extra)}` : '';
    console.error(`[${scope}] ${level.toUpperCase()} ${message}${extraStr}`);
  };

  return {
    debug: (message, extra) => write('debug', message, extra),
    info: (message, extra) => write('info', message, extra),
    warn: (message, extra) => write('warn', message, extra),
    error: (message, extra) => write('error', message, extra),
  };
}
