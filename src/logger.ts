import type { LogLevel } from './config.js';

const ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export function createLogger(scope: string): Logger {
  const tag = `[${scope}]`;
  const enabled = (level: LogLevel) => ORDER[level] >= ORDER[threshold];

  // `<ISO time> | LEVEL | [Scope]`
  const prefix = (level: LogLevel) => `${new Date().toISOString()} | ${level.toUpperCase()} | ${tag}`;

  return {
    debug: (message, ...details) => { if (enabled('debug')) console.debug(prefix('debug'), message, ...details); },
    info: (message, ...details) => { if (enabled('info')) console.log(prefix('info'), message, ...details); },
    warn: (message, ...details) => { if (enabled('warn')) console.warn(prefix('warn'), message, ...details); },
    error: (message, ...details) => { if (enabled('error')) console.error(prefix('error'), message, ...details); },
  };
}

/** Shortens user text before it reaches the log. */
export function preview(text: string, max = 50): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
