export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

let currentLevel: LogLevel = 'info';

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

// Fonctions de logging avec horodatage
export function debugLog(...args: unknown[]): void {
  if (enabled('debug')) {
    console.log(new Date().toISOString(), '-', ...args);
  }
}

export function infoLog(...args: unknown[]): void {
  if (enabled('info')) {
    console.info(new Date().toISOString(), '-', ...args);
  }
}

export function warnLog(...args: unknown[]): void {
  if (enabled('warn')) {
    console.warn(new Date().toISOString(), '- WARN:', ...args);
  }
}

export function errorLog(...args: unknown[]): void {
  if (enabled('error')) {
    console.error(new Date().toISOString(), '- ERROR:', ...args);
  }
}

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  child(scope: string): Logger;
}

/**
 * Logger préfixé par un scope, par exemple `[extract]` ou `[req 1a2b]`.
 */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug: (...args) => debugLog(prefix, ...args),
    info: (...args) => infoLog(prefix, ...args),
    warn: (...args) => warnLog(prefix, ...args),
    error: (...args) => errorLog(prefix, ...args),
    child: (childScope) => createLogger(`${scope}:${childScope}`)
  };
}
