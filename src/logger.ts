export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let threshold: LogLevel = "info";

export function setLogLevel(level: LogLevel) {
  threshold = level;
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

/**
 * Console logger that prefixes every line with a bracketed tag,
 * e.g. `[CHARGER] Charging started`.
 */
export function createLogger(tag: string): Logger {
  const enabled = (level: LogLevel) =>
    LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];

  return {
    debug: (message, ...details) => {
      if (enabled("debug")) console.debug(`[${tag}] ${message}`, ...details);
    },
    info: (message, ...details) => {
      if (enabled("info")) console.log(`[${tag}] ${message}`, ...details);
    },
    warn: (message, ...details) => {
      if (enabled("warn")) console.warn(`[${tag}] ${message}`, ...details);
    },
    error: (message, ...details) => {
      if (enabled("error")) console.error(`[${tag}] ${message}`, ...details);
    },
  };
}
