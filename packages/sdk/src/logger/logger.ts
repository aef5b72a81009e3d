const LOG_LEVELS = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
} as const;

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogLevelConfig = LogLevel | "silent";

export interface Logger {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
}

/** Writes `[Botwire LEVEL] msg` lines to stderr at or above `level`. */
export function createLogger(level: LogLevelConfig): Logger {
  const threshold = LOG_LEVELS[level];

  function write(logLevel: LogLevel, msg: string): void {
    if (LOG_LEVELS[logLevel] >= threshold) {
      process.stderr.write(`[Botwire ${logLevel.toUpperCase()}] ${msg}\n`);
    }
  }

  return {
    debug: (msg) => write("debug", msg),
    info: (msg) => write("info", msg),
    warn: (msg) => write("warn", msg),
    error: (msg) => write("error", msg),
  };
}
