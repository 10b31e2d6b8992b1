export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  readonly verbose?: boolean;
  readonly quiet?: boolean;
  readonly write?: (line: string) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Logger writing `[LEVEL] message` lines to stderr. `quiet` keeps warnings
 * and errors only, `verbose` adds debug output.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold: LogLevel = options.quiet
    ? "warn"
    : options.verbose
      ? "debug"
      : "info";
  const write =
    options.write ??
    ((line: string): void => {
      process.stderr.write(line);
    });

  const log = (level: LogLevel, message: string): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) {
      return;
    }
    write(`[${level.toUpperCase()}] ${message}\n`);
  };

  return {
    debug: (message) => log("debug", message),
    info: (message) => log("info", message),
    warn: (message) => log("warn", message),
    error: (message) => log("error", message),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
