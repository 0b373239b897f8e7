export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

let threshold: LogLevel = "info";

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
  const write = (level: LogLevel, message: string, details: unknown[]) => {
    if (LEVELS[level] < LEVELS[threshold]) {
      return;
    }
    const line = `[${scope}] ${message}`;
    if (level === "error") {
      console.error(line, ...details);
    } else if (level === "warn") {
      console.warn(line, ...details);
    } else {
      console.log(line, ...details);
    }
  };

  return {
    debug: (message, ...details) => write("debug", message, details),
    info: (message, ...details) => write("info", message, details),
    warn: (message, ...details) => write("warn", message, details),
    error: (message, ...details) => write("error", message, details)
  };
}
