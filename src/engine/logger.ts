export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(scope: string): Logger;
}

const levelRank: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function createConsoleLogger(scope = "engine", minLevel: LogLevel = "info"): Logger {
  const write = (level: LogLevel, message: string, context?: Record<string, unknown>) => {
    if (levelRank[level] < levelRank[minLevel]) {
      return;
    }
    const line = `[${scope}] ${message}`;
    const sink = level === "error" ? console.error : level === "warn" ? console.warn : level === "debug" ? console.debug : console.log;
    if (context && Object.keys(context).length > 0) {
      sink(line, context);
    } else {
      sink(line);
    }
  };

  return {
    debug: (message, context) => write("debug", message, context),
    info: (message, context) => write("info", message, context),
    warn: (message, context) => write("warn", message, context),
    error: (message, context) => write("error", message, context),
    child: (child) => createConsoleLogger(`${scope}:${child}`, minLevel),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};

export function describeError(error: unknown): string {
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}
