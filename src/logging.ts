import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";

export type { Logger } from "pino";

export interface CreateLoggerOptions {
  level?: string;
  destination?: DestinationStream;
}

// Structured logger shared by the session core, the guardian and the tool layer.
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const loggerOptions: LoggerOptions = {
    level: options.level ?? process.env.LOG_LEVEL ?? "info",
    base: {
      service: "sheethost",
    },
  };

  return options.destination ? pino(loggerOptions, options.destination) : pino(loggerOptions);
}

// stdout belongs to the MCP transport, so server logs go to stderr.
export function createStderrLogger(level?: string): Logger {
  return createLogger({ level, destination: pino.destination(2) });
}

// Logger that drops everything; used where no logger is injected.
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
