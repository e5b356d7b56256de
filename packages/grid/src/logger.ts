import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";

export type { Logger } from "pino";

export interface CreateGridLoggerOptions {
  level?: string;
  destination?: DestinationStream;
}

export function createGridLogger(options: CreateGridLoggerOptions = {}): Logger {
  const loggerOptions: LoggerOptions = {
    level: options.level ?? process.env.LOG_LEVEL ?? "warn",
    base: {
      component: "row-window"
    }
  };

  return options.destination ? pino(loggerOptions, options.destination) : pino(loggerOptions);
}
