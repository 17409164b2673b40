import pino, {
  type DestinationStream,
  type Logger,
  type LoggerOptions,
} from "pino";
import { logLevelFromEnv, type LogLevel } from "./config.ts";

export interface CreateLoggerOptions {
  level?: LogLevel;
  destination?: DestinationStream;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const loggerOptions: LoggerOptions = {
    level: options.level ?? logLevelFromEnv() ?? "warn",
    base: {
      name: "lp-builder",
    },
  };
  return options.destination
    ? pino(loggerOptions, options.destination)
    : pino(loggerOptions);
}

let shared: Logger | undefined;

/** logger used by models that were created without one */
export function defaultLogger(): Logger {
  shared ??= createLogger();
  return shared;
}
