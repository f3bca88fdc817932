// pattern: Imperative Shell

import { type Level as LogLevel, type Logger, pino } from "pino";

import { createLogger, mapLogLevelToPinoLevel } from "./config.js";
import { type LogFormat } from "./types.js";

// Global logger instance
let LOGGER: Logger | undefined;

// Initialize logger with format and interactive preferences
export function initializeLogger(
  format: LogFormat,
  nonInteractive: boolean
): void {
  LOGGER = createLogger(format, nonInteractive);
}

// Set the log level on the global logger
export function setCliLogLevel(logLevel: LogLevel): void {
  if (!LOGGER) {
    throw new Error("Logger not initialized. Call initializeLogger() first.");
  }
  LOGGER.level = mapLogLevelToPinoLevel(logLevel);
}

function currentLogger(): Logger {
  if (!LOGGER) {
    throw new Error("Logger not initialized. Call initializeLogger() first.");
  }
  return LOGGER;
}

// Always refers to the current logger instance, so modules can import it before initialization
export const CLI_LOGGER = new Proxy(pino({ enabled: false }), {
  get(_target, prop, _receiver) {
    const logger = currentLogger();
    const value: unknown = Reflect.get(logger, prop, logger);
    if (typeof value === "function") {
      return value.bind(logger);
    }
    return value;
  },
  set(_target, prop, value, _receiver) {
    return Reflect.set(currentLogger(), prop, value);
  },
});
