// pattern: Imperative Shell

import { createLogger, mapLogLevelToPinoLevel } from "./config.js";

import type { LogFormat, LogLevel } from "./types.js";
import type { Logger } from "pino";

// Global logger instance
let LOGGER: Logger | undefined;

// Initialize logger with format and interactive preferences
export function initializeLogger(format: LogFormat, nonInteractive: boolean): void {
  LOGGER = createLogger(format, nonInteractive);
}

// Set the log level on the global logger
export function setCliLogLevel(logLevel: LogLevel): void {
  if (!LOGGER) {
    throw new Error("Logger not initialized. Call initializeLogger() first.");
  }
  LOGGER.level = mapLogLevelToPinoLevel(logLevel);
}

// Direct access for code that hands the logger to library functions
export function getCliLogger(): Logger {
  if (!LOGGER) {
    throw new Error("Logger not initialized. Call initializeLogger() first.");
  }
  return LOGGER;
}

// Create a proxy object that always refers to the current logger instance
export const CLI_LOGGER = new Proxy({} as Logger, {
  get(_target, prop) {
    const logger = getCliLogger();
    const value: unknown = Reflect.get(logger, prop);
    if (typeof value === "function") {
      return value.bind(logger);
    }
    return value;
  },
});
