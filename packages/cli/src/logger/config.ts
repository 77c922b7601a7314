// pattern: Functional Core

import pino, {
  type DestinationStream,
  type LevelWithSilent,
  type Logger,
  type LoggerOptions,
} from "pino";

import createRenderer from "./renderer.js";

import type { LogFormat, LogLevel } from "./types.js";

// Map our LogLevel values to pino's string levels
export function mapLogLevelToPinoLevel(logLevel: LogLevel): LevelWithSilent {
  switch (logLevel) {
    case "error":
      return "error";
    case "warn":
      return "warn";
    case "info":
      return "info";
    case "debug":
      return "debug";
    case "trace":
      return "trace";
    default:
      return "info";
  }
}

interface SerializedError {
  message?: string;
  stack?: string[];
}

/**
 * The nice renderer prints message and a trimmed stack itself; every other
 * output gets pino's standard error shape.
 */
export function createErrorSerializer(
  format: LogFormat,
  nonInteractive: boolean
): (err: unknown) => unknown {
  return err => {
    if (!(err instanceof Error)) return err;

    if (format === "nice" && !nonInteractive) {
      const serialized: SerializedError = { message: err.message };
      if (err.stack) {
        serialized.stack = err.stack.split("\n").slice(1, 9);
      }
      return serialized;
    }

    return pino.stdSerializers.err(err);
  };
}

// Create pino logger with stream configuration
export function createLogger(format: LogFormat, nonInteractive: boolean): Logger {
  const baseConfig: LoggerOptions = {
    name: "edgeprobe",
    level: "info",
    serializers: {
      err: createErrorSerializer(format, nonInteractive),
    },
  };

  let stream: DestinationStream;
  if (format === "nice") {
    const renderer = createRenderer({ colorize: !nonInteractive });
    renderer.pipe(process.stderr);
    stream = renderer;
  } else {
    stream = pino.destination(2); // stderr
  }

  return pino(baseConfig, stream);
}
