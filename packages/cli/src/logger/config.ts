// pattern: Functional Core

import {
  destination as pinoDestination,
  type Level,
  type LevelWithSilent,
  type Logger,
  type LoggerOptions,
  pino,
  stdSerializers,
} from "pino";

import createRenderer from "./renderer.js";
import { type LogFormat } from "./types.js";

// Map our LogLevel enum to pino's string levels
export function mapLogLevelToPinoLevel(logLevel: Level): LevelWithSilent {
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

function isErrorLike(
  value: unknown
): value is { message?: unknown; stack?: unknown } {
  return typeof value === "object" && value !== null;
}

// Create pino logger with stream configuration
export function createLogger(
  format: LogFormat,
  nonInteractive: boolean,
  destination: NodeJS.WritableStream = process.stderr
): Logger {
  const baseConfig: LoggerOptions = {
    name: "sealcheck",
    level: "info", // Default level
    serializers: {
      err: (err: unknown) => {
        if (!isErrorLike(err)) return err;

        if (format === "nice" && !nonInteractive) {
          return {
            message: typeof err.message === "string" ? err.message : undefined,
            stack:
              typeof err.stack === "string"
                ? err.stack.split("\n").slice(1, 9)
                : undefined,
          };
        }

        if (err instanceof Error) {
          return stdSerializers.err(err);
        }
        return err;
      },
    },
  };

  if (format === "nice") {
    // Render pino's JSON lines into coloured text before they hit the terminal
    const renderer = createRenderer({ colorize: !nonInteractive });
    renderer.pipe(destination);
    return pino(baseConfig, renderer);
  }

  // JSON lines go straight to stderr, or to the given stream
  return pino(
    baseConfig,
    destination === process.stderr ? pinoDestination(2) : destination
  );
}
