// pattern: Functional Core

import { Transform, type TransformCallback } from "node:stream";

import chalk, { Chalk, type ChalkInstance } from "chalk";

// Pino log object interface
interface PinoLogObject {
  level: number;
  time?: number;
  pid?: number;
  hostname?: string;
  msg?: string;
  [key: string]: unknown;
}

export interface RendererOptions {
  colorize?: boolean;
}

function isPinoLogObject(value: unknown): value is PinoLogObject {
  return (
    typeof value === "object" &&
    value !== null &&
    "level" in value &&
    typeof value.level === "number"
  );
}

// Format error object with stack trace
function formatErrorObject(err: unknown, paint: ChalkInstance): string {
  if (!err || typeof err !== "object") {
    return "";
  }

  const lines: string[] = [];

  if ("message" in err && typeof err.message === "string") {
    lines.push(paint.yellow(`    ${err.message}`));
  }

  // Stack arrives pre-split by the serializer, or as a raw string from pino
  let stackLines: string[] = [];
  if ("stack" in err) {
    if (Array.isArray(err.stack)) {
      stackLines = err.stack.filter(
        (line): line is string => typeof line === "string"
      );
    } else if (typeof err.stack === "string") {
      stackLines = err.stack.split("\n").slice(1, 9);
    }
  }

  for (const line of stackLines) {
    const trimmedLine = line.trim();
    if (trimmedLine) {
      lines.push(paint.dim(paint.yellow(`        ${trimmedLine}`)));
    }
  }

  return lines.length > 0 ? `\n${lines.join("\n")}` : "";
}

// Format a single log object to a nice string
export function formatLogObject(
  logObj: PinoLogObject,
  paint: ChalkInstance = chalk
): string {
  const { level, msg, err, target } = logObj;
  const extra: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(logObj)) {
    if (
      ![
        "level",
        "time",
        "msg",
        "pid",
        "hostname",
        "name",
        "err",
        "target",
      ].includes(key)
    ) {
      extra[key] = value;
    }
  }

  let levelDisplay: string;
  let msgColor: ChalkInstance = paint.reset;

  switch (level) {
    case 10: // trace
      levelDisplay = paint.green("+");
      break;
    case 20: // debug
      levelDisplay = paint.cyan("=");
      break;
    case 30: // info
      levelDisplay = paint.gray(">");
      break;
    case 40: // warn
      levelDisplay = paint.yellowBright("W");
      msgColor = paint.yellow;
      break;
    case 50: // error
      levelDisplay = paint.inverse.red("E");
      msgColor = paint.red;
      break;
    case 60: // fatal
      levelDisplay = paint.inverse.redBright("E");
      msgColor = paint.red;
      break;
    default:
      levelDisplay = paint.gray("  LOG  ");
  }

  const targetTag =
    typeof target === "string" ? `${paint.magenta(`[${target}]`)} ` : "";
  const formattedMsg = msgColor(msg ?? "");
  const errorStr = err ? formatErrorObject(err, paint) : "";
  const extraStr =
    Object.keys(extra).length > 0 ? ` ${paint.dim(JSON.stringify(extra))}` : "";

  return `${levelDisplay} ${targetTag}${formattedMsg}${extraStr}${errorStr}\n`;
}

// Create a pretty renderer stream like pino-pretty
export default function createRenderer(options: RendererOptions = {}): Transform {
  const paint = new Chalk({
    level: options.colorize === false ? 0 : chalk.level,
  });

  return new Transform({
    objectMode: false, // Pino sends newline-delimited JSON strings, not objects
    transform(chunk: Buffer | string, _encoding: BufferEncoding, callback: TransformCallback) {
      const lines = chunk.toString().split("\n");
      const formattedLines: string[] = [];

      for (const line of lines) {
        if (!line.trim()) continue;
        try {
          const parsed: unknown = JSON.parse(line);
          formattedLines.push(
            isPinoLogObject(parsed) ? formatLogObject(parsed, paint) : `${line}\n`
          );
        } catch {
          // If we can't parse a line, pass it through as-is
          formattedLines.push(`${line}\n`);
        }
      }

      callback(null, formattedLines.join(""));
    },
  });
}
