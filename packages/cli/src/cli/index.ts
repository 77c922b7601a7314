// pattern: Imperative Shell

import { Command, InvalidArgumentError, Option } from "@commander-js/extra-typings";

import {
  LOG_FORMATS,
  LOG_LEVELS,
  type LogFormat,
  type LogLevel,
} from "../logger/index.js";

import { CLI_LOGGER, initializeLogger, setCliLogLevel } from "./_deps.js";
import { setInventoryPath, setNonInteractive } from "./_globals.js";
import { makeBootstrapCommand } from "./bootstrap.js";
import { makeDiagnoseCommand } from "./diagnose.js";
import { makeHostsCommand } from "./hosts.js";
import { makeDownloadCommand, makeUploadCommand } from "./transfer.js";

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

function isLogFormat(value: string): value is LogFormat {
  return LOG_FORMATS.some(format => format === value);
}

function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError(
      `Invalid log level: ${value}. Valid levels are: ${LOG_LEVELS.join(", ")}`
    );
  }
  return value;
}

function parseLogFormat(value: string): LogFormat {
  if (!isLogFormat(value)) {
    throw new InvalidArgumentError(
      `Invalid log format: ${value}. Valid formats are: ${LOG_FORMATS.join(", ")}`
    );
  }
  return value;
}

// Determine defaults based on environment
export function getDefaultLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const envLevel = env["EDGEPROBE_LOG_LEVEL"];
  return envLevel && isLogLevel(envLevel) ? envLevel : "info";
}

export function detectNonInteractive(env: NodeJS.ProcessEnv = process.env): boolean {
  return !process.stdout.isTTY || env["EDGEPROBE_NON_INTERACTIVE"] === "1";
}

export function getDefaultLogFormat(): LogFormat {
  return detectNonInteractive() ? "json" : "nice";
}

// Define the root command
export const rootCommand = new Command("edgeprobe")
  .version("0.1.0")
  .description("Health checks for edge devices over SSH")
  .addOption(
    new Option("-l, --log-level <level>", "Set log level")
      .choices(LOG_LEVELS)
      .default(getDefaultLogLevel())
      .argParser(parseLogLevel)
  )
  .addOption(
    new Option("--non-interactive", "Disable colours and other terminal features").default(
      detectNonInteractive()
    )
  )
  .addOption(
    new Option("-f, --format <format>", "Log output format")
      .choices(LOG_FORMATS)
      .default(getDefaultLogFormat())
      .argParser(parseLogFormat)
  )
  .addOption(
    new Option(
      "-i, --inventory <path>",
      "Inventory file (default: $EDGEPROBE_INVENTORY or ./inventory.yaml)"
    )
  )
  .hook("preAction", thisCommand => {
    // Configure CLI_LOGGER and inventory location before any action runs
    const { logLevel, format, nonInteractive, inventory } = thisCommand.opts();

    initializeLogger(format, nonInteractive);
    setCliLogLevel(logLevel);
    setNonInteractive(nonInteractive);
    CLI_LOGGER.debug(
      `Log level configured to: ${logLevel}, format: ${format}, non-interactive: ${nonInteractive}`
    );

    setInventoryPath(inventory);
    if (inventory) {
      CLI_LOGGER.debug(`Inventory override: ${inventory}`);
    }
  })
  .addCommand(makeDiagnoseCommand())
  .addCommand(makeBootstrapCommand())
  .addCommand(makeUploadCommand())
  .addCommand(makeDownloadCommand())
  .addCommand(makeHostsCommand());
