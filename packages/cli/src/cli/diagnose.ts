// pattern: Imperative Shell
// CLI command that runs health checks against inventory hosts

import {
  Command,
  InvalidArgumentError,
  Option,
} from "@commander-js/extra-typings";
import chalk, { Chalk, type ChalkInstance } from "chalk";

import { selectHosts, type Inventory } from "../config/loaders/inventory-loader.js";
import { sshTimeoutsFromEnv } from "../config/loaders/timeouts.js";
import { runDiagnostics } from "../diagnostics/orchestrator.js";
import { isCheckCategory, type CheckRegistry } from "../diagnostics/registry.js";
import { CHECK_CATEGORIES } from "../diagnostics/types.js";
import { writeReportBundle, DEFAULT_REPORT_DIR } from "../report/bundle.js";
import {
  hostHeader,
  hostsTable,
  resultLines,
  sectionHeader,
  summaryLines,
} from "../report/console.js";
import { createSsh2Connector } from "../ssh/ssh2-transport.js";
import { mapWithConcurrency } from "../utils/concurrency.js";
import { getErrorMessage } from "../utils/errors.js";

import { withInventoryAndErrorHandling } from "./_utils/with-inventory.js";
import { CLI_LOGGER } from "./_deps.js";
import { isNonInteractive } from "./_globals.js";

import type { KeyPairGenerator } from "../ssh/credential-bootstrap.js";
import type { SshConnector, SshTimeouts } from "../ssh/types.js";
import type {
  CheckCategory,
  CheckResult,
  HostTarget,
  LocalRunner,
  RunOutcome,
} from "../diagnostics/types.js";
import type { Logger } from "pino";

export interface DiagnoseSettings {
  categories: readonly CheckCategory[];
  verbose: boolean;
  json: boolean;
  /** Where report bundles go; undefined skips writing them */
  reportDir: string | undefined;
  concurrency: number;
}

export interface DiagnoseDeps {
  connector: SshConnector;
  logger: Logger;
  /** Receives complete chunks of stdout text */
  write: (text: string) => void;
  paint: ChalkInstance;
  timeouts?: SshTimeouts;
  runLocal?: LocalRunner;
  registry?: CheckRegistry;
  generateKeyPair?: KeyPairGenerator;
  now?: () => Date;
}

export interface HostReport {
  outcome: RunOutcome;
  bundleDir: string | undefined;
}

function parseConcurrency(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

function toJson(reports: readonly HostReport[]): string {
  return JSON.stringify(
    reports.map(({ outcome, bundleDir }) => ({
      host: outcome.target,
      success: outcome.overallSuccess,
      results: outcome.results,
      logs: outcome.logs,
      bootstrapMessages: outcome.bootstrapMessages,
      report: bundleDir ?? null,
    })),
    null,
    2
  );
}

/**
 * Diagnose each host and print what was found.
 *
 * With a concurrency of 1 output streams as checks finish. With more, each
 * host's output is held back and printed in one piece when that host is done,
 * so hosts never interleave. JSON mode prints a single document at the end.
 */
export async function executeDiagnose(
  hosts: readonly HostTarget[],
  settings: DiagnoseSettings,
  deps: DiagnoseDeps
): Promise<HostReport[]> {
  const { paint } = deps;
  const now = deps.now ?? ((): Date => new Date());
  const live = settings.concurrency === 1;

  const diagnoseHost = async (host: HostTarget): Promise<HostReport> => {
    const buffered: string[] = [];
    const emit = (lines: readonly string[]): void => {
      if (settings.json) return;
      if (live) {
        deps.write(`${lines.join("\n")}\n`);
      } else {
        buffered.push(...lines);
      }
    };

    emit(hostHeader(host.name, host.connection.address));

    const outcome = await runDiagnostics(host, settings.categories, {
      connector: deps.connector,
      logger: deps.logger,
      verbose: settings.verbose,
      ...(deps.timeouts && { timeouts: deps.timeouts }),
      ...(deps.runLocal && { runLocal: deps.runLocal }),
      ...(deps.registry && { registry: deps.registry }),
      ...(deps.generateKeyPair && { generateKeyPair: deps.generateKeyPair }),
      onTransition: state => {
        if (state.phase === "running") {
          emit(sectionHeader(state.category));
        }
      },
      onResult: (result: CheckResult) => {
        emit(resultLines(result, paint, settings.verbose));
      },
    });

    if (settings.verbose) {
      emit(outcome.bootstrapMessages.map(message => paint.dim(`    ${message}`)));
    }
    emit(summaryLines(outcome, paint));

    let bundleDir: string | undefined;
    if (settings.reportDir !== undefined) {
      try {
        bundleDir = await writeReportBundle(settings.reportDir, outcome, now());
        emit(["", `    Report saved to: ${bundleDir}`]);
      } catch (error) {
        // reported per host; the other hosts still print
        deps.logger.warn(
          { err: error, host: host.name, reportDir: settings.reportDir },
          "Could not save report bundle"
        );
        emit(["", `    Could not save report: ${getErrorMessage(error)}`]);
      }
    }

    if (!live && buffered.length > 0) {
      deps.write(`${buffered.join("\n")}\n`);
    }

    return { outcome, bundleDir };
  };

  const reports = await mapWithConcurrency(hosts, settings.concurrency, diagnoseHost);

  if (settings.json) {
    deps.write(`${toJson(reports)}\n`);
  } else if (reports.length > 1) {
    deps.write(
      `\n${hostsTable(
        reports.map(report => report.outcome),
        paint.level > 0
      )}\n`
    );
  }

  return reports;
}

/**
 * Create the 'edgeprobe diagnose' command
 */
// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function makeDiagnoseCommand() {
  return new Command("diagnose")
    .description("Run health checks against one or more inventory hosts")
    .addHelpText(
      "before",
      `
Connects to each host over SSH and checks system health, network, services
and connected USB devices. When no key login works yet, the configured
password is used once and an SSH key is installed for next time.
      `
    )
    .addHelpText(
      "after",
      `
Examples:
  edgeprobe diagnose --host gateway-1              Check everything
  edgeprobe diagnose --host gateway-1 -c services  Only containers and services
  edgeprobe diagnose --host a b --concurrency 2    Two hosts at once
  edgeprobe diagnose --host gateway-1 --json       Machine-readable results
      `
    )
    .addOption(
      new Option("--host <name...>", "Inventory host(s) to check").makeOptionMandatory()
    )
    .addOption(
      new Option("-c, --check <category...>", "Only run these categories").choices(
        CHECK_CATEGORIES
      )
    )
    .option("-v, --verbose", "Show detail for every check", false)
    .option("--json", "Print results as JSON", false)
    .option("--report-dir <dir>", "Directory for report bundles", DEFAULT_REPORT_DIR)
    .option("--no-report", "Do not write report bundles")
    .option(
      "--concurrency <n>",
      "Number of hosts to check at the same time",
      parseConcurrency,
      1
    )
    .action(options =>
      withInventoryAndErrorHandling(async (inventory: Inventory) => {
        const hosts = selectHosts(inventory, options.host);
        const categories = (options.check ?? []).filter(isCheckCategory);

        const nonInteractive = isNonInteractive();
        const reports = await executeDiagnose(
          hosts,
          {
            categories,
            verbose: options.verbose,
            json: options.json,
            reportDir: options.report ? options.reportDir : undefined,
            concurrency: options.concurrency,
          },
          {
            connector: createSsh2Connector(CLI_LOGGER),
            logger: CLI_LOGGER,
            write: text => process.stdout.write(text),
            paint: new Chalk({ level: nonInteractive ? 0 : chalk.level }),
            timeouts: sshTimeoutsFromEnv(),
          }
        );

        const failed = reports.filter(report => !report.outcome.overallSuccess);
        if (failed.length > 0) {
          CLI_LOGGER.debug(
            `Hosts with problems: ${failed.map(report => report.outcome.target).join(", ")}`
          );
          process.exitCode = 1;
        }
      })()
    );
}
