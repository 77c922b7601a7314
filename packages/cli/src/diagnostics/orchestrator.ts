// pattern: Imperative Shell
// Per-target diagnostic run: connect, run categories in order, release, aggregate

import { SessionBootstrap } from "../ssh/session-bootstrap.js";
import { createCommand } from "../utils/command/index.js";
import {
  CommandExecutionError,
  ConnectionError,
  getErrorMessage,
} from "../utils/errors.js";

import { checkResult } from "./classify.js";
import { createDefaultRegistry, resolveCategories, type CheckRegistry } from "./registry.js";

import type { KeyPairGenerator } from "../ssh/credential-bootstrap.js";
import type { BootstrapResult } from "../ssh/session-bootstrap.js";
import type { SshConnector, SshTimeouts } from "../ssh/types.js";
import type {
  CheckCategory,
  CheckResult,
  HostTarget,
  LocalRunner,
  Probe,
  ProbeContext,
  RunOutcome,
  RunPhase,
} from "./types.js";
import type { Logger } from "pino";

export const CONNECTION_CHECK_NAME = "SSH Connection";

export type ResultSection = CheckCategory | "connection";

export interface RunDiagnosticsOptions {
  connector: SshConnector;
  logger: Logger;
  verbose?: boolean;
  registry?: CheckRegistry;
  timeouts?: SshTimeouts;
  runLocal?: LocalRunner;
  generateKeyPair?: KeyPairGenerator;
  onTransition?: (state: RunPhase) => void;
  onResult?: (result: CheckResult, section: ResultSection) => void;
}

export function createLocalRunner(logger: Logger): LocalRunner {
  return (command, args, timeoutMs) =>
    createCommand(command, logger).addArgs(args).timeout(timeoutMs).run();
}

/**
 * Log map key for a check, e.g. "Container: web" -> "container_web"
 */
export function logKeyFor(checkName: string): string {
  const separator = checkName.indexOf(": ");
  if (separator === -1) {
    return checkName.toLowerCase().replace(/[^a-z0-9]+/g, "_");
  }
  const kind = checkName.slice(0, separator).toLowerCase();
  const subject = checkName.slice(separator + 2);
  return `${kind}_${subject.replace(/[/\\\s]+/g, "_")}`;
}

function finalize(
  target: string,
  results: readonly CheckResult[],
  bootstrapMessages: readonly string[]
): RunOutcome {
  const logs: Record<string, string> = {};
  for (const result of results) {
    if (result.status !== "ok" && result.logs) {
      logs[logKeyFor(result.checkName)] = result.logs;
    }
  }

  return Object.freeze({
    target,
    results: Object.freeze([...results]),
    overallSuccess: !results.some(result => result.status === "fail"),
    logs: Object.freeze(logs),
    bootstrapMessages: Object.freeze([...bootstrapMessages]),
  });
}

/**
 * Run one probe in isolation. Anything it throws becomes a `warn` result.
 */
async function runProbe(
  probe: Probe,
  context: ProbeContext,
  logger: Logger
): Promise<readonly CheckResult[]> {
  try {
    return await probe.run(context);
  } catch (error) {
    if (error instanceof CommandExecutionError) {
      logger.warn(
        { probe: probe.name, completed: error.completed.length },
        "Session failed during probe"
      );
    } else {
      logger.warn({ probe: probe.name, err: error }, "Probe raised an error");
    }
    return [checkResult(probe.name, "warn", getErrorMessage(error))];
  }
}

/**
 * Diagnose one host.
 *
 * Connecting -> Running(category)... -> Finished. A failed connection goes
 * straight to Finished with a single failing "SSH Connection" result. The
 * session is released on every path once it exists. Severities are taken
 * from the probes as-is; the run succeeds iff no result is `fail`.
 */
export async function runDiagnostics(
  host: HostTarget,
  categories: readonly CheckCategory[],
  options: RunDiagnosticsOptions
): Promise<RunOutcome> {
  const logger = options.logger.child({ target: host.name });
  const registry = options.registry ?? createDefaultRegistry();
  const results: CheckResult[] = [];

  const transition = (state: RunPhase): void => {
    logger.debug(state, "Diagnostic state change");
    options.onTransition?.(state);
  };

  const record = (result: CheckResult, section: ResultSection): void => {
    const frozen = Object.freeze({ ...result });
    results.push(frozen);
    options.onResult?.(frozen, section);
  };

  transition({ phase: "connecting" });

  let session: BootstrapResult;
  try {
    session = await new SessionBootstrap(host.connection, {
      connector: options.connector,
      logger,
      ...(options.timeouts && { timeouts: options.timeouts }),
      ...(options.generateKeyPair && { generateKeyPair: options.generateKeyPair }),
    }).connect();
  } catch (error) {
    record(
      checkResult(CONNECTION_CHECK_NAME, "fail", getErrorMessage(error)),
      "connection"
    );
    transition({ phase: "finished" });
    return finalize(
      host.name,
      results,
      error instanceof ConnectionError ? error.attempts : []
    );
  }

  record(checkResult(CONNECTION_CHECK_NAME, "ok", "Connected"), "connection");

  const context: ProbeContext = {
    shell: session.channel,
    host,
    verbose: options.verbose ?? false,
    logger,
    runLocal: options.runLocal ?? createLocalRunner(logger),
  };

  try {
    for (const category of resolveCategories(categories)) {
      transition({ phase: "running", category });
      for (const probe of registry.forCategory(category)) {
        for (const result of await runProbe(probe, context, logger)) {
          record(result, category);
        }
      }
    }
  } finally {
    try {
      transition({ phase: "finished" });
    } finally {
      session.channel.close();
    }
  }

  return finalize(host.name, results, session.messages);
}
