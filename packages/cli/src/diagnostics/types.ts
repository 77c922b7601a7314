// pattern: Functional Core
// Types for diagnostic runs, probes and their results

import type { RemoteShell, SshTarget } from "../ssh/types.js";
import type { LocalCommandResult } from "../utils/command/index.js";
import type { Logger } from "pino";

/** Fixed execution order of categories */
export const CHECK_CATEGORIES = [
  "system",
  "network",
  "services",
  "devices",
] as const;

export type CheckCategory = (typeof CHECK_CATEGORIES)[number];

export const CHECK_STATUSES = ["ok", "warn", "fail"] as const;

export type CheckStatus = (typeof CHECK_STATUSES)[number];

export interface CheckResult {
  readonly checkName: string;
  readonly status: CheckStatus;
  readonly message: string;
  /** Recent log lines, only collected for problems */
  readonly logs?: string;
  /** Extra detail for verbose output */
  readonly detail?: string;
}

export interface RunOutcome {
  readonly target: string;
  readonly results: readonly CheckResult[];
  /** true iff no result has status `fail` */
  readonly overallSuccess: boolean;
  /** Log blobs of non-ok results, keyed like `container_web` */
  readonly logs: Readonly<Record<string, string>>;
  readonly bootstrapMessages: readonly string[];
}

export interface UsbDeviceSpec {
  /** four lowercase hex digits */
  vendorId: string;
  productId: string;
}

/**
 * One inventory host: how to reach it and what to expect on it
 */
export interface HostTarget {
  name: string;
  connection: SshTarget;
  composeDir?: string;
  systemdServices: readonly string[];
  devices: readonly (UsbDeviceSpec & { name: string })[];
}

export type LocalRunner = (
  command: string,
  args: readonly string[],
  timeoutMs: number
) => Promise<LocalCommandResult>;

export interface ProbeContext {
  shell: RemoteShell;
  host: HostTarget;
  verbose: boolean;
  logger: Logger;
  /** Runs commands on the operator's machine rather than the target */
  runLocal: LocalRunner;
}

/**
 * A named diagnostic routine. Probes decide their own severity and must not
 * throw for unexpected output; they report `warn` instead.
 */
export interface Probe {
  readonly name: string;
  readonly category: CheckCategory;
  run(context: ProbeContext): Promise<readonly CheckResult[]>;
}

export type RunPhase =
  | { phase: "connecting" }
  | { phase: "running"; category: CheckCategory }
  | { phase: "finished" };
