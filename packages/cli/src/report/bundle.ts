// pattern: Imperative Shell
// Writes the per-host report bundle

import { mkdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { bundleTimestamp, formatReport, formatSupportMessage } from "./format.js";

import type { RunOutcome } from "../diagnostics/types.js";

export const DEFAULT_REPORT_DIR = "reports";

/**
 * Restrict a name to something safe to use as a single path segment
 */
export function safePathSegment(name: string): string {
  const cleaned = name.replace(/[^A-Za-z0-9._@-]/g, "_");
  return cleaned === "" || cleaned === "." || cleaned === ".." ? "_" : cleaned;
}

/**
 * Replace any earlier bundles for the host with a fresh one at
 * `<reportDir>/<host>/<timestamp>/`, returning that directory.
 */
export async function writeReportBundle(
  reportDir: string,
  outcome: RunOutcome,
  now: Date = new Date()
): Promise<string> {
  const hostDir = join(reportDir, safePathSegment(outcome.target));
  await rm(hostDir, { recursive: true, force: true });

  const bundleDir = join(hostDir, bundleTimestamp(now));
  await mkdir(bundleDir, { recursive: true });

  await writeFile(
    join(bundleDir, "report.txt"),
    formatReport(outcome.target, outcome.results, now)
  );

  for (const [name, content] of Object.entries(outcome.logs)) {
    if (content) {
      await writeFile(join(bundleDir, `${safePathSegment(name)}.log`), content);
    }
  }

  await writeFile(
    join(bundleDir, "support_message.txt"),
    formatSupportMessage(outcome.target, outcome.results, bundleDir, now)
  );

  return bundleDir;
}
