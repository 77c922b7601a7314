// pattern: Functional Core
// Terminal rendering of diagnostic results

import Table from "cli-table3";

import {
  countByStatus,
  friendlyFixForMessage,
  friendlyMessage,
  friendlyName,
} from "./friendly.js";

import type { ResultSection } from "../diagnostics/orchestrator.js";
import type { CheckResult, RunOutcome } from "../diagnostics/types.js";
import type { ChalkInstance } from "chalk";

export const SECTION_TITLES: Readonly<Record<ResultSection, string>> = {
  connection: "Connection",
  system: "System Health",
  network: "Network",
  services: "Applications & Services",
  devices: "Connected Devices",
};

const BOX_WIDTH = 63;

export function hostHeader(hostName: string, address: string): string[] {
  return [
    "",
    `╔${"═".repeat(BOX_WIDTH)}╗`,
    `║${`Checking: ${hostName}`.padEnd(BOX_WIDTH)}║`,
    `╚${"═".repeat(BOX_WIDTH)}╝`,
    `    Connecting to ${address}...`,
  ];
}

export function sectionHeader(section: ResultSection): string[] {
  return ["", `  ${SECTION_TITLES[section]}`, `  ${"─".repeat(40)}`];
}

/**
 * One result as printed while the run is in progress. Problems get a hint;
 * `verbose` adds the probe's detail line.
 */
export function resultLines(
  result: CheckResult,
  paint: ChalkInstance,
  verbose: boolean
): string[] {
  const [headline = "", ...rest] = result.message.split("\n");
  const lines: string[] = [];

  switch (result.status) {
    case "ok":
      lines.push(paint.green(`    ✅ ${headline}`));
      break;
    case "warn":
      lines.push(paint.yellow(`    ⚠️  ${headline}`));
      break;
    case "fail":
      lines.push(paint.red(`    ❌ ${headline}`));
      break;
  }

  lines.push(...rest.map(line => `       ${line}`));

  if (verbose && result.detail) {
    lines.push(...result.detail.split("\n").map(line => paint.dim(`       ${line}`)));
  }
  if (result.status !== "ok") {
    lines.push(
      paint.cyan(`       💡 ${friendlyFixForMessage(result.checkName, result.message)}`)
    );
  }
  return lines;
}

function problemLines(
  results: readonly CheckResult[],
  paint: ChalkInstance,
  status: "warn" | "fail"
): string[] {
  const lines: string[] = [];
  for (const result of results.filter(r => r.status === status)) {
    const name = friendlyName(result.checkName);
    const message = friendlyMessage(result.checkName, result.message);
    const fix = friendlyFixForMessage(result.checkName, result.message);
    if (status === "fail") {
      lines.push(
        paint.red(`       ❌ ${name}`),
        `          What's wrong: ${message}`,
        `          How to fix: ${fix}`,
        ""
      );
    } else {
      lines.push(
        paint.yellow(`       ⚠️  ${name}`),
        `          What's happening: ${message}`,
        `          Suggestion: ${fix}`,
        ""
      );
    }
  }
  return lines;
}

/**
 * Per-host summary printed after the run
 */
export function summaryLines(outcome: RunOutcome, paint: ChalkInstance): string[] {
  const counts = countByStatus(outcome.results);
  const lines: string[] = ["", `  Summary for ${outcome.target}`, `  ${"─".repeat(40)}`];

  if (counts.fail > 0) {
    lines.push(
      paint.bold.red("    PROBLEMS FOUND - Action Required!"),
      `       Found ${counts.fail} problem(s) that need to be fixed:`,
      "",
      ...problemLines(outcome.results, paint, "fail")
    );
  }

  if (counts.warn > 0) {
    if (counts.fail > 0) {
      lines.push(paint.yellow(`    Also found ${counts.warn} warning(s):`), "");
    } else {
      lines.push(
        paint.bold.yellow("    MOSTLY OK - Some things to watch"),
        `       Found ${counts.warn} thing(s) that might need attention:`,
        ""
      );
    }
    lines.push(...problemLines(outcome.results, paint, "warn"));
  }

  if (counts.fail === 0 && counts.warn === 0) {
    lines.push(
      paint.bold.green("    ALL GOOD!"),
      "       Everything is working perfectly.",
      "       Your device is healthy and all services are running."
    );
  }

  return lines;
}

/**
 * Overview across hosts when more than one was diagnosed
 */
export function hostsTable(outcomes: readonly RunOutcome[], colorize: boolean): string {
  const table = new Table({
    head: ["Host", "Status", "OK", "Warn", "Fail"],
    ...(!colorize && { style: { head: [], border: [] } }),
  });

  for (const outcome of outcomes) {
    const counts = countByStatus(outcome.results);
    table.push([
      outcome.target,
      outcome.overallSuccess ? "healthy" : "problems",
      String(counts.ok),
      String(counts.warn),
      String(counts.fail),
    ]);
  }

  return table.toString();
}
