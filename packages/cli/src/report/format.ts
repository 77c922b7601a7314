// pattern: Functional Core
// Text of the report bundle files

import {
  countByStatus,
  friendlyFix,
  friendlyMessage,
  friendlyName,
  sectionOf,
} from "./friendly.js";

import type { CheckResult } from "../diagnostics/types.js";

const MONTHS = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
] as const;

const RULE = "─".repeat(50);

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Directory name for a bundle, e.g. 20261018_140509 (local time)
 */
export function bundleTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * e.g. "October 18, 2026 at 14:05"
 */
export function reportDate(date: Date): string {
  return `${MONTHS[date.getMonth()]} ${pad(date.getDate())}, ${date.getFullYear()} at ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

function overallStatusLines(fail: number, warn: number): string[] {
  if (fail > 0) {
    return ["OVERALL STATUS: PROBLEMS FOUND", "   Some things need to be fixed."];
  }
  if (warn > 0) {
    return [
      "OVERALL STATUS: MOSTLY OK",
      "   Everything works, but some things need attention.",
    ];
  }
  return ["OVERALL STATUS: ALL GOOD!", "   Everything is working perfectly."];
}

function passingSummary(results: readonly CheckResult[]): string[] {
  const passing = { connection: 0, system: 0, network: 0, services: 0, devices: 0 };
  for (const result of results) {
    if (result.status === "ok") {
      passing[sectionOf(result.checkName)]++;
    }
  }

  const lines: string[] = [];
  if (passing.connection > 0) lines.push("   Connection: Device is reachable");
  if (passing.system > 0) {
    lines.push(`   System Health: All ${passing.system} checks passed`);
  }
  if (passing.network > 0) {
    lines.push(`   Network: All ${passing.network} checks passed`);
  }
  if (passing.services > 0) {
    lines.push(`   Services: All ${passing.services} services running`);
  }
  if (passing.devices > 0) {
    lines.push(`   Devices: All ${passing.devices} devices connected`);
  }
  return lines;
}

export function formatReport(
  hostName: string,
  results: readonly CheckResult[],
  now: Date
): string {
  const counts = countByStatus(results);
  const lines: string[] = [
    "DEVICE HEALTH CHECK REPORT",
    "=".repeat(50),
    "",
    `Date: ${reportDate(now)}`,
    `Device: ${hostName}`,
    "",
    RULE,
    ...overallStatusLines(counts.fail, counts.warn),
    RULE,
    "",
    "QUICK SUMMARY:",
    `   Working fine: ${counts.ok} checks`,
  ];
  if (counts.warn > 0) lines.push(`   Needs attention: ${counts.warn} checks`);
  if (counts.fail > 0) lines.push(`   Problems: ${counts.fail} checks`);
  lines.push("");

  if (counts.fail > 0) {
    lines.push(RULE, "PROBLEMS THAT NEED FIXING:", RULE, "");
    for (const result of results.filter(r => r.status === "fail")) {
      lines.push(
        `   Problem: ${friendlyName(result.checkName)}`,
        `   What's wrong: ${friendlyMessage(result.checkName, result.message)}`,
        `   How to fix: ${friendlyFix(result.checkName)}`,
        ""
      );
    }
  }

  if (counts.warn > 0) {
    lines.push(RULE, "THINGS TO KEEP AN EYE ON:", RULE, "");
    for (const result of results.filter(r => r.status === "warn")) {
      lines.push(
        `   Notice: ${friendlyName(result.checkName)}`,
        `   What's happening: ${friendlyMessage(result.checkName, result.message)}`,
        `   Suggestion: ${friendlyFix(result.checkName)}`,
        ""
      );
    }
  }

  lines.push(
    RULE,
    "WHAT'S WORKING FINE:",
    RULE,
    "",
    ...passingSummary(results),
    "",
    RULE,
    "Need help? Contact technical support with this report.",
    RULE
  );

  return `${lines.join("\n")}\n`;
}

export function formatSupportMessage(
  hostName: string,
  results: readonly CheckResult[],
  bundleDir: string,
  now: Date
): string {
  const lines: string[] = [
    "Hi Support Team,",
    "",
    `I ran a health check on device '${hostName}' and found some issues.`,
    "",
  ];

  const section = (title: string, picked: readonly CheckResult[]): void => {
    if (picked.length === 0) return;
    lines.push(title);
    for (const result of picked) {
      lines.push(
        `   - ${friendlyName(result.checkName)}: ${friendlyMessage(result.checkName, result.message)}`
      );
    }
    lines.push("");
  };

  section("Problems found:", results.filter(r => r.status === "fail"));
  section("Warnings:", results.filter(r => r.status === "warn"));

  lines.push(
    `Check date: ${reportDate(now)}`,
    `Full report attached in: ${bundleDir}`,
    "",
    "Thanks!"
  );

  return `${lines.join("\n")}\n`;
}
