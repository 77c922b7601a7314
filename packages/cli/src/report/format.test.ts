import { describe, expect, it } from "vitest";

import {
  bundleTimestamp,
  formatReport,
  formatSupportMessage,
  reportDate,
} from "./format.js";

import type { CheckResult } from "../diagnostics/types.js";

const NOW = new Date(2026, 9, 18, 14, 5, 9);
const RULE = "─".repeat(50);

const MIXED: CheckResult[] = [
  { checkName: "SSH Connection", status: "ok", message: "Connected" },
  { checkName: "Hostname", status: "ok", message: "Device name: edge-01" },
  { checkName: "Memory", status: "warn", message: "Memory getting low (72% used)" },
  {
    checkName: "Container: worker",
    status: "fail",
    message: "Container 'worker' is RESTARTING (crash loop!)",
  },
];

describe("bundleTimestamp", () => {
  it("uses local date and time", () => {
    expect(bundleTimestamp(NOW)).toBe("20261018_140509");
  });
});

describe("reportDate", () => {
  it("spells out the month", () => {
    expect(reportDate(NOW)).toBe("October 18, 2026 at 14:05");
    expect(reportDate(new Date(2026, 0, 3, 9, 7))).toBe("January 03, 2026 at 09:07");
  });
});

describe("formatReport", () => {
  it("lists problems, then warnings, then what works", () => {
    const lines = formatReport("edge-01", MIXED, NOW).split("\n");

    expect(lines.slice(0, 16)).toEqual([
      "DEVICE HEALTH CHECK REPORT",
      "=".repeat(50),
      "",
      "Date: October 18, 2026 at 14:05",
      "Device: edge-01",
      "",
      RULE,
      "OVERALL STATUS: PROBLEMS FOUND",
      "   Some things need to be fixed.",
      RULE,
      "",
      "QUICK SUMMARY:",
      "   Working fine: 2 checks",
      "   Needs attention: 1 checks",
      "   Problems: 1 checks",
      "",
    ]);

    const problems = lines.indexOf("PROBLEMS THAT NEED FIXING:");
    expect(lines.slice(problems + 2, problems + 6)).toEqual([
      "",
      "   Problem: App: worker",
      "   What's wrong: CRITICAL: This app keeps crashing and restarting over and over! It cannot work properly.",
      "   How to fix: CONTACT SUPPORT IMMEDIATELY - This app needs to be fixed by a technician",
    ]);

    const warnings = lines.indexOf("THINGS TO KEEP AN EYE ON:");
    expect(warnings).toBeGreaterThan(problems);
    expect(lines.slice(warnings + 3, warnings + 6)).toEqual([
      "   Notice: Memory Usage",
      "   What's happening: The device is running low on memory (like when your phone gets slow)",
      "   Suggestion: Try restarting the device, or contact support if it keeps happening",
    ]);

    const working = lines.indexOf("WHAT'S WORKING FINE:");
    expect(lines.slice(working + 3, working + 5)).toEqual([
      "   Connection: Device is reachable",
      "   System Health: All 1 checks passed",
    ]);
  });

  it("reports a clean run as all good", () => {
    const report = formatReport(
      "edge-01",
      [{ checkName: "SSH Connection", status: "ok", message: "Connected" }],
      NOW
    );

    expect(report).toContain("OVERALL STATUS: ALL GOOD!\n");
    expect(report).not.toContain("PROBLEMS THAT NEED FIXING:");
    expect(report.endsWith(`${RULE}\n`)).toBe(true);
  });
});

describe("formatSupportMessage", () => {
  it("summarises problems and warnings for support", () => {
    expect(formatSupportMessage("edge-01", MIXED, "/reports/edge-01/x", NOW)).toBe(
      [
        "Hi Support Team,",
        "",
        "I ran a health check on device 'edge-01' and found some issues.",
        "",
        "Problems found:",
        "   - App: worker: CRITICAL: This app keeps crashing and restarting over and over! It cannot work properly.",
        "",
        "Warnings:",
        "   - Memory Usage: The device is running low on memory (like when your phone gets slow)",
        "",
        "Check date: October 18, 2026 at 14:05",
        "Full report attached in: /reports/edge-01/x",
        "",
        "Thanks!",
        "",
      ].join("\n")
    );
  });
});
