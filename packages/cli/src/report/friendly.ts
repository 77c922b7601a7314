// pattern: Functional Core
// Plain-language wording for check results, aimed at non-technical operators

import type { ResultSection } from "../diagnostics/orchestrator.js";
import type { CheckResult, CheckStatus } from "../diagnostics/types.js";

const FRIENDLY_NAMES: Readonly<Record<string, string>> = {
  "SSH Connection": "Device Connection",
  Hostname: "Device Name",
  Uptime: "Running Time",
  "CPU Load": "Processor Usage",
  Memory: "Memory Usage",
  Disk: "Storage Space",
  "Tailscale VPN": "VPN Connection",
  "Network Interfaces": "Network Connection",
  "Docker Daemon": "Application Engine",
};

const FIXES: Readonly<Record<string, string>> = {
  Memory: "Try restarting the device, or contact support if it keeps happening",
  Disk: "Old files may need to be cleaned up - contact support for help",
  "CPU Load": "The device might need a restart, or there's too much running",
  "Tailscale VPN": "Check your internet connection, or try restarting the VPN",
  "Network Interfaces": "Check if network cables are connected properly",
  "Docker Daemon": "The application engine needs to be restarted - contact support",
  "SSH Connection": "Make sure the device is powered on and connected to the network",
};

const SYSTEM_CHECKS = new Set(["Hostname", "Uptime", "CPU Load", "Memory", "Disk"]);
const NETWORK_CHECKS = new Set(["Tailscale VPN", "Network Interfaces"]);

export function friendlyName(checkName: string): string {
  const mapped = FRIENDLY_NAMES[checkName];
  if (mapped) return mapped;
  if (checkName.startsWith("Container: ")) {
    return `App: ${checkName.slice("Container: ".length)}`;
  }
  if (checkName.startsWith("Device: ")) {
    return checkName.slice("Device: ".length);
  }
  return checkName;
}

function isCrashLoop(message: string): boolean {
  const lower = message.toLowerCase();
  return lower.includes("restarting") || lower.includes("crash loop");
}

export function friendlyMessage(checkName: string, message: string): string {
  const lower = message.toLowerCase();

  // Crash loops are the most serious, so they are matched first
  if (isCrashLoop(message)) {
    return "CRITICAL: This app keeps crashing and restarting over and over! It cannot work properly.";
  }
  if (checkName.includes("Memory") && lower.includes("low")) {
    return "The device is running low on memory (like when your phone gets slow)";
  }
  if (checkName.includes("Disk") && (lower.includes("full") || lower.includes("low"))) {
    return "Storage space is running low (like when your phone says 'storage full')";
  }
  if (checkName.includes("CPU") && (lower.includes("high") || lower.includes("overload"))) {
    return "The device is working very hard and might be slow";
  }
  if (checkName.includes("VPN") || checkName.includes("Tailscale")) {
    return "The secure connection to the device might have issues";
  }
  if (lower.includes("not found") || lower.includes("missing")) {
    return "This component is not connected or not working";
  }
  if (lower.includes("stopped") || lower.includes("not running")) {
    return "This service has stopped and needs to be restarted";
  }
  if (lower.includes("unhealthy")) {
    return "This app is running but reporting health problems";
  }
  return message;
}

export function friendlyFix(checkName: string): string {
  const fix = FIXES[checkName];
  if (fix) return fix;
  if (checkName.startsWith("Container: ") || checkName.startsWith("Service: ")) {
    return "CONTACT SUPPORT IMMEDIATELY - This app needs to be fixed by a technician";
  }
  if (checkName.startsWith("Device: ")) {
    return "Check if the device is plugged in properly, try a different USB port";
  }
  return "Contact support for assistance";
}

/**
 * Like `friendlyFix`, but tuned to what the message says went wrong
 */
export function friendlyFixForMessage(checkName: string, message: string): string {
  const lower = message.toLowerCase();
  if (isCrashLoop(message)) {
    return "URGENT: Contact support immediately! This app is broken and keeps crashing.";
  }
  if (lower.includes("unhealthy")) {
    return "The app is working but has issues - monitor it and contact support if it gets worse";
  }
  if (lower.includes("stopped")) {
    return "The app needs to be restarted - contact support for help";
  }
  return friendlyFix(checkName);
}

export function sectionOf(checkName: string): ResultSection {
  if (checkName === "SSH Connection") return "connection";
  if (SYSTEM_CHECKS.has(checkName)) return "system";
  if (NETWORK_CHECKS.has(checkName)) return "network";
  if (
    checkName === "Docker Daemon" ||
    checkName.startsWith("Container: ") ||
    checkName.startsWith("Service: ")
  ) {
    return "services";
  }
  if (checkName.startsWith("Device: ")) return "devices";
  return "system";
}

export type StatusCounts = Record<CheckStatus, number>;

export function countByStatus(results: readonly CheckResult[]): StatusCounts {
  const counts: StatusCounts = { ok: 0, warn: 0, fail: 0 };
  for (const result of results) {
    counts[result.status]++;
  }
  return counts;
}
