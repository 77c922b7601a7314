// pattern: Functional Core
// Threshold classification and output parsing shared by probes

import type { CheckResult, CheckStatus } from "./types.js";

export const PERCENT_WARN_AT = 70;
export const PERCENT_FAIL_AT = 85;

export const LOAD_WARN_RATIO = 0.7;
export const LOAD_FAIL_RATIO = 1.0;

export const LOG_TAIL_LINES = 50;

export function classifyPercent(percent: number): CheckStatus {
  if (percent < PERCENT_WARN_AT) return "ok";
  if (percent < PERCENT_FAIL_AT) return "warn";
  return "fail";
}

/**
 * Classify 1-minute load average per core
 */
export function classifyLoadRatio(ratio: number): CheckStatus {
  if (ratio < LOAD_WARN_RATIO) return "ok";
  if (ratio < LOAD_FAIL_RATIO) return "warn";
  return "fail";
}

/**
 * Parse trimmed command output as a whole integer; anything else is undefined
 */
export function parseInteger(output: string): number | undefined {
  const text = output.trim();
  return /^-?\d+$/.test(text) ? Number.parseInt(text, 10) : undefined;
}

export function parseDecimal(output: string): number | undefined {
  const text = output.trim();
  return /^-?\d+(\.\d+)?$/.test(text) ? Number.parseFloat(text) : undefined;
}

/**
 * Keep at most the last `count` lines of a log
 */
export function tailLines(text: string, count: number = LOG_TAIL_LINES): string {
  const lines = text.split("\n");
  const trailingNewline = lines.at(-1) === "";
  if (trailingNewline) lines.pop();
  const kept = lines.slice(-count).join("\n");
  return trailingNewline ? `${kept}\n` : kept;
}

export function checkResult(
  checkName: string,
  status: CheckStatus,
  message: string,
  extra: { logs?: string; detail?: string } = {}
): CheckResult {
  return {
    checkName,
    status,
    message,
    ...(extra.logs !== undefined && extra.logs !== "" && { logs: extra.logs }),
    ...(extra.detail !== undefined && { detail: extra.detail }),
  };
}
