// pattern: Functional Core
import { DEFAULT_SSH_TIMEOUTS, type SshTimeouts } from "../../ssh/types.js";
import { ConfigurationError } from "../../utils/errors.js";

export const TIMEOUT_ENV_VARS = {
  connectMs: "EDGEPROBE_CONNECT_TIMEOUT_MS",
  commandMs: "EDGEPROBE_COMMAND_TIMEOUT_MS",
  transferMs: "EDGEPROBE_TRANSFER_TIMEOUT_MS",
} as const satisfies Record<keyof SshTimeouts, string>;

// Longest delay setTimeout honours; larger values fire after 1ms
export const MAX_TIMEOUT_MS = 2_147_483_647;

function readTimeout(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed) || Number(trimmed) === 0) {
    throw new ConfigurationError(
      `${name} must be a positive number of milliseconds (got "${raw}")`
    );
  }
  const value = Number(trimmed);
  if (value > MAX_TIMEOUT_MS) {
    throw new ConfigurationError(
      `${name} must be at most ${MAX_TIMEOUT_MS} milliseconds (got "${raw}")`
    );
  }
  return value;
}

/**
 * SSH timeouts, with environment overrides applied to the defaults
 */
export function sshTimeoutsFromEnv(env: NodeJS.ProcessEnv = process.env): SshTimeouts {
  return {
    connectMs: readTimeout(env, TIMEOUT_ENV_VARS.connectMs, DEFAULT_SSH_TIMEOUTS.connectMs),
    commandMs: readTimeout(env, TIMEOUT_ENV_VARS.commandMs, DEFAULT_SSH_TIMEOUTS.commandMs),
    transferMs: readTimeout(
      env,
      TIMEOUT_ENV_VARS.transferMs,
      DEFAULT_SSH_TIMEOUTS.transferMs
    ),
  };
}
