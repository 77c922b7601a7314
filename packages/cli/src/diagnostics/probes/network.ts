// pattern: Functional Core
// Network probes: VPN reachability from this machine, interfaces on the target

import { checkResult, parseInteger } from "../classify.js";

import type { CheckResult, LocalRunner, Probe } from "../types.js";

export const TAILSCALE_TIMEOUT_MS = 10_000;

export const NETWORK_COMMANDS = {
  activeInterfaces: "ip link show | grep -c 'state UP'",
} as const;

/**
 * Runs `tailscale ping` on this machine, so it needs no session on the target
 */
export async function checkTailscale(
  address: string,
  runLocal: LocalRunner
): Promise<CheckResult> {
  const result = await runLocal(
    "tailscale",
    ["ping", "-c", "1", address],
    TAILSCALE_TIMEOUT_MS
  );

  if (result.spawnFailed) {
    return checkResult("Tailscale VPN", "warn", "Tailscale not installed on this machine");
  }
  if (result.timedOut) {
    return checkResult("Tailscale VPN", "warn", "Tailscale ping timed out");
  }
  if (result.stdout.toLowerCase().includes("pong")) {
    return checkResult("Tailscale VPN", "ok", "Device reachable via Tailscale");
  }

  const detail = result.stderr.trim() || result.stdout.trim();
  return checkResult(
    "Tailscale VPN",
    "warn",
    "Device not responding on Tailscale",
    detail ? { detail } : {}
  );
}

export const tailscaleProbe: Probe = {
  name: "Tailscale VPN",
  category: "network",
  async run({ host, runLocal }) {
    return [await checkTailscale(host.connection.address, runLocal)];
  },
};

export const networkInterfacesProbe: Probe = {
  name: "Network Interfaces",
  category: "network",
  async run({ shell }) {
    const result = await shell.executeOne(NETWORK_COMMANDS.activeInterfaces);
    const count = result.exitCode === 0 ? parseInteger(result.stdout) : undefined;

    if (count !== undefined && count > 0) {
      return [
        checkResult(
          "Network Interfaces",
          "ok",
          `${count} network interface(s) active`
        ),
      ];
    }
    return [checkResult("Network Interfaces", "fail", "No active network interfaces")];
  },
};

export const NETWORK_PROBES: readonly Probe[] = [
  tailscaleProbe,
  networkInterfacesProbe,
];
