// pattern: Functional Core
// System health probes: identity, uptime, CPU, memory and disk

import {
  checkResult,
  classifyLoadRatio,
  classifyPercent,
  parseDecimal,
  parseInteger,
} from "../classify.js";

import type { CheckResult, CheckStatus, Probe } from "../types.js";

export const SYSTEM_COMMANDS = {
  hostname: "hostname",
  uptime: "uptime -p",
  loadAverage: "cat /proc/loadavg | awk '{print $1}'",
  cpuCount: "nproc",
  memoryPercent: `free -m | awk 'NR==2{printf "%.0f", $3*100/$2}'`,
  diskPercent: "df -h / | tail -1 | awk '{print $5}' | tr -d '%'",
} as const;

export const hostnameProbe: Probe = {
  name: "Hostname",
  category: "system",
  async run({ shell }) {
    const result = await shell.executeOne(SYSTEM_COMMANDS.hostname);
    if (result.exitCode === 0) {
      return [checkResult("Hostname", "ok", `Device name: ${result.stdout.trim()}`)];
    }
    return [checkResult("Hostname", "fail", "Could not get hostname")];
  },
};

export const uptimeProbe: Probe = {
  name: "Uptime",
  category: "system",
  async run({ shell }) {
    const result = await shell.executeOne(SYSTEM_COMMANDS.uptime);
    if (result.exitCode === 0) {
      return [checkResult("Uptime", "ok", `System ${result.stdout.trim()}`)];
    }
    return [checkResult("Uptime", "warn", "Could not get uptime")];
  },
};

const LOAD_MESSAGES: Record<CheckStatus, string> = {
  ok: "CPU load normal",
  warn: "CPU load elevated",
  fail: "CPU overloaded",
};

export const cpuLoadProbe: Probe = {
  name: "CPU Load",
  category: "system",
  async run({ shell }) {
    const [loadResult, coresResult] = await shell.execute([
      SYSTEM_COMMANDS.loadAverage,
      SYSTEM_COMMANDS.cpuCount,
    ]);

    if (!loadResult || loadResult.exitCode !== 0) {
      return [checkResult("CPU Load", "warn", "Could not check CPU")];
    }

    const load = parseDecimal(loadResult.stdout);
    // A host without nproc is treated as single-core
    const cores =
      coresResult && coresResult.exitCode === 0
        ? parseInteger(coresResult.stdout)
        : 1;

    if (load === undefined || cores === undefined || cores <= 0) {
      return [checkResult("CPU Load", "warn", "Could not parse CPU load")];
    }

    const ratio = load / cores;
    const status = classifyLoadRatio(ratio);
    return [
      checkResult(
        "CPU Load",
        status,
        `${LOAD_MESSAGES[status]} (${load.toFixed(1)} on ${cores} cores)`,
        { detail: `load/core ratio ${ratio.toFixed(2)}` }
      ),
    ];
  },
};

function percentProbe(
  name: string,
  command: string,
  subject: string,
  messages: Record<CheckStatus, string>
): Probe {
  return {
    name,
    category: "system",
    async run({ shell }): Promise<CheckResult[]> {
      const result = await shell.executeOne(command);
      if (result.exitCode !== 0) {
        return [checkResult(name, "warn", `Could not check ${subject}`)];
      }

      const usage = parseInteger(result.stdout);
      if (usage === undefined) {
        return [checkResult(name, "warn", `Could not parse ${subject} usage`)];
      }

      const status = classifyPercent(usage);
      return [checkResult(name, status, `${messages[status]} (${usage}% used)`)];
    },
  };
}

export const memoryProbe = percentProbe(
  "Memory",
  SYSTEM_COMMANDS.memoryPercent,
  "memory",
  {
    ok: "Memory OK",
    warn: "Memory getting low",
    fail: "Memory critical",
  }
);

export const diskProbe = percentProbe(
  "Disk",
  SYSTEM_COMMANDS.diskPercent,
  "disk",
  {
    ok: "Disk space OK",
    warn: "Disk getting full",
    fail: "Disk critical",
  }
);

export const SYSTEM_PROBES: readonly Probe[] = [
  hostnameProbe,
  uptimeProbe,
  cpuLoadProbe,
  memoryProbe,
  diskProbe,
];
