// pattern: Mixed (unavoidable)
// Docker, compose containers and systemd service probes

import { quote } from "shlex";
import { parse as parseYaml } from "yaml";

import { checkResult, LOG_TAIL_LINES, tailLines } from "../classify.js";

import type { RemoteShell } from "../../ssh/types.js";
import type { CheckResult, Probe } from "../types.js";
import type { Logger } from "pino";

export const dockerActiveCommand = "systemctl is-active docker";

export function composeFilesCommand(composeDir: string): string {
  return `find ${quote(composeDir)} -maxdepth 1 \\( -name '*.yml' -o -name '*.yaml' \\) 2>/dev/null`;
}

export function readFileCommand(path: string): string {
  return `cat ${quote(path)} 2>/dev/null`;
}

export function containerStateCommand(name: string): string {
  return `docker ps -a --filter ${quote(`name=${name}`)} --format '{{.State}} {{.Status}}'`;
}

export function containerLogsCommand(name: string): string {
  return `docker logs --tail ${LOG_TAIL_LINES} ${quote(name)} 2>&1`;
}

export function serviceStateCommand(name: string): string {
  return `systemctl is-active ${quote(name)}`;
}

export function serviceLogsCommand(name: string): string {
  return `journalctl -u ${quote(name)} --no-pager -n ${LOG_TAIL_LINES} 2>&1`;
}

/**
 * Service names declared at the root of a compose document, or an empty list
 * when the document is not a compose file
 */
export function composeServiceNames(document: string): string[] {
  const data: unknown = parseYaml(document);
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    return [];
  }
  if (!("services" in data)) {
    return [];
  }
  const services = data.services;
  if (typeof services !== "object" || services === null || Array.isArray(services)) {
    return [];
  }
  return Object.keys(services);
}

/**
 * Collect container names from every compose file directly inside
 * `composeDir`, in file order, without duplicates
 */
export async function discoverComposeServices(
  shell: RemoteShell,
  composeDir: string,
  logger: Logger
): Promise<string[]> {
  const listing = await shell.executeOne(composeFilesCommand(composeDir));
  if (listing.exitCode !== 0 || !listing.stdout.trim()) {
    return [];
  }

  const files = listing.stdout
    .split("\n")
    .map(line => line.trim())
    .filter(line => line.length > 0)
    .sort();

  const contents = await shell.execute(files.map(readFileCommand));
  const names = new Set<string>();

  for (const [index, result] of contents.entries()) {
    if (result.exitCode !== 0 || !result.stdout.trim()) continue;
    try {
      for (const name of composeServiceNames(result.stdout)) {
        names.add(name);
      }
    } catch (error) {
      logger.debug({ err: error, file: files[index] }, "Skipping unparseable YAML file");
    }
  }

  return [...names];
}

async function recentLogs(shell: RemoteShell, command: string): Promise<string> {
  const result = await shell.executeOne(command);
  return result.exitCode === 0 ? tailLines(result.stdout) : "";
}

/**
 * Classify one container. Restart loops rank above everything else.
 */
export async function checkContainer(
  shell: RemoteShell,
  name: string
): Promise<CheckResult> {
  const checkName = `Container: ${name}`;
  const result = await shell.executeOne(containerStateCommand(name));

  if (result.exitCode !== 0 || !result.stdout.trim()) {
    return checkResult(checkName, "fail", `Container '${name}' not found`);
  }

  const state = result.stdout.trim().toLowerCase();
  const detail = result.stdout.trim();

  if (state.includes("restarting")) {
    return checkResult(checkName, "fail", `Container '${name}' is RESTARTING (crash loop!)`, {
      logs: await recentLogs(shell, containerLogsCommand(name)),
      detail,
    });
  }

  if (state.includes("exited") || state.includes("dead")) {
    return checkResult(checkName, "fail", `Container '${name}' has stopped`, {
      logs: await recentLogs(shell, containerLogsCommand(name)),
      detail,
    });
  }

  if (state.includes("running") || state.includes("up")) {
    if (state.includes("unhealthy")) {
      return checkResult(checkName, "warn", `Container '${name}' running but unhealthy`, {
        logs: await recentLogs(shell, containerLogsCommand(name)),
        detail,
      });
    }
    return checkResult(checkName, "ok", `Container '${name}' is running`, { detail });
  }

  return checkResult(checkName, "warn", `Container '${name}' status unclear: ${state}`);
}

export async function checkSystemdService(
  shell: RemoteShell,
  name: string
): Promise<CheckResult> {
  const checkName = `Service: ${name}`;
  const result = await shell.executeOne(serviceStateCommand(name));
  const status = result.stdout.trim();

  if (status === "active") {
    return checkResult(checkName, "ok", `Service '${name}' is running`);
  }

  if (status === "inactive" || status === "dead" || status === "failed") {
    return checkResult(checkName, "fail", `Service '${name}' is ${status}`, {
      logs: await recentLogs(shell, serviceLogsCommand(name)),
    });
  }

  return checkResult(checkName, "warn", `Service '${name}' status: ${status}`);
}

/**
 * Docker daemon, then every compose container when the daemon is up
 */
export const dockerProbe: Probe = {
  name: "Docker Daemon",
  category: "services",
  async run({ shell, host, logger }) {
    const daemon = await shell.executeOne(dockerActiveCommand);
    if (daemon.exitCode !== 0 || !daemon.stdout.includes("active")) {
      return [checkResult("Docker Daemon", "fail", "Docker is not running")];
    }

    const results: CheckResult[] = [
      checkResult("Docker Daemon", "ok", "Docker is running"),
    ];

    if (host.composeDir === undefined) {
      return results;
    }

    const containers = await discoverComposeServices(shell, host.composeDir, logger);
    logger.debug(
      { composeDir: host.composeDir, count: containers.length },
      "Discovered compose services"
    );

    for (const container of containers) {
      results.push(await checkContainer(shell, container));
    }
    return results;
  },
};

export const systemdServicesProbe: Probe = {
  name: "Systemd Services",
  category: "services",
  async run({ shell, host }) {
    const results: CheckResult[] = [];
    for (const service of host.systemdServices) {
      results.push(await checkSystemdService(shell, service));
    }
    return results;
  },
};

export const SERVICE_PROBES: readonly Probe[] = [dockerProbe, systemdServicesProbe];
