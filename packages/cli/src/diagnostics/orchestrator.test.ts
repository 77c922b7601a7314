// pattern: Testing Infrastructure

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { silentLogger, testHost } from "../test-utils/diagnostics/probe-context.js";
import {
  FakeConnector,
  rawOutput,
  type ScriptedOutput,
} from "../test-utils/ssh/fake-transport.js";

import { checkResult } from "./classify.js";
import {
  CONNECTION_CHECK_NAME,
  logKeyFor,
  runDiagnostics,
  type RunDiagnosticsOptions,
} from "./orchestrator.js";
import { SYSTEM_COMMANDS } from "./probes/system.js";
import { CheckRegistry } from "./registry.js";

import type { GeneratedKeyPair } from "../ssh/credential-bootstrap.js";
import type { CheckResult, HostTarget, Probe, RunPhase } from "./types.js";

const FAKE_PAIR: GeneratedKeyPair = {
  privateKey: "placeholder-private-key\n",
  publicKey: "ssh-rsa AAAAB3NzaC1yc2Eplaceholder generated-by-edgeprobe",
};

function probe(
  name: string,
  category: Probe["category"],
  results: readonly CheckResult[] | (() => Promise<readonly CheckResult[]>)
): Probe {
  return {
    name,
    category,
    run: typeof results === "function" ? results : async () => results,
  };
}

describe("runDiagnostics", () => {
  let tempDir: string;
  let host: HostTarget;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "edgeprobe-orchestrator-test-"));
    host = testHost({
      connection: {
        address: "10.0.0.5",
        username: "ops",
        port: 22,
        password: "test-secret",
        keyPath: join(tempDir, "id_rsa"),
      },
    });
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  // Key installation succeeds; other commands come from the script
  function connector(
    script: Readonly<Record<string, ScriptedOutput>> = {},
    accept = true
  ): FakeConnector {
    return new FakeConnector(
      () => accept,
      command => {
        if (command.startsWith("umask 077")) return rawOutput(0);
        const entry = script[command];
        return entry
          ? rawOutput(entry.exitCode ?? 0, entry.stdout ?? "", entry.stderr ?? "")
          : rawOutput(127, "", "not found");
      }
    );
  }

  function options(
    fake: FakeConnector,
    overrides: Partial<RunDiagnosticsOptions> = {}
  ): RunDiagnosticsOptions {
    return {
      connector: fake.connect,
      logger: silentLogger,
      generateKeyPair: () => FAKE_PAIR,
      ...overrides,
    };
  }

  it("short-circuits to a single failing result when no session opens", async () => {
    const fake = connector({}, false);
    const run = vi.fn(async () => [checkResult("Never", "ok", "never")]);
    const registry = new CheckRegistry().register({
      name: "Never",
      category: "system",
      run,
    });
    const phases: RunPhase[] = [];

    const outcome = await runDiagnostics(
      host,
      [],
      options(fake, { registry, onTransition: state => phases.push(state) })
    );

    expect(outcome.results).toHaveLength(1);
    expect(outcome.results[0]?.checkName).toBe(CONNECTION_CHECK_NAME);
    expect(outcome.results[0]?.status).toBe("fail");
    expect(outcome.overallSuccess).toBe(false);
    expect(run).not.toHaveBeenCalled();
    expect(phases).toEqual([{ phase: "connecting" }, { phase: "finished" }]);
  });

  it("reports remediation text for an unreachable host without a password", async () => {
    const fake = connector({}, false);
    const unreachable = testHost({
      connection: {
        address: "10.9.9.9",
        username: "ops",
        port: 22,
        keyPath: join(tempDir, "absent_key"),
      },
    });

    const outcome = await runDiagnostics(unreachable, ["system"], options(fake));

    expect(outcome.results).toHaveLength(1);
    const [result] = outcome.results;
    expect(result?.checkName).toBe("SSH Connection");
    expect(result?.status).toBe("fail");
    expect(result?.message.split("\n")[0]).toBe(
      "Could not establish SSH connection to ops@10.9.9.9"
    );
    expect(result?.message).toContain("Try manually: ssh ops@10.9.9.9");
    expect(fake.attempts).toEqual([]);
  });

  it("runs requested categories in the fixed order and releases the session", async () => {
    const fake = connector();
    const registry = new CheckRegistry()
      .register(probe("Sys", "system", [checkResult("Sys", "ok", "fine")]))
      .register(probe("Net", "network", [checkResult("Net", "ok", "fine")]))
      .register(probe("Dev", "devices", [checkResult("Dev", "warn", "hmm")]));
    const phases: RunPhase[] = [];

    const outcome = await runDiagnostics(
      host,
      ["devices", "system"],
      options(fake, { registry, onTransition: state => phases.push(state) })
    );

    expect(outcome.results.map(result => result.checkName)).toEqual([
      "SSH Connection",
      "Sys",
      "Dev",
    ]);
    expect(phases).toEqual([
      { phase: "connecting" },
      { phase: "running", category: "system" },
      { phase: "running", category: "devices" },
      { phase: "finished" },
    ]);
    expect(outcome.overallSuccess).toBe(true);
    expect(fake.transports[0]?.closeCount).toBe(1);
  });

  it("turns a throwing probe into a warning and keeps going", async () => {
    const fake = connector();
    const registry = new CheckRegistry()
      .register(
        probe("Broken", "system", async () => {
          throw new Error("unexpected output");
        })
      )
      .register(probe("After", "system", [checkResult("After", "ok", "fine")]));

    const outcome = await runDiagnostics(host, ["system"], options(fake, { registry }));

    expect(outcome.results.slice(1)).toEqual([
      { checkName: "Broken", status: "warn", message: "unexpected output" },
      { checkName: "After", status: "ok", message: "fine" },
    ]);
    expect(outcome.overallSuccess).toBe(true);
  });

  it("keeps going after the session drops mid-probe", async () => {
    const fake = connector();
    const registry = new CheckRegistry()
      .register({
        name: "Dropper",
        category: "system",
        run: async ({ shell }) => {
          fake.transports[0]?.drop();
          await shell.execute(["uptime"]);
          return [];
        },
      })
      .register(probe("Local", "network", [checkResult("Local", "ok", "fine")]));

    const outcome = await runDiagnostics(host, [], options(fake, { registry }));

    expect(outcome.results.map(result => [result.checkName, result.status])).toEqual([
      ["SSH Connection", "ok"],
      ["Dropper", "warn"],
      ["Local", "ok"],
    ]);
    expect(outcome.results[1]?.message).toBe(
      "Command 1 of 1 did not complete: SSH connection is closed"
    );
    expect(fake.transports[0]?.closeCount).toBe(1);
  });

  it("succeeds iff no result failed", async () => {
    const warnOnly = new CheckRegistry().register(
      probe("W", "system", [checkResult("W", "warn", "meh")])
    );
    const withFail = new CheckRegistry().register(
      probe("F", "system", [
        checkResult("F1", "ok", "fine"),
        checkResult("F2", "fail", "broken"),
      ])
    );

    const warnOutcome = await runDiagnostics(
      host,
      [],
      options(connector(), { registry: warnOnly })
    );
    const failOutcome = await runDiagnostics(
      host,
      [],
      options(connector(), { registry: withFail })
    );

    expect(warnOutcome.overallSuccess).toBe(true);
    expect(failOutcome.overallSuccess).toBe(false);
  });

  it("collects logs only for results that are not ok", async () => {
    const registry = new CheckRegistry().register(
      probe("Containers", "services", [
        checkResult("Container: web", "ok", "running", { logs: "fine\n" }),
        checkResult("Container: worker", "fail", "stopped", { logs: "crash\n" }),
        checkResult("Service: mqtt", "warn", "odd", { logs: "retrying\n" }),
      ])
    );

    const outcome = await runDiagnostics(
      host,
      ["services"],
      options(connector(), { registry })
    );

    expect(outcome.logs).toEqual({
      container_worker: "crash\n",
      service_mqtt: "retrying\n",
    });
  });

  it("passes each result to onResult with its section as it is appended", async () => {
    const seen: [string, string][] = [];
    const registry = new CheckRegistry().register(
      probe("Dev", "devices", [checkResult("Device: Modem", "ok", "Modem connected")])
    );

    await runDiagnostics(
      host,
      [],
      options(connector(), {
        registry,
        onResult: (result, section) => seen.push([result.checkName, section]),
      })
    );

    expect(seen).toEqual([
      ["SSH Connection", "connection"],
      ["Device: Modem", "devices"],
    ]);
  });

  it("releases the session even when a callback throws", async () => {
    const fake = connector();
    const registry = new CheckRegistry().register(
      probe("Sys", "system", [checkResult("Sys", "ok", "fine")])
    );

    await expect(
      runDiagnostics(
        host,
        [],
        options(fake, {
          registry,
          onResult: result => {
            if (result.checkName === "Sys") throw new Error("display failed");
          },
        })
      )
    ).rejects.toThrow("display failed");
    expect(fake.transports[0]?.closeCount).toBe(1);
  });

  it("returns frozen results", async () => {
    const outcome = await runDiagnostics(
      host,
      [],
      options(connector(), { registry: new CheckRegistry() })
    );

    expect(Object.isFrozen(outcome)).toBe(true);
    expect(Object.isFrozen(outcome.results)).toBe(true);
    expect(Object.isFrozen(outcome.results[0])).toBe(true);
  });

  it("records how the session was obtained", async () => {
    const outcome = await runDiagnostics(
      host,
      [],
      options(connector(), { registry: new CheckRegistry() })
    );

    expect(outcome.bootstrapMessages).toEqual([
      "Connected using password",
      `SSH key bootstrapped: ${join(tempDir, "id_rsa")}.pub`,
    ]);
  });

  describe("with the built-in system probes", () => {
    function systemScript(load: string, cores: string): Record<string, ScriptedOutput> {
      return {
        [SYSTEM_COMMANDS.hostname]: { stdout: "edge-01\n" },
        [SYSTEM_COMMANDS.uptime]: { stdout: "up 2 hours\n" },
        [SYSTEM_COMMANDS.loadAverage]: { stdout: `${load}\n` },
        [SYSTEM_COMMANDS.cpuCount]: { stdout: `${cores}\n` },
        [SYSTEM_COMMANDS.memoryPercent]: { stdout: "40" },
        [SYSTEM_COMMANDS.diskPercent]: { stdout: "55\n" },
      };
    }

    it.each([
      ["1.00", "2", "ok", true],
      ["1.60", "2", "warn", true],
      ["2.40", "2", "fail", false],
    ] as const)(
      "classifies load %s on %s cores as %s",
      async (load, cores, status, overallSuccess) => {
        const outcome = await runDiagnostics(
          host,
          ["system"],
          options(connector(systemScript(load, cores)))
        );

        const cpu = outcome.results.find(result => result.checkName === "CPU Load");
        expect(cpu?.status).toBe(status);
        expect(outcome.results.map(result => result.checkName)).toEqual([
          "SSH Connection",
          "Hostname",
          "Uptime",
          "CPU Load",
          "Memory",
          "Disk",
        ]);
        expect(outcome.overallSuccess).toBe(overallSuccess);
      }
    );
  });
});

describe("logKeyFor", () => {
  it("derives log names from check names", () => {
    expect(logKeyFor("Container: web")).toBe("container_web");
    expect(logKeyFor("Service: mqtt-bridge")).toBe("service_mqtt-bridge");
    expect(logKeyFor("Service: getty@tty1 unit")).toBe("service_getty@tty1_unit");
    expect(logKeyFor("CPU Load")).toBe("cpu_load");
  });
});
