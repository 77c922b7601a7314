// pattern: Testing Infrastructure
// Probe contexts backed by a scripted in-process transport

import pino from "pino";

import { CommandChannel } from "../../ssh/command-channel.js";
import {
  type ExecHandler,
  FakeTransport,
  type ScriptedOutput,
  scriptedHandler,
} from "../ssh/fake-transport.js";

import type {
  HostTarget,
  LocalRunner,
  ProbeContext,
} from "../../diagnostics/types.js";
import type { LocalCommandResult } from "../../utils/command/index.js";

export const silentLogger = pino({ level: "silent" });

export function testHost(overrides: Partial<HostTarget> = {}): HostTarget {
  return {
    name: "edge-01",
    connection: { address: "10.0.0.5", username: "ops", port: 22 },
    systemdServices: [],
    devices: [],
    ...overrides,
  };
}

export function localResult(
  overrides: Partial<LocalCommandResult> = {}
): LocalCommandResult {
  return {
    exitCode: 0,
    stdout: "",
    stderr: "",
    timedOut: false,
    spawnFailed: false,
    ...overrides,
  };
}

export interface TestProbeContext {
  context: ProbeContext;
  transport: FakeTransport;
}

export function probeContext(
  options: {
    script?: Readonly<Record<string, ScriptedOutput>>;
    handler?: ExecHandler;
    host?: Partial<HostTarget>;
    runLocal?: LocalRunner;
    verbose?: boolean;
  } = {}
): TestProbeContext {
  const transport = new FakeTransport(
    options.handler ?? scriptedHandler(options.script ?? {})
  );
  const context: ProbeContext = {
    shell: new CommandChannel(transport, silentLogger),
    host: testHost(options.host),
    verbose: options.verbose ?? false,
    logger: silentLogger,
    runLocal: options.runLocal ?? (async () => localResult()),
  };
  return { context, transport };
}
