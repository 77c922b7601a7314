// pattern: Testing Infrastructure

import { describe, expect, it } from "vitest";

import { probeContext } from "../../test-utils/diagnostics/probe-context.js";

import {
  checkContainer,
  composeFilesCommand,
  composeServiceNames,
  containerLogsCommand,
  containerStateCommand,
  dockerActiveCommand,
  dockerProbe,
  readFileCommand,
  serviceLogsCommand,
  serviceStateCommand,
  systemdServicesProbe,
} from "./services.js";

const COMPOSE_FILE = `
services:
  web:
    image: nginx:1.27
  worker:
    image: example/worker:2
    restart: unless-stopped
`;

describe("composeServiceNames", () => {
  it("lists root-level services of a compose file", () => {
    expect(composeServiceNames(COMPOSE_FILE)).toEqual(["web", "worker"]);
  });

  it("ignores YAML files that are not compose files", () => {
    expect(composeServiceNames("steps:\n  - build\n  - deploy\n")).toEqual([]);
    expect(composeServiceNames("- just\n- a list\n")).toEqual([]);
    expect(composeServiceNames("services:\n  - not-a-map\n")).toEqual([]);
  });
});

describe("dockerProbe", () => {
  it("fails without checking containers when docker is down", async () => {
    const { context, transport } = probeContext({
      script: { [dockerActiveCommand]: { exitCode: 3, stdout: "inactive\n" } },
      host: { composeDir: "/opt/app" },
    });

    expect(await dockerProbe.run(context)).toEqual([
      { checkName: "Docker Daemon", status: "fail", message: "Docker is not running" },
    ]);
    expect(transport.commands).toEqual([dockerActiveCommand]);
  });

  it("stops after the daemon when no compose directory is configured", async () => {
    const { context } = probeContext({
      script: { [dockerActiveCommand]: { stdout: "active\n" } },
    });

    expect(await dockerProbe.run(context)).toEqual([
      { checkName: "Docker Daemon", status: "ok", message: "Docker is running" },
    ]);
  });

  it("checks every container declared in compose files", async () => {
    const { context } = probeContext({
      host: { composeDir: "/opt/app" },
      script: {
        [dockerActiveCommand]: { stdout: "active\n" },
        [composeFilesCommand("/opt/app")]: {
          stdout: "/opt/app/pipeline.yaml\n/opt/app/docker-compose.yml\n",
        },
        [readFileCommand("/opt/app/docker-compose.yml")]: { stdout: COMPOSE_FILE },
        [readFileCommand("/opt/app/pipeline.yaml")]: { stdout: "steps:\n  - build\n" },
        [containerStateCommand("web")]: { stdout: "running Up 2 hours\n" },
        [containerStateCommand("worker")]: {
          stdout: "restarting Restarting (1) 5 seconds ago\n",
        },
        [containerLogsCommand("worker")]: {
          stdout: "panic: config missing\nexit status 1\n",
        },
      },
    });

    expect(await dockerProbe.run(context)).toEqual([
      { checkName: "Docker Daemon", status: "ok", message: "Docker is running" },
      {
        checkName: "Container: web",
        status: "ok",
        message: "Container 'web' is running",
        detail: "running Up 2 hours",
      },
      {
        checkName: "Container: worker",
        status: "fail",
        message: "Container 'worker' is RESTARTING (crash loop!)",
        logs: "panic: config missing\nexit status 1\n",
        detail: "restarting Restarting (1) 5 seconds ago",
      },
    ]);
  });

  it("skips compose files that are not valid YAML", async () => {
    const { context } = probeContext({
      host: { composeDir: "/srv" },
      script: {
        [dockerActiveCommand]: { stdout: "active\n" },
        [composeFilesCommand("/srv")]: { stdout: "/srv/a.yml\n/srv/b.yml\n" },
        [readFileCommand("/srv/a.yml")]: { stdout: "services: [unclosed\n" },
        [readFileCommand("/srv/b.yml")]: { stdout: "services:\n  db: {}\n" },
        [containerStateCommand("db")]: { stdout: "running Up 1 minute\n" },
      },
    });

    const results = await dockerProbe.run(context);

    expect(results.map(result => result.checkName)).toEqual([
      "Docker Daemon",
      "Container: db",
    ]);
  });

  it("lists each container once when several files declare it", async () => {
    const { context } = probeContext({
      host: { composeDir: "/srv" },
      script: {
        [dockerActiveCommand]: { stdout: "active\n" },
        [composeFilesCommand("/srv")]: { stdout: "/srv/a.yml\n/srv/b.yml\n" },
        [readFileCommand("/srv/a.yml")]: { stdout: "services:\n  db: {}\n" },
        [readFileCommand("/srv/b.yml")]: { stdout: "services:\n  db: {}\n  api: {}\n" },
        [containerStateCommand("db")]: { stdout: "running Up 1 minute\n" },
        [containerStateCommand("api")]: { stdout: "running Up 1 minute\n" },
      },
    });

    const results = await dockerProbe.run(context);

    expect(results.map(result => result.checkName)).toEqual([
      "Docker Daemon",
      "Container: db",
      "Container: api",
    ]);
  });
});

describe("checkContainer", () => {
  function containerContext(state: string, logs = "") {
    return probeContext({
      script: {
        [containerStateCommand("app")]: { stdout: state },
        [containerLogsCommand("app")]: { stdout: logs },
      },
    }).context;
  }

  it("fails for a stopped container and attaches logs", async () => {
    const result = await checkContainer(
      containerContext("exited Exited (137) 3 minutes ago\n", "killed\n").shell,
      "app"
    );

    expect(result.status).toBe("fail");
    expect(result.message).toBe("Container 'app' has stopped");
    expect(result.logs).toBe("killed\n");
  });

  it("warns for a running but unhealthy container", async () => {
    const result = await checkContainer(
      containerContext("running Up 5 minutes (unhealthy)\n", "health check failed\n").shell,
      "app"
    );

    expect(result.status).toBe("warn");
    expect(result.message).toBe("Container 'app' running but unhealthy");
    expect(result.logs).toBe("health check failed\n");
  });

  it("fails when the container does not exist", async () => {
    const result = await checkContainer(containerContext("").shell, "app");

    expect(result).toEqual({
      checkName: "Container: app",
      status: "fail",
      message: "Container 'app' not found",
    });
  });

  it("warns for a state it does not recognise", async () => {
    const result = await checkContainer(
      containerContext("created Created\n").shell,
      "app"
    );

    expect(result).toEqual({
      checkName: "Container: app",
      status: "warn",
      message: "Container 'app' status unclear: created created",
    });
  });

  it("keeps only the last 50 log lines", async () => {
    const lines = Array.from({ length: 60 }, (_, index) => `line ${index + 1}`);
    const result = await checkContainer(
      containerContext("dead Dead\n", `${lines.join("\n")}\n`).shell,
      "app"
    );

    expect(result.logs).toBe(`${lines.slice(10).join("\n")}\n`);
  });
});

describe("systemdServicesProbe", () => {
  it("classifies each configured service in order", async () => {
    const { context } = probeContext({
      host: { systemdServices: ["nginx", "mqtt-bridge", "sensor-poller"] },
      script: {
        [serviceStateCommand("nginx")]: { stdout: "active\n" },
        [serviceStateCommand("mqtt-bridge")]: { exitCode: 3, stdout: "failed\n" },
        [serviceLogsCommand("mqtt-bridge")]: {
          stdout: "mqtt-bridge.service: Main process exited\n",
        },
        [serviceStateCommand("sensor-poller")]: {
          exitCode: 3,
          stdout: "activating\n",
        },
      },
    });

    expect(await systemdServicesProbe.run(context)).toEqual([
      {
        checkName: "Service: nginx",
        status: "ok",
        message: "Service 'nginx' is running",
      },
      {
        checkName: "Service: mqtt-bridge",
        status: "fail",
        message: "Service 'mqtt-bridge' is failed",
        logs: "mqtt-bridge.service: Main process exited\n",
      },
      {
        checkName: "Service: sensor-poller",
        status: "warn",
        message: "Service 'sensor-poller' status: activating",
      },
    ]);
  });

  it("produces nothing when no services are configured", async () => {
    const { context, transport } = probeContext();

    expect(await systemdServicesProbe.run(context)).toEqual([]);
    expect(transport.commands).toEqual([]);
  });
});
