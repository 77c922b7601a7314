// pattern: Functional Core
// Public API for using edgeprobe as a library

export { loadInventory, selectHosts } from "./config/loaders/inventory-loader.js";
export type { Inventory } from "./config/loaders/inventory-loader.js";
export { sshTimeoutsFromEnv } from "./config/loaders/timeouts.js";
export { runDiagnostics, CONNECTION_CHECK_NAME } from "./diagnostics/orchestrator.js";
export type { RunDiagnosticsOptions } from "./diagnostics/orchestrator.js";
export { CheckRegistry, createDefaultRegistry } from "./diagnostics/registry.js";
export * from "./diagnostics/types.js";
export { writeReportBundle } from "./report/bundle.js";
export { CommandChannel } from "./ssh/command-channel.js";
export { SessionBootstrap } from "./ssh/session-bootstrap.js";
export { createSsh2Connector } from "./ssh/ssh2-transport.js";
export type { CommandResult, SshConnector, SshTarget, SshTimeouts } from "./ssh/types.js";
export * from "./utils/errors.js";
