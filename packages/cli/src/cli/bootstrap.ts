// pattern: Imperative Shell
// CLI command that installs an SSH key on a host using its password

import { Command, Option } from "@commander-js/extra-typings";

import { selectHosts, type Inventory } from "../config/loaders/inventory-loader.js";
import { sshTimeoutsFromEnv } from "../config/loaders/timeouts.js";
import { createLocalRunner } from "../diagnostics/orchestrator.js";
import { checkTailscale } from "../diagnostics/probes/network.js";
import { SessionBootstrap } from "../ssh/session-bootstrap.js";
import { createSsh2Connector } from "../ssh/ssh2-transport.js";

import { withInventoryAndErrorHandling } from "./_utils/with-inventory.js";
import { CLI_LOGGER } from "./_deps.js";

import type { HostTarget, LocalRunner } from "../diagnostics/types.js";
import type { KeyPairGenerator } from "../ssh/credential-bootstrap.js";
import type { SshConnector, SshTimeouts } from "../ssh/types.js";
import type { Logger } from "pino";

export interface BootstrapDeps {
  connector: SshConnector;
  logger: Logger;
  runLocal: LocalRunner;
  timeouts?: SshTimeouts;
  generateKeyPair?: KeyPairGenerator;
}

export interface BootstrapSummary {
  reachable: boolean;
  publicKeyPath: string;
  verified: boolean;
}

/**
 * Check reachability, install the local key with a password login and then
 * confirm a key-only login works. An unreachable VPN is only a warning; the
 * SSH steps decide the outcome.
 */
export async function executeBootstrap(
  host: HostTarget,
  deps: BootstrapDeps
): Promise<BootstrapSummary> {
  const logger = deps.logger.child({ target: host.name });

  logger.info(`Step 1/3: checking that ${host.connection.address} is reachable`);
  const reachability = await checkTailscale(host.connection.address, deps.runLocal);
  if (reachability.status === "ok") {
    logger.info(reachability.message);
  } else {
    logger.warn(`${reachability.message}; trying SSH anyway`);
  }

  const bootstrap = new SessionBootstrap(host.connection, {
    connector: deps.connector,
    logger,
    ...(deps.timeouts && { timeouts: deps.timeouts }),
    ...(deps.generateKeyPair && { generateKeyPair: deps.generateKeyPair }),
  });

  logger.info("Step 2/3: installing the SSH key with a password login");
  const publicKeyPath = await bootstrap.provisionWithPassword();
  logger.info(`Installed ${publicKeyPath} on ${host.name}`);

  logger.info("Step 3/3: verifying key login");
  const verified = await bootstrap.verifyKeyLogin();
  if (verified) {
    logger.info(`Key login to ${host.name} works; the password is no longer needed`);
  } else {
    logger.error(`Key login to ${host.name} could not be verified`);
  }

  return { reachable: reachability.status === "ok", publicKeyPath, verified };
}

/**
 * Create the 'edgeprobe bootstrap' command
 */
// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function makeBootstrapCommand() {
  return new Command("bootstrap")
    .description("Install your SSH key on a host using its configured password")
    .addHelpText(
      "after",
      `
Examples:
  edgeprobe bootstrap --host gateway-1
      `
    )
    .addOption(
      new Option("--host <name>", "Inventory host to set up").makeOptionMandatory()
    )
    .action(options =>
      withInventoryAndErrorHandling(async (inventory: Inventory) => {
        const [host] = selectHosts(inventory, [options.host]);
        if (!host) return;

        const summary = await executeBootstrap(host, {
          connector: createSsh2Connector(CLI_LOGGER),
          logger: CLI_LOGGER,
          runLocal: createLocalRunner(CLI_LOGGER),
          timeouts: sshTimeoutsFromEnv(),
        });

        if (!summary.verified) {
          process.exitCode = 1;
        }
      })()
    );
}
