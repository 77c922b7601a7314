// pattern: Imperative Shell
// CLI commands that copy files to and from a host over SFTP

import { Command, Option } from "@commander-js/extra-typings";

import { selectHosts, type Inventory } from "../config/loaders/inventory-loader.js";
import { sshTimeoutsFromEnv } from "../config/loaders/timeouts.js";
import { SessionBootstrap } from "../ssh/session-bootstrap.js";
import { createSsh2Connector } from "../ssh/ssh2-transport.js";

import { withInventoryAndErrorHandling } from "./_utils/with-inventory.js";
import { CLI_LOGGER } from "./_deps.js";

import type { HostTarget } from "../diagnostics/types.js";
import type { KeyPairGenerator } from "../ssh/credential-bootstrap.js";
import type { SshConnector, SshTimeouts } from "../ssh/types.js";
import type { Logger } from "pino";

export type TransferDirection = "upload" | "download";

export interface TransferDeps {
  connector: SshConnector;
  logger: Logger;
  timeouts?: SshTimeouts;
  generateKeyPair?: KeyPairGenerator;
}

/**
 * Open a session (bootstrapping a key if needed), copy one file and release
 * the session whether or not the copy worked.
 */
export async function executeTransfer(
  host: HostTarget,
  direction: TransferDirection,
  source: string,
  destination: string,
  deps: TransferDeps
): Promise<void> {
  const logger = deps.logger.child({ target: host.name });

  const session = await new SessionBootstrap(host.connection, {
    connector: deps.connector,
    logger,
    ...(deps.timeouts && { timeouts: deps.timeouts }),
    ...(deps.generateKeyPair && { generateKeyPair: deps.generateKeyPair }),
  }).connect();

  for (const message of session.messages) {
    logger.debug(message);
  }

  try {
    if (direction === "upload") {
      await session.channel.upload(source, destination);
      logger.info(`Uploaded ${source} to ${host.name}:${destination}`);
    } else {
      await session.channel.download(source, destination);
      logger.info(`Downloaded ${host.name}:${source} to ${destination}`);
    }
  } finally {
    session.channel.close();
  }
}

// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
function makeTransferCommand(direction: TransferDirection) {
  const [from, to] = direction === "upload" ? ["local", "remote"] : ["remote", "local"];

  return new Command(direction)
    .description(
      direction === "upload"
        ? "Copy a local file to a host"
        : "Copy a file from a host to this machine"
    )
    .argument("<source>", `Source path (${from})`)
    .argument("<destination>", `Destination path (${to})`)
    .addOption(
      new Option("--host <name>", "Inventory host to copy with").makeOptionMandatory()
    )
    .action((source, destination, options) =>
      withInventoryAndErrorHandling(async (inventory: Inventory) => {
        const [host] = selectHosts(inventory, [options.host]);
        if (!host) return;

        await executeTransfer(host, direction, source, destination, {
          connector: createSsh2Connector(CLI_LOGGER),
          logger: CLI_LOGGER,
          timeouts: sshTimeoutsFromEnv(),
        });
      })()
    );
}

/**
 * Create the 'edgeprobe upload' command
 */
// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function makeUploadCommand() {
  return makeTransferCommand("upload");
}

/**
 * Create the 'edgeprobe download' command
 */
// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function makeDownloadCommand() {
  return makeTransferCommand("download");
}
