// pattern: Imperative Shell
// CLI command that lists the hosts in the inventory

import { Command } from "@commander-js/extra-typings";
import Table from "cli-table3";

import { withInventoryAndErrorHandling } from "./_utils/with-inventory.js";
import { isNonInteractive } from "./_globals.js";

import type { HostTarget } from "../diagnostics/types.js";

/**
 * Host summary safe to print: passwords are reduced to a flag
 */
export interface HostListing {
  name: string;
  address: string;
  username: string;
  port: number;
  keyPath: string | null;
  hasPassword: boolean;
  composeDir: string | null;
  systemdServices: string[];
  devices: string[];
}

export function toHostListing(host: HostTarget): HostListing {
  return {
    name: host.name,
    address: host.connection.address,
    username: host.connection.username,
    port: host.connection.port,
    keyPath: host.connection.keyPath ?? null,
    hasPassword: host.connection.password !== undefined,
    composeDir: host.composeDir ?? null,
    systemdServices: [...host.systemdServices],
    devices: host.devices.map(
      device => `${device.name} (${device.vendorId}:${device.productId})`
    ),
  };
}

export function formatHostsTable(
  hosts: readonly HostTarget[],
  colorize: boolean
): string {
  const table = new Table({
    head: ["Host", "Login", "Password", "Services", "Devices"],
    ...(!colorize && { style: { head: [], border: [] } }),
  });

  for (const listing of hosts.map(toHostListing)) {
    const login =
      listing.port === 22
        ? `${listing.username}@${listing.address}`
        : `${listing.username}@${listing.address}:${listing.port}`;
    const services = [
      ...(listing.composeDir ? [`compose: ${listing.composeDir}`] : []),
      ...listing.systemdServices,
    ];

    table.push([
      listing.name,
      login,
      listing.hasPassword ? "yes" : "no",
      services.join("\n") || "-",
      listing.devices.join("\n") || "-",
    ]);
  }

  return table.toString();
}

/**
 * Create the 'edgeprobe hosts' command
 */
// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function makeHostsCommand() {
  return new Command("hosts")
    .description("List the hosts in the inventory")
    .option("--json", "Output as JSON instead of a table", false)
    .action(options =>
      withInventoryAndErrorHandling(inventory => {
        if (options.json) {
          process.stdout.write(
            `${JSON.stringify(inventory.hosts.map(toHostListing), null, 2)}\n`
          );
          return;
        }

        if (inventory.hosts.length === 0) {
          process.stdout.write(`No hosts defined in ${inventory.path}\n`);
          return;
        }

        process.stdout.write(
          `${formatHostsTable(inventory.hosts, !isNonInteractive())}\n`
        );
      })()
    );
}
