// pattern: Functional Core
import { TypeCompiler } from "@sinclair/typebox/compiler";
import { readFile } from "fs/promises";
import { extname } from "path";
import { parse as parseYaml } from "yaml";

import { DEFAULT_KEY_PATH, DEFAULT_SSH_PORT } from "../../ssh/types.js";
import {
  ConfigurationError,
  getErrorMessage,
  ValidationError,
} from "../../utils/errors.js";
import { InventoryV1 } from "../types/index.js";

import type { HostTarget } from "../../diagnostics/types.js";
import type { HostV1, UsbIdV1 } from "../types/index.js";

export const DEFAULT_INVENTORY_PATH = "inventory.yaml";

// Compile schema once for reuse
const inventoryValidator = TypeCompiler.Compile(InventoryV1);

export interface Inventory {
  path: string;
  /** In file order */
  hosts: HostTarget[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Loads and parses an inventory file, detecting the format by extension
 * (.yaml/.yml, .json)
 */
export async function loadInventoryFromFile(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(filePath, "utf8");
  } catch (error) {
    throw new ConfigurationError(
      `Inventory not found: ${filePath} (${getErrorMessage(error)})`
    );
  }

  const ext = extname(filePath).toLowerCase();
  try {
    switch (ext) {
      case ".json":
        return JSON.parse(content);
      case ".yaml":
      case ".yml":
        return parseYaml(content);
      default:
        throw new ConfigurationError(
          `Unsupported file format: ${ext || "(none)"}. Supported formats: .yaml, .yml, .json`
        );
    }
  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw error;
    }
    throw new ConfigurationError(
      `Inventory ${filePath} could not be parsed: ${getErrorMessage(error)}`
    );
  }
}

/**
 * Accepts either `{ hosts: { ... } }` or a bare mapping of host names, and
 * validates the result against the inventory schema.
 */
export function validateInventoryObject(data: unknown): InventoryV1 {
  const hosts = data ?? {};
  const nested = isRecord(hosts) ? hosts["hosts"] : undefined;
  // A host literally named "hosts" has a connection block
  const wrapped =
    isRecord(nested) && !("connection" in nested) ? hosts : { hosts };

  if (inventoryValidator.Check(wrapped)) {
    return wrapped;
  }

  const errors = [...inventoryValidator.Errors(wrapped)].map(
    err => `${err.path || "root"}: ${err.message}`
  );
  throw new ValidationError(
    `Inventory validation failed: ${errors.join(", ")}`,
    errors
  );
}

/**
 * Replace `${NAME}` references with values from the environment
 */
export function substituteEnv(
  value: string,
  env: NodeJS.ProcessEnv,
  context: string
): string {
  return value.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (_match, name: string) => {
    const resolved = env[name];
    if (resolved === undefined) {
      throw new ConfigurationError(
        `Environment variable ${name} referenced by ${context} is not set`
      );
    }
    return resolved;
  });
}

/**
 * Normalise a USB vendor or product id to four lowercase hex digits
 */
export function normalizeUsbId(id: UsbIdV1): string {
  const hex =
    typeof id === "number" ? id.toString(16) : id.replace(/^0[xX]/, "").toLowerCase();
  return hex.padStart(4, "0");
}

export function toHostTarget(
  name: string,
  host: HostV1,
  env: NodeJS.ProcessEnv = process.env
): HostTarget {
  const { connection } = host;
  const context = `host "${name}"`;

  return {
    name,
    connection: {
      address: connection.hostname,
      username: connection.username,
      port: connection.port ?? DEFAULT_SSH_PORT,
      keyPath: connection.ssh_key_path ?? DEFAULT_KEY_PATH,
      ...(connection.password !== undefined && {
        password: substituteEnv(connection.password, env, context),
      }),
      ...(connection.key_passphrase !== undefined && {
        keyPassphrase: substituteEnv(connection.key_passphrase, env, context),
      }),
    },
    ...(host.services?.compose_dir !== undefined && {
      composeDir: host.services.compose_dir,
    }),
    systemdServices: host.services?.systemd_services ?? [],
    devices: Object.entries(host.devices ?? {}).map(([deviceName, device]) => ({
      name: deviceName,
      vendorId: normalizeUsbId(device.vendor_id),
      productId: normalizeUsbId(device.product_id),
    })),
  };
}

/**
 * Loads, validates and resolves an inventory file
 */
export async function loadInventory(
  filePath: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<Inventory> {
  const data = await loadInventoryFromFile(filePath);
  const inventory = validateInventoryObject(data);

  return {
    path: filePath,
    hosts: Object.entries(inventory.hosts).map(([name, host]) =>
      toHostTarget(name, host, env)
    ),
  };
}

/**
 * Pick hosts by name, in the order requested. Unknown names are an error.
 */
export function selectHosts(
  inventory: Inventory,
  names: readonly string[]
): HostTarget[] {
  return names.map(name => {
    const host = inventory.hosts.find(candidate => candidate.name === name);
    if (!host) {
      const available = inventory.hosts.map(candidate => candidate.name);
      throw new ConfigurationError(
        `Unknown host: ${name}. Available: ${available.length > 0 ? available.join(", ") : "(none)"}`
      );
    }
    return host;
  });
}
