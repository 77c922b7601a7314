// pattern: Imperative Shell

import { resolve } from "node:path";

import { DEFAULT_INVENTORY_PATH } from "../config/loaders/inventory-loader.js";

// Global inventory file override
let INVENTORY_PATH: string | undefined;

// Global non-interactive flag
let NON_INTERACTIVE = false;

/**
 * Set the inventory file override
 */
export function setInventoryPath(path: string | undefined): void {
  INVENTORY_PATH = path ? resolve(path) : undefined;
}

/**
 * Get the inventory file path
 * Uses override, then EDGEPROBE_INVENTORY env var, then ./inventory.yaml
 */
export function getInventoryPath(): string {
  if (INVENTORY_PATH) {
    return INVENTORY_PATH;
  }

  const envInventory = process.env["EDGEPROBE_INVENTORY"];
  if (envInventory) {
    return resolve(envInventory);
  }

  return resolve(DEFAULT_INVENTORY_PATH);
}

export function setNonInteractive(nonInteractive: boolean): void {
  NON_INTERACTIVE = nonInteractive;
}

/**
 * Whether output should avoid colour and other terminal niceties
 */
export function isNonInteractive(): boolean {
  return NON_INTERACTIVE;
}
