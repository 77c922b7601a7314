// pattern: Imperative Shell

import { loadInventory, type Inventory } from "../../config/loaders/inventory-loader.js";
import { CLI_LOGGER } from "../_deps.js";
import { getInventoryPath } from "../_globals.js";

import { withErrorHandling } from "./with-error-handling.js";

/**
 * Wraps a Commander action so it receives the loaded inventory as its first
 * argument. Loading and action failures both go through `withErrorHandling`.
 */
export function withInventoryAndErrorHandling<Args extends unknown[]>(
  action: (inventory: Inventory, ...args: Args) => Promise<void> | void
): (...args: Args) => Promise<void> {
  return withErrorHandling(async (...args: Args): Promise<void> => {
    const inventoryPath = getInventoryPath();
    const inventory = await loadInventory(inventoryPath);

    CLI_LOGGER.debug(
      `Inventory loaded from ${inventoryPath} (${inventory.hosts.length} host(s))`
    );

    await action(inventory, ...args);
  });
}
