// pattern: Functional Core
// Ordered, named probes grouped by category

import { DEVICE_PROBES } from "./probes/devices.js";
import { NETWORK_PROBES } from "./probes/network.js";
import { SERVICE_PROBES } from "./probes/services.js";
import { SYSTEM_PROBES } from "./probes/system.js";
import { CHECK_CATEGORIES, type CheckCategory, type Probe } from "./types.js";

/**
 * Holds probes in registration order. New checks are added by registering
 * another probe; the orchestrator never looks at probe names.
 */
export class CheckRegistry {
  private readonly probes: Probe[] = [];

  register(probe: Probe): this {
    if (this.probes.some(existing => existing.name === probe.name)) {
      throw new Error(`A probe named "${probe.name}" is already registered`);
    }
    this.probes.push(probe);
    return this;
  }

  forCategory(category: CheckCategory): readonly Probe[] {
    return this.probes.filter(probe => probe.category === category);
  }

  names(): string[] {
    return this.probes.map(probe => probe.name);
  }

  get size(): number {
    return this.probes.length;
  }
}

export function createDefaultRegistry(): CheckRegistry {
  const registry = new CheckRegistry();
  for (const probe of [
    ...SYSTEM_PROBES,
    ...NETWORK_PROBES,
    ...SERVICE_PROBES,
    ...DEVICE_PROBES,
  ]) {
    registry.register(probe);
  }
  return registry;
}

/**
 * Requested categories in execution order. An empty request means all.
 */
export function resolveCategories(
  requested: readonly CheckCategory[] = []
): CheckCategory[] {
  if (requested.length === 0) {
    return [...CHECK_CATEGORIES];
  }
  return CHECK_CATEGORIES.filter(category => requested.includes(category));
}

export function isCheckCategory(value: string): value is CheckCategory {
  return CHECK_CATEGORIES.some(category => category === value);
}
