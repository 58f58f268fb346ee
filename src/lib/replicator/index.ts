/**
 * Replicator module - grows an existing monitor list to a target size or by a factor
 */

import { DEFAULT_ENGINE_CONFIG } from "../../types/config.js";
import type { ConfigMapping } from "../../types/data-model.js";
import {
  ConfigError,
  EmptyInputError,
  InvalidReplicationFactorError,
} from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { UniqueNameRegistry } from "./name-registry.js";
import type { ExpansionOptions, ExpansionResult, ReplicationResult } from "./types.js";

export * from "./types.js";
export * from "./name-registry.js";

export const UNNAMED_MONITOR = "Unnamed Monitor";

function nameOf(monitor: ConfigMapping): string | undefined {
  const name = monitor["name"];
  return typeof name === "string" ? name : undefined;
}

function requireMonitors(monitors: readonly ConfigMapping[]): void {
  if (monitors.length === 0) {
    throw new EmptyInputError("No monitors found in input document.");
  }
}

/**
 * Keep every original and append renamed copies, cycling through the
 * originals in order, until `target` monitors exist.
 *
 * Copies are named `{prefix}-{n}` with n counting up from originals + 1;
 * values whose name is already taken are skipped.
 */
export function expandToCount(
  monitors: readonly ConfigMapping[],
  target: number,
  options: ExpansionOptions = {},
): ExpansionResult {
  requireMonitors(monitors);
  if (!Number.isInteger(target) || target < 0) {
    throw new ConfigError(`Target monitor count must be a non-negative integer, got ${target}`, {
      target,
    });
  }

  const originals = monitors.map((monitor) => structuredClone(monitor));
  const originalCount = originals.length;

  if (target <= originalCount) {
    logger.warn("Target count does not exceed existing monitors; nothing to expand", {
      existing: originalCount,
      target,
    });
    return {
      status: "noop",
      monitors: originals,
      originalCount,
      addedCount: 0,
      targetCount: target,
    };
  }

  const prefix = options.namePrefix ?? DEFAULT_ENGINE_CONFIG.expansionNamePrefix;
  const registry = new UniqueNameRegistry(
    originals.map(nameOf).filter((name): name is string => name !== undefined),
  );

  const expanded = [...originals];
  let counter = originalCount;
  for (let i = 0; i < target - originalCount; i++) {
    const source = originals[i % originalCount];
    if (source === undefined) {
      continue;
    }

    let name: string;
    do {
      counter++;
      name = `${prefix}-${counter}`;
    } while (registry.has(name));
    registry.reserve(name);

    expanded.push({ ...structuredClone(source), name });
  }

  logger.info("Expanded monitors", {
    existing: originalCount,
    added: expanded.length - originalCount,
    total: expanded.length,
  });

  return {
    status: "expanded",
    monitors: expanded,
    originalCount,
    addedCount: expanded.length - originalCount,
    targetCount: target,
  };
}

/**
 * @throws InvalidReplicationFactorError unless factor is a positive integer
 */
export function assertReplicationFactor(factor: number): void {
  if (!Number.isInteger(factor) || factor <= 0) {
    throw new InvalidReplicationFactorError(
      `Number of replications must be a positive integer, got ${factor}`,
      { factor },
    );
  }
}

/**
 * Produce `factor` full passes over the originals, each copy renamed
 * `{name} - Copy {pass}`. Originals are not part of the output.
 */
export function replicateByFactor(
  monitors: readonly ConfigMapping[],
  factor: number,
): ReplicationResult {
  assertReplicationFactor(factor);
  requireMonitors(monitors);

  // Originals are reserved too: no copy may take an original's name
  const registry = new UniqueNameRegistry(
    monitors.map(nameOf).filter((name): name is string => name !== undefined),
  );
  const replicated: ConfigMapping[] = [];

  for (let pass = 1; pass <= factor; pass++) {
    for (const monitor of monitors) {
      const copy = structuredClone(monitor);
      copy["name"] = registry.reserve(`${nameOf(monitor) ?? UNNAMED_MONITOR} - Copy ${pass}`);
      replicated.push(copy);
    }
  }

  logger.info("Replicated monitors", {
    original: monitors.length,
    factor,
    total: replicated.length,
  });

  return { monitors: replicated, originalCount: monitors.length, factor };
}
