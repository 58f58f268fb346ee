/**
 * Engine configuration loader
 */

import { validateDistributionPolicy } from "../lib/allocator/index.js";
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from "../types/config.js";
import { ConfigError } from "./errors.js";
import { logger } from "./logger.js";

/**
 * CLI options that override engine settings
 */
export interface EngineCliOptions {
  keys?: string; // Comma-separated identifier keys
  namePrefix?: string;
  fetchTimeout?: number;
}

/**
 * Config file section for engine settings
 */
export interface EngineConfigSection {
  distribution?: Partial<EngineConfig["distribution"]>;
  defaultPorts?: Record<string, number>;
  identifierKeys?: string[];
  fetchTimeoutMs?: number;
  expansionNamePrefix?: string;
}

/**
 * Load engine configuration from CLI options and config file
 *
 * @example
 * const config = loadEngineConfig({ keys: "url" }, { fetchTimeoutMs: 5000 });
 * // identifierKeys: ["url"], fetchTimeoutMs: 5000, everything else default
 */
export function loadEngineConfig(
  cliOptions: EngineCliOptions = {},
  configFile: EngineConfigSection = {},
): EngineConfig {
  const identifierKeys = cliOptions.keys
    ? cliOptions.keys
        .split(",")
        .map((key) => key.trim())
        .filter((key) => key !== "")
    : undefined;

  // Precedence: CLI > config file > defaults
  const config: EngineConfig = {
    distribution: {
      ...DEFAULT_ENGINE_CONFIG.distribution,
      ...configFile.distribution,
    },
    defaultPorts: {
      ...DEFAULT_ENGINE_CONFIG.defaultPorts,
      ...configFile.defaultPorts,
    },
    identifierKeys:
      identifierKeys ?? configFile.identifierKeys ?? DEFAULT_ENGINE_CONFIG.identifierKeys,
    fetchTimeoutMs:
      cliOptions.fetchTimeout ?? configFile.fetchTimeoutMs ?? DEFAULT_ENGINE_CONFIG.fetchTimeoutMs,
    expansionNamePrefix:
      cliOptions.namePrefix ??
      configFile.expansionNamePrefix ??
      DEFAULT_ENGINE_CONFIG.expansionNamePrefix,
  };

  validateEngineConfig(config);

  logger.debug("Engine config loaded", {
    distribution: config.distribution,
    identifierKeys: config.identifierKeys,
    fetchTimeoutMs: config.fetchTimeoutMs,
  });

  return config;
}

/**
 * @throws ConfigError if any setting is out of range
 */
export function validateEngineConfig(config: EngineConfig): void {
  validateDistributionPolicy(config.distribution);

  for (const [scheme, port] of Object.entries(config.defaultPorts)) {
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
      throw new ConfigError(`Default port for scheme '${scheme}' must be 1-65535, got ${port}`, {
        scheme,
        port,
      });
    }
  }

  if (config.identifierKeys.length === 0) {
    throw new ConfigError("At least one identifier key must be defined");
  }

  if (!Number.isInteger(config.fetchTimeoutMs) || config.fetchTimeoutMs <= 0) {
    throw new ConfigError(
      `fetchTimeoutMs must be a positive integer, got ${config.fetchTimeoutMs}`,
    );
  }

  if (config.expansionNamePrefix.trim() === "") {
    throw new ConfigError("expansionNamePrefix cannot be empty");
  }
}
