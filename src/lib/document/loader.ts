/**
 * Configuration document loading - YAML or JSON, chosen by file extension
 */

import { readFile } from "fs/promises";
import { parse as parseYaml } from "yaml";
import {
  isConfigMapping,
  type ConfigMapping,
  type ConfigValue,
  type MonitorDocument,
} from "../../types/data-model.js";
import { EmptyInputError, StorageError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

/**
 * Narrow a parsed value to the ConfigValue shape, rejecting anything YAML
 * can produce that has no place in a configuration tree.
 */
export function asConfigValue(value: unknown, path = "$"): ConfigValue {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "boolean" ||
    (typeof value === "number" && Number.isFinite(value))
  ) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item, index) => asConfigValue(item, `${path}[${index}]`));
  }
  if (isConfigMapping(value)) {
    // fromEntries defines own keys, so "__proto__" stays an ordinary key
    return Object.fromEntries(
      Object.entries(value).map(([key, child]): [string, ConfigValue] => [
        key,
        asConfigValue(child, `${path}.${key}`),
      ]),
    );
  }
  throw new StorageError(`Unsupported value at ${path}`, { path, type: typeof value });
}

/**
 * Parse document text. JSON is valid YAML, so one parser covers both.
 */
export function parseDocument(content: string, source: string): ConfigValue {
  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (error) {
    throw new StorageError(`Failed to parse document: ${source}`, { source }, { cause: error });
  }
  // An empty file parses to null
  return asConfigValue(parsed ?? null);
}

export async function loadDocument(path: string): Promise<ConfigValue> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    throw new StorageError(`Failed to read document: ${path}`, { path }, { cause: error });
  }

  const document = parseDocument(content, path);
  logger.debug("Loaded document", { path });
  return document;
}

/**
 * Check that a document holds a non-empty `monitors` list of mappings
 */
export function asMonitorDocument(document: ConfigValue, source: string): MonitorDocument {
  if (!isConfigMapping(document)) {
    throw new StorageError(`Document root must be a mapping: ${source}`, { source });
  }

  const monitors = document["monitors"];
  if (!Array.isArray(monitors)) {
    throw new StorageError(
      `'monitors' key not found or is not a list in ${source}`,
      { source },
    );
  }

  const mappings: ConfigMapping[] = [];
  monitors.forEach((monitor, index) => {
    if (!isConfigMapping(monitor)) {
      throw new StorageError(`Monitor at index ${index} is not a mapping in ${source}`, {
        source,
        index,
      });
    }
    mappings.push(monitor);
  });

  if (mappings.length === 0) {
    throw new EmptyInputError(`No monitors found in ${source}`, { source });
  }

  return { ...document, monitors: mappings };
}

export async function loadMonitorDocument(path: string): Promise<MonitorDocument> {
  const document = asMonitorDocument(await loadDocument(path), path);
  logger.info("Loaded monitor document", { path, monitors: document.monitors.length });
  return document;
}
