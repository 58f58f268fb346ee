/**
 * Configuration file parser - supports JSON and YAML
 */

import { readFileSync } from "fs";
import { Ajv } from "ajv";
import { parse as parseYaml } from "yaml";
import { ConfigError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import type { FixtureConfigFile } from "./types.js";

const positiveInteger = { type: "integer", minimum: 1 } as const;

const CONFIG_FILE_SCHEMA = {
  type: "object",
  additionalProperties: false,
  properties: {
    engine: {
      type: "object",
      additionalProperties: false,
      properties: {
        distribution: {
          type: "object",
          additionalProperties: false,
          properties: {
            http: { type: "number" },
            tcp: { type: "number" },
            icmp: { type: "number" },
          },
        },
        defaultPorts: { type: "object", additionalProperties: { type: "integer" } },
        identifierKeys: { type: "array", items: { type: "string", minLength: 1 } },
        fetchTimeoutMs: positiveInteger,
        expansionNamePrefix: { type: "string" },
      },
    },
    generate: {
      type: "object",
      additionalProperties: false,
      properties: { fromUrl: { type: "boolean" } },
    },
    expand: {
      type: "object",
      additionalProperties: false,
      properties: { count: { type: "integer", minimum: 0 } },
    },
    replicate: {
      type: "object",
      additionalProperties: false,
      properties: { factor: { type: "integer" } },
    },
    substitute: {
      type: "object",
      additionalProperties: false,
      properties: {
        endpointsFile: { type: "string" },
        endpointsUrl: { type: "string" },
      },
    },
  },
} as const;

const validateConfigShape = new Ajv({ allErrors: true }).compile<FixtureConfigFile>(
  CONFIG_FILE_SCHEMA,
);

/**
 * Parse configuration file (JSON or YAML)
 */
export function parseConfigFile(filePath: string): FixtureConfigFile {
  logger.info("Parsing configuration file", { filePath });

  // Determine format from file extension
  const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
  const isJson = filePath.endsWith(".json");

  if (!isYaml && !isJson) {
    throw new ConfigError(
      `Unsupported config file format: ${filePath}. Must be .json, .yaml, or .yml`,
      { filePath },
    );
  }

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Failed to read config file: ${filePath}`, { filePath }, {
      cause: error,
    });
  }

  let parsed: unknown;
  try {
    parsed = isYaml ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${filePath}`, { filePath }, {
      cause: error,
    });
  }

  // An empty YAML file is an empty configuration
  const config = parsed ?? {};
  if (!validateConfigShape(config)) {
    const problems = (validateConfigShape.errors ?? []).map(
      (error) => `${error.instancePath || "/"} ${error.message ?? "is invalid"}`,
    );
    throw new ConfigError(`Invalid config file ${filePath}: ${problems.join("; ")}`, {
      filePath,
      problems,
    });
  }

  logger.info("Configuration file parsed successfully", {
    sections: Object.keys(config),
  });

  return config;
}
