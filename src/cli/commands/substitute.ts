import { Command } from "commander";
import { loadDocument } from "../../lib/document/loader.js";
import { isStdoutTarget, saveDocument } from "../../lib/emitter/document-writer.js";
import { loadEndpoints } from "../../lib/endpoints/source.js";
import { substituteIdentifiers } from "../../lib/walker/index.js";
import { loadEngineConfig } from "../../utils/config-loader.js";
import { ConfigError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { parseConfigFile } from "../config/parser.js";
import type { FixtureConfigFile, SubstituteCommandOptions } from "../config/types.js";
import { parseIntegerOption, runCommand, type CommandOutcome } from "../command-runner.js";

export async function runSubstitute(
  inputPath: string,
  outputPath: string,
  options: SubstituteCommandOptions,
): Promise<CommandOutcome> {
  const configFile: FixtureConfigFile = options.config ? parseConfigFile(options.config) : {};
  const engine = loadEngineConfig(
    { keys: options.keys, fetchTimeout: options.fetchTimeout },
    configFile.engine,
  );

  // A source given on the command line replaces both config file sources
  const fromCli = options.endpointsFile !== undefined || options.endpointsUrl !== undefined;
  const endpointsFile = fromCli ? options.endpointsFile : configFile.substitute?.endpointsFile;
  const endpointsUrl = fromCli ? options.endpointsUrl : configFile.substitute?.endpointsUrl;

  if (endpointsFile !== undefined && endpointsUrl !== undefined) {
    throw new ConfigError("--endpoints-file and --endpoints-url are mutually exclusive");
  }

  let replacements: string[];
  if (endpointsFile !== undefined) {
    logger.info("Loading endpoints from file", { path: endpointsFile });
    replacements = await loadEndpoints({ kind: "file", location: endpointsFile });
  } else if (endpointsUrl !== undefined) {
    logger.info("Loading endpoints from URL", { url: endpointsUrl });
    replacements = await loadEndpoints({
      kind: "url",
      location: endpointsUrl,
      timeoutMs: engine.fetchTimeoutMs,
    });
  } else {
    throw new ConfigError("One of --endpoints-file or --endpoints-url is required");
  }

  const document = await loadDocument(inputPath);
  const result = substituteIdentifiers(document, replacements, {
    identifierKeys: engine.identifierKeys,
  });

  const written = await saveDocument(result.document, outputPath);

  return {
    wroteToStdout: isStdoutTarget(outputPath),
    result: {
      status: result.status === "unchanged" ? "unchanged" : "success",
      phase: "substitution",
      output: { ...written },
      summary: {
        occurrences: result.occurrences,
        distinctIdentifiers: result.distinct,
        replacementsAvailable: replacements.length,
        identifierKeys: engine.identifierKeys,
      },
    },
  };
}

/**
 * Create substitute command
 */
export function createSubstituteCommand(): Command {
  return new Command("substitute")
    .description("Replace url/host values anywhere in a document with endpoints from a list")
    .argument("<input>", "Input document (any structure)")
    .argument("<output>", 'Output document path (.yaml, .yml, .json, or "-")')
    .option("--endpoints-file <path>", "Text file with one replacement endpoint per line")
    .option("--endpoints-url <url>", "URL returning one replacement endpoint per line")
    .option("--keys <keys>", "Comma-separated keys whose values are replaced (default: url,host)")
    .option("--fetch-timeout <ms>", "Timeout for fetching endpoints", parseIntegerOption)
    .option("--config <path>", "Path to configuration file (JSON/YAML)")
    .action(async (input: string, output: string, opts: SubstituteCommandOptions) => {
      await runCommand("substitution", () => runSubstitute(input, output, opts));
    });
}
