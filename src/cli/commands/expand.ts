import { Command } from "commander";
import { loadMonitorDocument } from "../../lib/document/loader.js";
import { isStdoutTarget, saveDocument } from "../../lib/emitter/document-writer.js";
import { expandToCount } from "../../lib/replicator/index.js";
import { loadEngineConfig } from "../../utils/config-loader.js";
import { ConfigError } from "../../utils/errors.js";
import { parseConfigFile } from "../config/parser.js";
import type { ExpandCommandOptions, FixtureConfigFile } from "../config/types.js";
import { parseIntegerOption, runCommand, type CommandOutcome } from "../command-runner.js";

export async function runExpand(
  inputPath: string,
  outputPath: string,
  options: ExpandCommandOptions,
): Promise<CommandOutcome> {
  const configFile: FixtureConfigFile = options.config ? parseConfigFile(options.config) : {};
  const engine = loadEngineConfig({ namePrefix: options.namePrefix }, configFile.engine);

  const count = options.count ?? configFile.expand?.count;
  if (count === undefined) {
    throw new ConfigError("--count is required");
  }

  const document = await loadMonitorDocument(inputPath);
  const result = expandToCount(document.monitors, count, {
    namePrefix: engine.expansionNamePrefix,
  });

  // Other top-level keys of the input are carried over
  const written = await saveDocument({ ...document, monitors: result.monitors }, outputPath);

  return {
    wroteToStdout: isStdoutTarget(outputPath),
    result: {
      status: result.status === "noop" ? "noop" : "success",
      phase: "expansion",
      output: { ...written },
      summary: {
        originalMonitors: result.originalCount,
        addedMonitors: result.addedCount,
        totalMonitors: result.monitors.length,
        targetCount: result.targetCount,
      },
    },
  };
}

/**
 * Create expand command
 */
export function createExpandCommand(): Command {
  return new Command("expand")
    .description("Grow a monitor list to a target count by cycling renamed copies")
    .argument("<input>", "Input monitor document")
    .argument("<output>", 'Output document path (.yaml, .yml, .json, or "-")')
    .option("--count <number>", "Total number of monitors wanted", parseIntegerOption)
    .option("--name-prefix <prefix>", "Prefix for generated monitor names")
    .option("--config <path>", "Path to configuration file (JSON/YAML)")
    .action(async (input: string, output: string, opts: ExpandCommandOptions) => {
      await runCommand("expansion", () => runExpand(input, output, opts));
    });
}
