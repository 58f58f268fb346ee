import { Command } from "commander";
import { loadMonitorDocument } from "../../lib/document/loader.js";
import { isStdoutTarget, saveDocument } from "../../lib/emitter/document-writer.js";
import { assertReplicationFactor, replicateByFactor } from "../../lib/replicator/index.js";
import { ConfigError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { parseConfigFile } from "../config/parser.js";
import type { FixtureConfigFile, ReplicateCommandOptions } from "../config/types.js";
import { parseIntegerOption, runCommand, type CommandOutcome } from "../command-runner.js";

export async function runReplicate(
  inputPath: string,
  outputPath: string,
  options: ReplicateCommandOptions,
): Promise<CommandOutcome> {
  const configFile: FixtureConfigFile = options.config ? parseConfigFile(options.config) : {};

  const factor = options.factor ?? configFile.replicate?.factor;
  if (factor === undefined) {
    throw new ConfigError("--factor is required");
  }
  assertReplicationFactor(factor);

  const document = await loadMonitorDocument(inputPath);
  const result = replicateByFactor(document.monitors, factor);

  // Only the copies are written; the originals are not part of the output
  const written = await saveDocument({ monitors: result.monitors }, outputPath);
  logger.info(
    `Replicated ${result.originalCount} monitors ${factor} times; generated ${result.monitors.length} total.`,
  );

  return {
    wroteToStdout: isStdoutTarget(outputPath),
    result: {
      status: "success",
      phase: "replication",
      output: { ...written },
      summary: {
        originalMonitors: result.originalCount,
        factor,
        totalMonitors: result.monitors.length,
      },
    },
  };
}

/**
 * Create replicate command
 */
export function createReplicateCommand(): Command {
  return new Command("replicate")
    .description("Replicate every monitor N times with unique names (originals excluded)")
    .argument("<input>", "Input monitor document")
    .argument("<output>", 'Output document path (.yaml, .yml, .json, or "-")')
    .option("--factor <number>", "Number of copies of each monitor", parseIntegerOption)
    .option("--config <path>", "Path to configuration file (JSON/YAML)")
    .action(async (input: string, output: string, opts: ReplicateCommandOptions) => {
      await runCommand("replication", () => runReplicate(input, output, opts));
    });
}
