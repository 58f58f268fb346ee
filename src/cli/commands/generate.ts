import { Command } from "commander";
import { loadEndpoints } from "../../lib/endpoints/source.js";
import { isStdoutTarget, saveDocument } from "../../lib/emitter/document-writer.js";
import { generateMonitorsFromEndpoints } from "../../lib/synthesizer/index.js";
import { loadEngineConfig } from "../../utils/config-loader.js";
import { logger } from "../../utils/logger.js";
import { parseConfigFile } from "../config/parser.js";
import type { FixtureConfigFile, GenerateCommandOptions } from "../config/types.js";
import { parseIntegerOption, runCommand, type CommandOutcome } from "../command-runner.js";

export async function runGenerate(
  endpointsSource: string,
  outputPath: string,
  options: GenerateCommandOptions,
): Promise<CommandOutcome> {
  const configFile: FixtureConfigFile = options.config ? parseConfigFile(options.config) : {};
  const engine = loadEngineConfig({ fetchTimeout: options.fetchTimeout }, configFile.engine);
  const fromUrl = options.fromUrl ?? configFile.generate?.fromUrl ?? false;

  const lines = await loadEndpoints({
    kind: fromUrl ? "url" : "file",
    location: endpointsSource,
    timeoutMs: engine.fetchTimeoutMs,
  });

  const { monitors, plan } = generateMonitorsFromEndpoints(lines, {
    distribution: engine.distribution,
    defaultPorts: engine.defaultPorts,
  });

  const written = await saveDocument({ monitors }, outputPath);
  logger.info(`Wrote ${monitors.length} monitors to ${written.destination}.`);

  return {
    wroteToStdout: isStdoutTarget(outputPath),
    result: {
      status: "success",
      phase: "generation",
      output: { ...written },
      summary: {
        endpoints: lines.length,
        monitors: monitors.length,
        distribution: plan,
      },
    },
  };
}

/**
 * Create generate command
 */
export function createGenerateCommand(): Command {
  return new Command("generate")
    .description(
      "Generate monitor definitions from an endpoint list (80% HTTP, 10% TCP, 10% ICMP)",
    )
    .argument("<endpoints>", "Endpoints text file, or URL with --from-url")
    .argument("<output>", 'Output document path (.yaml, .yml, .json, or "-")')
    .option("--from-url", "Treat <endpoints> as a URL to fetch")
    .option("--fetch-timeout <ms>", "Timeout for fetching endpoints", parseIntegerOption)
    .option("--config <path>", "Path to configuration file (JSON/YAML)")
    .action(async (endpoints: string, output: string, opts: GenerateCommandOptions) => {
      await runCommand("generation", () => runGenerate(endpoints, output, opts));
    });
}
