/**
 * Commander program definition
 */

import { Command, Option } from "commander";
import { createExpandCommand } from "./commands/expand.js";
import { createGenerateCommand } from "./commands/generate.js";
import { createReplicateCommand } from "./commands/replicate.js";
import { createSubstituteCommand } from "./commands/substitute.js";
import { createValidateCommand } from "./commands/validate.js";
import { LOG_LEVELS, isLogLevel, logger } from "../utils/logger.js";

const pkg = {
  name: "monfix",
  version: "0.1.0",
  description:
    "Synthesize and transform monitor-configuration fixtures for load-testing a monitoring service",
};

/**
 * Main CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name(pkg.name)
    .description(pkg.description)
    .version(pkg.version)
    .addOption(
      new Option("--log-level <level>", "Logging verbosity")
        .choices([...LOG_LEVELS])
        .default(logger.getLevel()),
    )
    .hook("preAction", (thisCommand) => {
      const level: unknown = thisCommand.opts()["logLevel"];
      if (isLogLevel(level)) {
        logger.setLevel(level);
      }
    });

  program.addCommand(createGenerateCommand());
  program.addCommand(createExpandCommand());
  program.addCommand(createReplicateCommand());
  program.addCommand(createSubstituteCommand());
  program.addCommand(createValidateCommand());

  return program;
}
