import { Command } from "commander";
import { writeFile } from "fs/promises";
import { loadMonitorDocument } from "../../lib/document/loader.js";
import { validateMonitors } from "../../lib/validator/index.js";
import { StorageError, ValidationError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import type { ValidateCommandOptions } from "../config/types.js";
import { runCommand, type CommandOutcome } from "../command-runner.js";

/**
 * Validate a monitor document; a failing report is an error carrying the report
 */
export async function runValidate(
  inputPath: string,
  options: ValidateCommandOptions,
): Promise<CommandOutcome> {
  const document = await loadMonitorDocument(inputPath);
  const report = validateMonitors(document.monitors);

  if (options.reportPath) {
    try {
      await writeFile(options.reportPath, JSON.stringify(report, null, 2) + "\n", "utf-8");
    } catch (error) {
      throw new StorageError(
        `Failed to write validation report: ${options.reportPath}`,
        { path: options.reportPath },
        { cause: error },
      );
    }
    logger.info("Validation report written", { path: options.reportPath });
  }

  if (!report.passed) {
    throw new ValidationError(
      `${report.invalidMonitors} invalid monitors, ${
        Object.keys(report.nameUniqueness.duplicates).length
      } duplicated names in ${inputPath}`,
      {
        invalidMonitors: report.invalidMonitors,
        violations: report.violations.slice(0, 20),
        duplicateNames: report.nameUniqueness.duplicates,
      },
    );
  }

  return {
    result: {
      status: "success",
      phase: "validation",
      summary: {
        totalMonitors: report.totalMonitors,
        uniqueNames: report.nameUniqueness.uniqueNames,
      },
    },
  };
}

/**
 * Create validate command
 */
export function createValidateCommand(): Command {
  return new Command("validate")
    .description("Check monitor definitions for structural problems and duplicate names")
    .argument("<input>", "Monitor document to validate")
    .option("--report-path <path>", "Write the full JSON validation report here")
    .action(async (input: string, opts: ValidateCommandOptions) => {
      await runCommand("validation", () => runValidate(input, opts));
    });
}
