/**
 * Shared success/failure handling for CLI commands
 */

import { ErrorCode, toFixtureError } from "../utils/errors.js";
import { logger } from "../utils/logger.js";

export type CommandPhase = "generation" | "expansion" | "replication" | "substitution" | "validation";

export interface CommandResult {
  status: string;
  phase: CommandPhase;
  output?: Record<string, unknown>;
  summary: Record<string, unknown>;
}

export interface CommandOutcome {
  result: CommandResult;
  /** True when the document itself went to stdout */
  wroteToStdout?: boolean;
  exitCode?: number;
}

/**
 * Run a command body, print its JSON result, and map failures to an exit code.
 * CONFIG_ERROR exits 2, every other failure exits 1.
 */
export async function runCommand(
  phase: CommandPhase,
  action: () => Promise<CommandOutcome>,
): Promise<void> {
  try {
    const { result, wroteToStdout, exitCode } = await action();

    if (wroteToStdout) {
      logger.info("Command finished", result);
    } else {
      console.log(JSON.stringify(result, null, 2));
    }
    process.exitCode = exitCode ?? 0;
  } catch (error) {
    const fixtureError = toFixtureError(error);
    logger.debug("Command failed", fixtureError);

    console.error(JSON.stringify(fixtureError.toResponse(phase), null, 2));
    process.exitCode = fixtureError.code === ErrorCode.CONFIG_ERROR ? 2 : 1;
  }
}

/**
 * Commander argument parser for integer options
 */
export function parseIntegerOption(value: string): number {
  return /^-?\d+$/.test(value.trim()) ? parseInt(value, 10) : Number.NaN;
}
