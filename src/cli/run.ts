import { UsageError, errorMessage } from "../lib/errors";
import { loggers } from "../lib/logger";
import { MotionProcessor } from "../services/motion";
import { dirExists } from "../utils/fs";
import { parseRunArgs, type RunCommand } from "./args";
import type { CliContext } from "./app";
import {
  RUN_HELP,
  RUN_PROG,
  RUN_USAGE,
  formatUsageError,
  processIO,
} from "./usage";

/**
 * Single-run entry point. Resolves to the process exit code.
 */
export async function runSingle(
  args: readonly string[],
  context: CliContext = {},
): Promise<number> {
  const io = context.io ?? processIO;
  const logger = context.logger ?? loggers.cli;

  let command: RunCommand;
  try {
    command = parseRunArgs(args);
  } catch (error) {
    if (error instanceof UsageError) {
      io.err(formatUsageError(RUN_USAGE, RUN_PROG, error.message));
      return 2;
    }
    throw error;
  }

  if (command.kind === "help") {
    io.out(RUN_HELP);
    return 0;
  }

  const { dataDir, subject, session, task, run } = command.options;
  if (!(await dirExists(dataDir))) {
    logger.error(`Data directory does not exist: ${dataDir}`);
    return 1;
  }

  const processor = context.processor ?? new MotionProcessor();
  try {
    await processor.processRun(dataDir, subject, session, task, run);
  } catch (error) {
    logger.error(`Error: ${errorMessage(error)}`);
    return 1;
  }

  io.out("Processing completed!\n");
  return 0;
}
