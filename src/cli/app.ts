import { APP_NAME, APP_VERSION } from "../lib/constants";
import { UsageError, ValidationFailure, errorMessage } from "../lib/errors";
import { loggers, type Logger } from "../lib/logger";
import { validateBIDSDataset } from "../services/bids";
import { MotionProcessor, runAnalysis } from "../services/motion";
import type { AnalysisRequest } from "../types/motion";
import { dirExists } from "../utils/fs";
import { parseAppArgs, type AppCommand, type AppOptions } from "./args";
import {
  APP_HELP,
  APP_PROG,
  APP_USAGE,
  formatUsageError,
  processIO,
  type CliIO,
} from "./usage";

export interface CliContext {
  io?: CliIO;
  logger?: Logger;
  processor?: MotionProcessor;
}

function toRequest(options: AppOptions): AnalysisRequest {
  if (options.analysisLevel === "group") {
    return { level: "group" };
  }
  return {
    level: "participant",
    participantLabels: options.participantLabels,
    sessionLabels: options.sessionLabels,
  };
}

async function validateDataset(bidsDir: string, logger: Logger) {
  logger.info("Running BIDS validation...");
  const result = await validateBIDSDataset(bidsDir);

  for (const warning of result.warnings) {
    logger.warn(warning.message, { code: warning.code, path: warning.path });
  }
  if (!result.valid) {
    for (const error of result.errors) {
      logger.error(error.message, { code: error.code, path: error.path });
    }
    return false;
  }

  logger.info("BIDS validation completed successfully");
  return true;
}

/**
 * Batch entry point. Resolves to the process exit code.
 */
export async function runApp(
  args: readonly string[],
  context: CliContext = {},
): Promise<number> {
  const io = context.io ?? processIO;
  const logger = context.logger ?? loggers.cli;

  let command: AppCommand;
  try {
    command = parseAppArgs(args);
  } catch (error) {
    if (error instanceof UsageError) {
      io.err(formatUsageError(APP_USAGE, APP_PROG, error.message));
      return 2;
    }
    throw error;
  }

  if (command.kind === "help") {
    io.out(APP_HELP);
    return 0;
  }
  if (command.kind === "version") {
    io.out(`${APP_NAME} v${APP_VERSION}\n`);
    return 0;
  }

  const { options } = command;
  if (!(await dirExists(options.bidsDir))) {
    logger.error(`BIDS directory does not exist: ${options.bidsDir}`);
    return 1;
  }

  if (!options.skipBidsValidator) {
    if (!(await validateDataset(options.bidsDir, logger))) {
      logger.error("BIDS validation failed");
      return 1;
    }
  }

  try {
    const summary = await runAnalysis(
      options.bidsDir,
      toRequest(options),
      context.processor,
    );
    logger.info("Analysis summary", {
      sessions: summary.sessions.length,
      skippedPairs: summary.skippedPairs,
      filesProcessed: summary.filesProcessed,
      filesSkipped: summary.filesSkipped,
      filesFailed: summary.filesFailed,
    });
  } catch (error) {
    if (error instanceof ValidationFailure) {
      logger.error(error.message);
    } else {
      logger.error(`Error during analysis: ${errorMessage(error)}`);
    }
    return 1;
  }

  logger.info(
    "Processing completed successfully for all the participants and sessions!",
  );
  return 0;
}
