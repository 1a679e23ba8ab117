/**
 * Motion Processor
 *
 * Runs the two transform patterns for every run of a subject/session and
 * skips files whose input is missing or whose output already exists.
 */

import { DERIVED_RUN_TASK } from "../../lib/constants";
import { loggers, type Logger } from "../../lib/logger";
import type {
  FileOutcome,
  ResolvedMotionFile,
  SessionOutcome,
} from "../../types/motion";
import { dirExists, pathExists } from "../../utils/fs";
import { MotionPathResolver, funcDirOf } from "./pathResolver";
import { RunEnumerator } from "./runEnumerator";
import { MotionTableTransformer } from "./tableTransformer";

export interface MotionProcessorOptions {
  transformer?: MotionTableTransformer;
  resolver?: MotionPathResolver;
  runEnumerator?: RunEnumerator;
  logger?: Logger;
}

export class MotionProcessor {
  private readonly transformer: MotionTableTransformer;
  private readonly resolver: MotionPathResolver;
  private readonly runEnumerator: RunEnumerator;
  private readonly logger: Logger;

  constructor(options: MotionProcessorOptions = {}) {
    this.transformer = options.transformer ?? new MotionTableTransformer();
    this.resolver = options.resolver ?? new MotionPathResolver();
    this.runEnumerator = options.runEnumerator ?? new RunEnumerator();
    this.logger = options.logger ?? loggers.processor;
  }

  /**
   * Process one explicitly named run. Returns null when the session has no
   * func directory.
   */
  async processRun(
    root: string,
    subject: string,
    session: string,
    task: string,
    run: string,
  ): Promise<SessionOutcome | null> {
    const funcDir = funcDirOf(root, subject, session);
    if (!(await dirExists(funcDir))) {
      this.logger.error(`func directory does not exist: ${funcDir}`);
      return null;
    }

    const runs = await this.runEnumerator.enumerate({
      mode: "explicit",
      runs: [run],
    });
    return this.processRuns(root, subject, session, task, runs);
  }

  /**
   * Process every rest run counted from the session's dtseries artifact.
   * Returns null when the runs cannot be determined.
   */
  async processSubjectSession(
    root: string,
    subject: string,
    session: string,
  ): Promise<SessionOutcome | null> {
    const funcDir = funcDirOf(root, subject, session);
    if (!(await dirExists(funcDir))) {
      this.logger.error(`func directory does not exist: ${funcDir}`);
      return null;
    }

    const runs = await this.runEnumerator.enumerate({
      mode: "derived",
      funcDir,
      subject,
      session,
    });
    return this.processRuns(root, subject, session, DERIVED_RUN_TASK, runs);
  }

  async processRuns(
    root: string,
    subject: string,
    session: string,
    task: string,
    runs: readonly string[],
  ): Promise<SessionOutcome> {
    const files: FileOutcome[] = [];

    for (const run of runs) {
      this.logger.info(
        `Processing: ${subject}/${session}/func/ - task: ${task}, run: ${run}`,
      );
      const resolved = this.resolver.resolve({
        root,
        subject,
        session,
        task,
        run,
      });
      for (const file of resolved) {
        files.push(await this.processFile(file));
      }
    }

    const processed = files.filter((f) => f.status === "processed").length;
    if (processed > 0) {
      this.logger.info(
        `Successfully processed ${processed} file(s) for ${subject}/${session}`,
      );
    } else {
      this.logger.info(`No files needed processing for ${subject}/${session}`);
    }

    return { subject, session, runs: [...runs], files, processed };
  }

  async processFile(file: ResolvedMotionFile): Promise<FileOutcome> {
    const { inputPath, outputPath, pattern } = file;

    this.logger.info(`Checking pattern: ${pattern.label}`);
    this.logger.debug("Resolved files", { inputPath, outputPath });

    if (!(await pathExists(inputPath))) {
      this.logger.debug("Input file does not exist, skipping...", {
        inputPath,
      });
      return { status: "skipped-input-missing", file };
    }

    if (await pathExists(outputPath)) {
      this.logger.info("Output file already exists, skipping...", {
        outputPath,
      });
      return { status: "skipped-output-exists", file };
    }

    this.logger.info(`Processing ${pattern.label}...`);
    const result = await this.transformer.transform(inputPath, outputPath);
    if (!result.ok) {
      this.logger.error(`Failed to process ${inputPath}`);
      return { status: "failed", file, error: result.error };
    }

    return {
      status: "processed",
      file,
      rows: result.rows,
      columns: result.columns,
    };
  }
}
