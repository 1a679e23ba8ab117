import { join } from "node:path";
import { DERIVED_RUN_TASK, SAMPLES_PER_RUN } from "../../lib/constants";
import { errorMessage } from "../../lib/errors";
import { loggers, type Logger } from "../../lib/logger";
import type { RunSource } from "../../types/motion";
import { dirExists, fileExists } from "../../utils/fs";
import { readNiftiShape } from "../../utils/niftiHeader";

export type ShapeReader = (filePath: string) => Promise<number[]>;

export interface RunEnumeratorOptions {
  readShape?: ShapeReader;
  samplesPerRun?: number;
  logger?: Logger;
}

export function dtseriesFileName(subject: string, session: string): string {
  return `${subject}_${session}_task-${DERIVED_RUN_TASK}_bold_desc-filtered_timeseries.dtseries.nii`;
}

/** run-01 … run-NN for `floor(sampleCount / samplesPerRun)` runs */
export function runLabelsFromSampleCount(
  sampleCount: number,
  samplesPerRun: number = SAMPLES_PER_RUN,
): string[] {
  const runCount = Math.floor(sampleCount / samplesPerRun);
  const runs: string[] = [];
  for (let run = 1; run <= runCount; run++) {
    runs.push(`run-${String(run).padStart(2, "0")}`);
  }
  return runs;
}

export class RunEnumerator {
  private readonly readShape: ShapeReader;
  private readonly samplesPerRun: number;
  private readonly logger: Logger;

  constructor(options: RunEnumeratorOptions = {}) {
    this.readShape = options.readShape ?? readNiftiShape;
    this.samplesPerRun = options.samplesPerRun ?? SAMPLES_PER_RUN;
    this.logger = options.logger ?? loggers.runs;
  }

  async enumerate(source: RunSource): Promise<string[]> {
    if (source.mode === "explicit") {
      return [...source.runs];
    }

    const { funcDir, subject, session } = source;
    if (!(await dirExists(funcDir))) {
      this.logger.error(`func directory does not exist: ${funcDir}`);
      return [];
    }

    const dtseries = join(funcDir, dtseriesFileName(subject, session));
    if (!(await fileExists(dtseries))) {
      this.logger.error(`dtseries file does not exist: ${dtseries}`);
      return [];
    }

    let shape: number[];
    try {
      shape = await this.readShape(dtseries);
    } catch (error) {
      this.logger.error(`Failed to read dtseries header: ${dtseries}`, {
        error: errorMessage(error),
      });
      return [];
    }

    if (shape.length === 0) {
      this.logger.error(`dtseries header reports no dimensions: ${dtseries}`);
      return [];
    }

    const sampleCount = shape[0];
    const runs = runLabelsFromSampleCount(sampleCount, this.samplesPerRun);
    this.logger.info(`Number of timepoints: ${sampleCount}`);
    this.logger.info(`Number of ${DERIVED_RUN_TASK} runs: ${runs.length}`);
    return runs;
  }
}
