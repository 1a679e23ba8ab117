/**
 * Motion Table Type Definitions
 */

import type { MotionTableError } from "../lib/errors";

/** Ordered pairs of `[sourceColumn, outputColumn]` */
export type ColumnMapping = ReadonlyArray<readonly [string, string]>;

export interface TransformPattern {
  /** Suffix of the upstream table, e.g. "_desc-includingFD_motion.tsv" */
  inputSuffix: string;
  /** Suffix of the derived table, e.g. "_motion.tsv" */
  outputSuffix: string;
  /** Human-readable label used in logs */
  label: string;
}

export interface RunLocator {
  root: string;
  /** Subject directory name, e.g. "sub-01" */
  subject: string;
  /** Session directory name, e.g. "ses-01" */
  session: string;
  /** Task label without the "task-" prefix, e.g. "rest" */
  task: string;
  /** Run identifier as found in input names, e.g. "run-01" */
  run: string;
}

export interface ResolvedMotionFile {
  inputPath: string;
  outputPath: string;
  pattern: TransformPattern;
}

export interface MotionTable {
  columns: string[];
  rows: string[][];
}

export type TransformResult =
  | { ok: true; rows: number; columns: number }
  | { ok: false; error: MotionTableError };

export type FileOutcome =
  | { status: "processed"; file: ResolvedMotionFile; rows: number; columns: number }
  | { status: "skipped-input-missing"; file: ResolvedMotionFile }
  | { status: "skipped-output-exists"; file: ResolvedMotionFile }
  | { status: "failed"; file: ResolvedMotionFile; error: MotionTableError };

export interface SessionOutcome {
  subject: string;
  session: string;
  runs: string[];
  files: FileOutcome[];
  /** Number of files written for this subject/session */
  processed: number;
}

export type RunSource =
  | { mode: "explicit"; runs: readonly string[] }
  | { mode: "derived"; funcDir: string; subject: string; session: string };

export type AnalysisLevel = "participant" | "group";

export type AnalysisRequest =
  | {
      level: "participant";
      participantLabels?: readonly string[];
      sessionLabels?: readonly string[];
    }
  | { level: "group" };

export interface AnalysisSummary {
  level: AnalysisLevel;
  sessions: SessionOutcome[];
  /** Subject/session pairs that could not be visited */
  skippedPairs: number;
  filesProcessed: number;
  filesSkipped: number;
  filesFailed: number;
}
