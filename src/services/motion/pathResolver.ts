import { join } from "node:path";
import { FUNC_DIR_NAME, TRANSFORM_PATTERNS } from "../../lib/constants";
import type {
  ResolvedMotionFile,
  RunLocator,
  TransformPattern,
} from "../../types/motion";

/**
 * Output names drop the leading zero of the run number by replacing the
 * first literal "run-0" with "run-": run-01 → run-1, run-10 stays run-10,
 * run-00 → run-0.
 */
export function derampRunLabel(run: string): string {
  return run.replace("run-0", "run-");
}

export function funcDirOf(root: string, subject: string, session: string) {
  return join(root, subject, session, FUNC_DIR_NAME);
}

export class MotionPathResolver {
  private readonly patterns: readonly TransformPattern[];

  constructor(patterns: readonly TransformPattern[] = TRANSFORM_PATTERNS) {
    this.patterns = patterns;
  }

  resolve(locator: RunLocator): ResolvedMotionFile[] {
    const { root, subject, session, task, run } = locator;
    const funcDir = funcDirOf(root, subject, session);
    const base = `${subject}_${session}_task-${task}`;
    const outputRun = derampRunLabel(run);

    return this.patterns.map((pattern) => ({
      inputPath: join(funcDir, `${base}_${run}${pattern.inputSuffix}`),
      outputPath: join(funcDir, `${base}_${outputRun}${pattern.outputSuffix}`),
      pattern,
    }));
  }
}
