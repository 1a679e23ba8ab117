import { readFile, readdir, stat } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { ValidationFailure } from "../../../lib/errors";
import {
  EXPECTED_OUTPUT,
  dtseriesHeader,
  dtseriesName,
  makeTempDir,
  removeDir,
  upstreamMotionText,
  writeFuncFile,
} from "../../../test-utils/dataset";
import { resolvePairs, runAnalysis, summarize } from "../analysis";
import { MotionProcessor } from "../processor";

/**
 * sub-01/ses-01: one run, includingFD input
 * sub-02/ses-02: two runs, filteredincludingFD input for run-02 only
 */
async function buildDataset(root: string): Promise<void> {
  await writeFuncFile(root, "sub-01", "ses-01", dtseriesName("sub-01", "ses-01"), dtseriesHeader(383));
  await writeFuncFile(
    root,
    "sub-01",
    "ses-01",
    "sub-01_ses-01_task-rest_run-01_desc-includingFD_motion.tsv",
    upstreamMotionText(),
  );
  await writeFuncFile(root, "sub-02", "ses-02", dtseriesName("sub-02", "ses-02"), dtseriesHeader(766));
  await writeFuncFile(
    root,
    "sub-02",
    "ses-02",
    "sub-02_ses-02_task-rest_run-02_desc-filteredincludingFD_motion.tsv",
    upstreamMotionText(),
  );
}

describe("resolvePairs", () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
    await buildDataset(root);
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it("discovers every subject and the union of sessions at group level", async () => {
    expect(await resolvePairs(root, { level: "group" })).toEqual({
      participantLabels: ["01", "02"],
      sessionLabels: ["01", "02"],
    });
  });

  it("strips sub- and ses- prefixes from participant labels", async () => {
    const pairs = await resolvePairs(root, {
      level: "participant",
      participantLabels: ["sub-01", "02"],
      sessionLabels: ["ses-02"],
    });
    expect(pairs).toEqual({
      participantLabels: ["01", "02"],
      sessionLabels: ["02"],
    });
  });

  it("requires both label lists at participant level", async () => {
    const pending = resolvePairs(root, {
      level: "participant",
      participantLabels: ["01"],
    });
    await expect(pending).rejects.toBeInstanceOf(ValidationFailure);
    await expect(pending).rejects.toMatchObject({
      code: "MISSING_LABELS",
      message:
        "Participant labels or session labels not specified for participant level analysis",
    });
  });
});

describe("runAnalysis", () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
    await buildDataset(root);
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it("processes every subject/session pair at group level", async () => {
    const summary = await runAnalysis(root, { level: "group" });

    expect(summary).toMatchObject({
      level: "group",
      skippedPairs: 2,
      filesProcessed: 2,
      filesSkipped: 4,
      filesFailed: 0,
    });
    expect(summary.sessions.map((s) => `${s.subject}/${s.session}`)).toEqual([
      "sub-01/ses-01",
      "sub-02/ses-02",
    ]);
    expect(
      await readFile(
        join(root, "sub-01", "ses-01", "func", "sub-01_ses-01_task-rest_run-1_motion.tsv"),
        "utf8",
      ),
    ).toBe(EXPECTED_OUTPUT);
    expect(
      await readFile(
        join(
          root,
          "sub-02",
          "ses-02",
          "func",
          "sub-02_ses-02_task-rest_run-2_desc-filtered_motion.tsv",
        ),
        "utf8",
      ),
    ).toBe(EXPECTED_OUTPUT);
  });

  it("is idempotent across repeated runs", async () => {
    const funcDirs = [
      join(root, "sub-01", "ses-01", "func"),
      join(root, "sub-02", "ses-02", "func"),
    ];
    const outputs = [
      join(funcDirs[0], "sub-01_ses-01_task-rest_run-1_motion.tsv"),
      join(funcDirs[1], "sub-02_ses-02_task-rest_run-2_desc-filtered_motion.tsv"),
    ];
    const snapshot = async () => ({
      listings: await Promise.all(funcDirs.map((dir) => readdir(dir))),
      contents: await Promise.all(outputs.map((file) => readFile(file, "utf8"))),
      mtimes: await Promise.all(
        outputs.map(async (file) => (await stat(file)).mtimeMs),
      ),
    });

    await runAnalysis(root, { level: "group" });
    const before = await snapshot();
    const second = await runAnalysis(root, { level: "group" });

    expect(second.filesProcessed).toBe(0);
    expect(second.filesSkipped).toBe(6);
    expect(await snapshot()).toEqual(before);
    expect(before.contents).toEqual([EXPECTED_OUTPUT, EXPECTED_OUTPUT]);
  });

  it("counts a missing subject directory as a skipped pair", async () => {
    const summary = await runAnalysis(root, {
      level: "participant",
      participantLabels: ["03"],
      sessionLabels: ["01"],
    });

    expect(summary.sessions).toEqual([]);
    expect(summary.skippedPairs).toBe(1);
  });

  it("only visits the requested pairs at participant level", async () => {
    const processor = new MotionProcessor();
    const spy = vi.spyOn(processor, "processSubjectSession");

    await runAnalysis(
      root,
      { level: "participant", participantLabels: ["sub-01"], sessionLabels: ["ses-01"] },
      processor,
    );

    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy).toHaveBeenCalledWith(root, "sub-01", "ses-01");
  });

  it("continues with the next pair when one throws", async () => {
    const processor = new MotionProcessor();
    vi.spyOn(processor, "processSubjectSession").mockRejectedValueOnce(
      new Error("disk on fire"),
    );

    const summary = await runAnalysis(
      root,
      {
        level: "participant",
        participantLabels: ["01", "02"],
        sessionLabels: ["01", "02"],
      },
      processor,
    );

    // sub-01/ses-01 throws, sub-01/ses-02 and sub-02/ses-01 have no func dir
    expect(summary.skippedPairs).toBe(3);
    expect(summary.sessions.map((s) => s.subject)).toEqual(["sub-02"]);
    expect(summary.filesProcessed).toBe(1);
  });
});

describe("summarize", () => {
  it("returns zero counts for no sessions", () => {
    expect(summarize("participant", [], 0)).toEqual({
      level: "participant",
      sessions: [],
      skippedPairs: 0,
      filesProcessed: 0,
      filesSkipped: 0,
      filesFailed: 0,
    });
  });
});
