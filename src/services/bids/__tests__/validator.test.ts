import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { makeTempDir, removeDir } from "../../../test-utils/dataset";
import { validateBIDSDataset } from "../validator";

async function writeDescription(root: string, content: unknown) {
  await writeFile(
    join(root, "dataset_description.json"),
    typeof content === "string" ? content : JSON.stringify(content),
  );
}

const codes = (items: { code: string }[]) => items.map((i) => i.code);

describe("validateBIDSDataset", () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it("accepts a complete dataset without warnings", async () => {
    await writeDescription(root, {
      Name: "Motion test",
      BIDSVersion: "1.8.0",
      License: "CC0",
      Authors: ["Test Author"],
    });
    await writeFile(join(root, "README"), "readme");
    await writeFile(join(root, "participants.tsv"), "participant_id\nsub-01\n");
    await mkdir(join(root, "sub-01", "ses-01", "func"), { recursive: true });

    expect(await validateBIDSDataset(root)).toEqual({
      valid: true,
      errors: [],
      warnings: [],
    });
  });

  it("warns about missing recommended files and fields", async () => {
    await writeDescription(root, { Name: "Motion test", BIDSVersion: "1.8.0" });
    await mkdir(join(root, "sub-01", "func"), { recursive: true });

    const result = await validateBIDSDataset(root);

    expect(result.valid).toBe(true);
    expect(codes(result.warnings)).toEqual([
      "MISSING_README",
      "MISSING_PARTICIPANTS",
      "MISSING_LICENSE",
      "MISSING_AUTHORS",
    ]);
  });

  it("requires dataset_description.json", async () => {
    await mkdir(join(root, "sub-01", "ses-01"), { recursive: true });

    const result = await validateBIDSDataset(root);

    expect(result.valid).toBe(false);
    expect(codes(result.errors)).toEqual(["MISSING_DATASET_DESCRIPTION"]);
  });

  it("reports unparsable descriptions", async () => {
    await writeDescription(root, "{ not json");
    await mkdir(join(root, "sub-01", "ses-01"), { recursive: true });

    const result = await validateBIDSDataset(root);
    expect(codes(result.errors)).toEqual(["INVALID_DATASET_DESCRIPTION"]);
  });

  it("reports descriptions with mistyped fields", async () => {
    await writeDescription(root, { Name: "x", BIDSVersion: "1.8.0", Authors: "me" });
    await mkdir(join(root, "sub-01", "ses-01"), { recursive: true });

    const result = await validateBIDSDataset(root);
    expect(codes(result.errors)).toEqual(["INVALID_DATASET_DESCRIPTION"]);
  });

  it("requires Name and BIDSVersion", async () => {
    await writeDescription(root, {});
    await mkdir(join(root, "sub-01", "ses-01"), { recursive: true });

    const result = await validateBIDSDataset(root);
    expect(codes(result.errors)).toEqual(["MISSING_NAME", "MISSING_BIDS_VERSION"]);
  });

  it("requires at least one subject", async () => {
    await writeDescription(root, { Name: "x", BIDSVersion: "1.8.0" });

    const result = await validateBIDSDataset(root);
    expect(codes(result.errors)).toEqual(["NO_SUBJECTS"]);
  });

  it("flags malformed subject and session names", async () => {
    await writeDescription(root, { Name: "x", BIDSVersion: "1.8.0" });
    await mkdir(join(root, "sub-0_1", "ses-a_b"), { recursive: true });

    const result = await validateBIDSDataset(root);
    expect(codes(result.errors)).toEqual([
      "INVALID_SUBJECT_NAME",
      "INVALID_SESSION_NAME",
    ]);
  });

  it("warns about subjects without data directories", async () => {
    await writeDescription(root, { Name: "x", BIDSVersion: "1.8.0" });
    await mkdir(join(root, "sub-01", "notes"), { recursive: true });

    const result = await validateBIDSDataset(root);
    expect(result.valid).toBe(true);
    expect(codes(result.warnings)).toContain("NO_DATA_DIRECTORIES");
  });

  it("reports an unreadable root as a validation error", async () => {
    const result = await validateBIDSDataset(join(root, "missing"));

    expect(result.valid).toBe(false);
    expect(codes(result.errors)).toEqual([
      "MISSING_DATASET_DESCRIPTION",
      "VALIDATION_ERROR",
    ]);
  });
});
