import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import {
  dtseriesHeader,
  makeTempDir,
  nifti1Header,
  nifti2Header,
  removeDir,
} from "../../test-utils/dataset";
import {
  niftiShape,
  parseNiftiHeader,
  readNiftiHeader,
  readNiftiShape,
} from "../niftiHeader";

describe("parseNiftiHeader", () => {
  it("reads a little-endian NIfTI-1 header", () => {
    const header = parseNiftiHeader(
      nifti1Header({ dims: [4, 64, 64, 30, 200, 1, 1, 1] }),
    );
    expect(header).toEqual({
      version: 1,
      littleEndian: true,
      dims: [4, 64, 64, 30, 200, 1, 1, 1],
      intentCode: 0,
    });
    expect(niftiShape(header)).toEqual([64, 64, 30, 200]);
  });

  it("reads a big-endian NIfTI-1 header", () => {
    const header = parseNiftiHeader(
      nifti1Header({ dims: [3, 10, 20, 30, 1, 1, 1, 1], littleEndian: false }),
    );
    expect(header.littleEndian).toBe(false);
    expect(niftiShape(header)).toEqual([10, 20, 30]);
  });

  it("reports the matrix shape of a CIFTI-2 dtseries", () => {
    const header = parseNiftiHeader(dtseriesHeader(766));
    expect(header.version).toBe(2);
    expect(header.intentCode).toBe(3002);
    expect(niftiShape(header)).toEqual([766, 91282]);
  });

  it("reads a big-endian NIfTI-2 header", () => {
    const header = parseNiftiHeader(
      nifti2Header({
        dims: [6, 1, 1, 1, 1, 1149, 5000, 1],
        intentCode: 3002,
        littleEndian: false,
      }),
    );
    expect(header.littleEndian).toBe(false);
    expect(niftiShape(header)).toEqual([1149, 5000]);
  });

  it("uses dim[1..] for NIfTI-2 files without a CIFTI intent", () => {
    const header = parseNiftiHeader(
      nifti2Header({ dims: [2, 300, 12, 1, 1, 1, 1, 1] }),
    );
    expect(niftiShape(header)).toEqual([300, 12]);
  });

  it("rejects an unknown header size", () => {
    expect(() => parseNiftiHeader(Buffer.alloc(400))).toThrow(
      "Unrecognized NIfTI header size: 0",
    );
  });

  it("rejects short buffers", () => {
    expect(() => parseNiftiHeader(Buffer.alloc(100))).toThrow(
      "File is too small to be a NIfTI file (100 bytes)",
    );
  });

  it("rejects gzip-compressed input", () => {
    expect(() => parseNiftiHeader(Buffer.from([0x1f, 0x8b, 0x08]))).toThrow(
      "Compressed NIfTI files are not supported",
    );
  });

  it("rejects a truncated NIfTI-2 header", () => {
    const truncated = dtseriesHeader(383).subarray(0, 400);
    expect(() => parseNiftiHeader(truncated)).toThrow(
      "Truncated NIfTI-2 header (400 of 540 bytes)",
    );
  });

  it("rejects an out-of-range dimension count", () => {
    expect(() =>
      parseNiftiHeader(nifti1Header({ dims: [9, 1, 1, 1, 1, 1, 1, 1] })),
    ).toThrow("Invalid number of dimensions in NIfTI header: 9");
  });
});

describe("readNiftiShape", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("reads the header from disk without the data block", async () => {
    const filePath = join(dir, "bold.dtseries.nii");
    await writeFile(
      filePath,
      Buffer.concat([dtseriesHeader(383, 4), Buffer.alloc(383 * 4 * 4)]),
    );

    expect(await readNiftiShape(filePath)).toEqual([383, 4]);
    expect((await readNiftiHeader(filePath)).version).toBe(2);
  });

  it("fails for a missing file", async () => {
    await expect(readNiftiShape(join(dir, "missing.nii"))).rejects.toThrow();
  });
});
