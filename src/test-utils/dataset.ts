/**
 * Fixture builders shared by the test suites. Every dataset lives in a
 * fresh temporary directory.
 */

import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

export async function makeTempDir(prefix = "bids-motion-"): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

// ---------------------------------------------------------------------------
// Motion tables
// ---------------------------------------------------------------------------

/** Upstream header: extra FD column first, rot_z_degrees_dt out of place */
export const UPSTREAM_HEADER = [
  "framewise_displacement",
  "rot_z_degrees_dt",
  "trans_x_mm",
  "trans_y_mm",
  "trans_z_mm",
  "rot_x_degrees",
  "rot_y_degrees",
  "rot_z_degrees",
  "trans_x_mm_dt",
  "trans_y_mm_dt",
  "trans_z_mm_dt",
  "rot_x_degrees_dt",
  "rot_y_degrees_dt",
];

export const UPSTREAM_ROWS = [
  ["0.0000", "0.0012", "0.0101", "-0.0202", "0.0303", "0.0004", "-0.0005", "0.0006", "0.0011", "-0.0022", "0.0033", "0.0001", "0.0002"],
  ["0.1500", "-0.0030", "0.1101", "-0.1202", "0.1303", "0.0104", "-0.0105", "0.0106", "0.1000", "-0.1000", "0.1000", "0.0100", "-0.0100"],
];

export const EXPECTED_HEADER = [
  "X",
  "Y",
  "Z",
  "RotX",
  "RotY",
  "RotZ",
  "XDt",
  "YDt",
  "ZDt",
  "RotXDt",
  "RotYDt",
  "RotZDt",
];

export const EXPECTED_ROWS = [
  ["0.0101", "-0.0202", "0.0303", "0.0004", "-0.0005", "0.0006", "0.0011", "-0.0022", "0.0033", "0.0001", "0.0002", "0.0012"],
  ["0.1101", "-0.1202", "0.1303", "0.0104", "-0.0105", "0.0106", "0.1000", "-0.1000", "0.1000", "0.0100", "-0.0100", "-0.0030"],
];

export const EXPECTED_OUTPUT =
  [EXPECTED_HEADER, ...EXPECTED_ROWS].map((row) => row.join("\t")).join("\n") +
  "\n";

/**
 * Tab-separated header, body padded and separated with spaces the way the
 * upstream pipeline writes it
 */
export function upstreamMotionText(
  header: readonly string[] = UPSTREAM_HEADER,
  rows: readonly (readonly string[])[] = UPSTREAM_ROWS,
): string {
  const body = rows.map((row) => `  ${row.join("   ")}`);
  return [header.join("\t"), ...body].join("\n") + "\n";
}

export async function writeFuncFile(
  root: string,
  subject: string,
  session: string,
  fileName: string,
  content: string | Buffer,
): Promise<string> {
  const funcDir = join(root, subject, session, "func");
  await mkdir(funcDir, { recursive: true });
  const filePath = join(funcDir, fileName);
  await writeFile(filePath, content);
  return filePath;
}

// ---------------------------------------------------------------------------
// NIfTI headers
// ---------------------------------------------------------------------------

interface HeaderOptions {
  dims: readonly number[];
  intentCode?: number;
  littleEndian?: boolean;
}

export function nifti1Header({
  dims,
  intentCode = 0,
  littleEndian = true,
}: HeaderOptions): Buffer {
  const buffer = Buffer.alloc(352);
  const int32 = littleEndian
    ? buffer.writeInt32LE.bind(buffer)
    : buffer.writeInt32BE.bind(buffer);
  const int16 = littleEndian
    ? buffer.writeInt16LE.bind(buffer)
    : buffer.writeInt16BE.bind(buffer);

  int32(348, 0);
  dims.forEach((dim, i) => int16(dim, 40 + i * 2));
  int16(intentCode, 68);
  buffer.write("n+1\0", 344, "latin1");
  return buffer;
}

export function nifti2Header({
  dims,
  intentCode = 0,
  littleEndian = true,
}: HeaderOptions): Buffer {
  const buffer = Buffer.alloc(544);
  const int32 = littleEndian
    ? buffer.writeInt32LE.bind(buffer)
    : buffer.writeInt32BE.bind(buffer);
  const int64 = littleEndian
    ? buffer.writeBigInt64LE.bind(buffer)
    : buffer.writeBigInt64BE.bind(buffer);

  int32(540, 0);
  buffer.write("n+2\0\r\n\x1a\n", 4, "latin1");
  dims.forEach((dim, i) => int64(BigInt(dim), 16 + i * 8));
  int32(intentCode, 504);
  return buffer;
}

/** CIFTI-2 dense timeseries header (intent ConnDenseSeries) */
export function dtseriesHeader(timepoints: number, grayordinates = 91282) {
  return nifti2Header({
    dims: [6, 1, 1, 1, 1, timepoints, grayordinates, 1],
    intentCode: 3002,
  });
}

export function dtseriesName(subject: string, session: string): string {
  return `${subject}_${session}_task-rest_bold_desc-filtered_timeseries.dtseries.nii`;
}
