/**
 * NIfTI header reader
 *
 * Reads only the fixed-size header of a NIfTI-1 or NIfTI-2 file (CIFTI-2
 * files such as .dtseries.nii are NIfTI-2) to report the data shape without
 * touching the voxel data.
 */

import { open } from "node:fs/promises";

const NIFTI1_HEADER_SIZE = 348;
const NIFTI2_HEADER_SIZE = 540;

/** CIFTI-2 intent codes (NIFTI_INTENT_CONNECTIVITY_*) */
const CIFTI_INTENT_MIN = 3000;
const CIFTI_INTENT_MAX = 3099;

export interface NiftiHeaderInfo {
  version: 1 | 2;
  littleEndian: boolean;
  /** Raw dim[0..7]; dim[0] is the number of used dimensions */
  dims: number[];
  intentCode: number;
}

export function parseNiftiHeader(buffer: Buffer): NiftiHeaderInfo {
  if (buffer.length >= 2 && buffer[0] === 0x1f && buffer[1] === 0x8b) {
    throw new Error("Compressed NIfTI files are not supported");
  }
  if (buffer.length < NIFTI1_HEADER_SIZE) {
    throw new Error(
      `File is too small to be a NIfTI file (${buffer.length} bytes)`,
    );
  }

  const sizeLE = buffer.readInt32LE(0);
  const sizeBE = buffer.readInt32BE(0);

  let version: 1 | 2;
  let littleEndian: boolean;
  if (sizeLE === NIFTI1_HEADER_SIZE || sizeBE === NIFTI1_HEADER_SIZE) {
    version = 1;
    littleEndian = sizeLE === NIFTI1_HEADER_SIZE;
  } else if (sizeLE === NIFTI2_HEADER_SIZE || sizeBE === NIFTI2_HEADER_SIZE) {
    version = 2;
    littleEndian = sizeLE === NIFTI2_HEADER_SIZE;
  } else {
    throw new Error(`Unrecognized NIfTI header size: ${sizeLE}`);
  }

  if (version === 2 && buffer.length < NIFTI2_HEADER_SIZE) {
    throw new Error(
      `Truncated NIfTI-2 header (${buffer.length} of ${NIFTI2_HEADER_SIZE} bytes)`,
    );
  }

  const dims: number[] = [];
  let intentCode: number;

  if (version === 1) {
    // short dim[8] at offset 40, short intent_code at 68
    for (let i = 0; i < 8; i++) {
      const offset = 40 + i * 2;
      dims.push(
        littleEndian ? buffer.readInt16LE(offset) : buffer.readInt16BE(offset),
      );
    }
    intentCode = littleEndian ? buffer.readInt16LE(68) : buffer.readInt16BE(68);
  } else {
    // int64 dim[8] at offset 16, int intent_code at 504
    for (let i = 0; i < 8; i++) {
      const offset = 16 + i * 8;
      const value = littleEndian
        ? buffer.readBigInt64LE(offset)
        : buffer.readBigInt64BE(offset);
      dims.push(Number(value));
    }
    intentCode = littleEndian
      ? buffer.readInt32LE(504)
      : buffer.readInt32BE(504);
  }

  if (dims[0] < 1 || dims[0] > 7) {
    throw new Error(`Invalid number of dimensions in NIfTI header: ${dims[0]}`);
  }

  return { version, littleEndian, dims, intentCode };
}

/**
 * Data shape as reported by the header. CIFTI-2 matrices keep their axes
 * in dim[5..], so a dense timeseries reports (timepoints, grayordinates).
 */
export function niftiShape(header: NiftiHeaderInfo): number[] {
  const used = header.dims[0];
  const isCifti =
    header.intentCode >= CIFTI_INTENT_MIN &&
    header.intentCode <= CIFTI_INTENT_MAX;

  return isCifti
    ? header.dims.slice(5, used + 1)
    : header.dims.slice(1, used + 1);
}

export async function readNiftiHeader(
  filePath: string,
): Promise<NiftiHeaderInfo> {
  const handle = await open(filePath, "r");
  try {
    const buffer = Buffer.alloc(NIFTI2_HEADER_SIZE);
    const { bytesRead } = await handle.read(buffer, 0, NIFTI2_HEADER_SIZE, 0);
    return parseNiftiHeader(buffer.subarray(0, bytesRead));
  } finally {
    await handle.close();
  }
}

export async function readNiftiShape(filePath: string): Promise<number[]> {
  return niftiShape(await readNiftiHeader(filePath));
}
