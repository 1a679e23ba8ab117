/**
 * BIDS Format Validator
 *
 * Validates the BIDS (Brain Imaging Data Structure) directory structure of a
 * dataset before its motion tables are processed.
 * Specification: https://bids-specification.readthedocs.io/
 */

import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import { errorMessage } from "../../lib/errors";
import { fileExists } from "../../utils/fs";

export interface BIDSValidationError {
  code: string;
  message: string;
  path?: string;
  severity: "error" | "warning";
}

export interface BIDSValidationResult {
  valid: boolean;
  errors: BIDSValidationError[];
  warnings: BIDSValidationError[];
}

export const BIDSDatasetDescriptionSchema = z
  .object({
    Name: z.string().optional(),
    BIDSVersion: z.string().optional(),
    DatasetType: z.enum(["raw", "derivative"]).optional(),
    License: z.string().optional(),
    Authors: z.array(z.string()).optional(),
  })
  .passthrough();

export type BIDSDatasetDescription = z.infer<
  typeof BIDSDatasetDescriptionSchema
>;

const SUBJECT_DIR = /^sub-[a-zA-Z0-9]+$/;
const SESSION_DIR = /^ses-[a-zA-Z0-9]+$/;
const DATA_DIRS = ["func", "anat", "dwi", "fmap", "eeg", "ieeg", "meg"];

/**
 * Validates if a directory is a valid BIDS dataset
 */
export async function validateBIDSDataset(
  rootPath: string,
): Promise<BIDSValidationResult> {
  const errors: BIDSValidationError[] = [];
  const warnings: BIDSValidationError[] = [];

  try {
    await validateRecommendedFiles(rootPath, warnings);
    await validateDatasetDescription(rootPath, errors, warnings);
    await validateSubjectDirectories(rootPath, errors, warnings);
  } catch (error) {
    errors.push({
      code: "VALIDATION_ERROR",
      message: `Failed to validate BIDS dataset: ${errorMessage(error)}`,
      severity: "error",
    });
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

async function validateRecommendedFiles(
  rootPath: string,
  warnings: BIDSValidationError[],
): Promise<void> {
  const readmePath = join(rootPath, "README");
  if (!(await fileExists(readmePath))) {
    warnings.push({
      code: "MISSING_README",
      message: "README file is recommended but missing",
      path: readmePath,
      severity: "warning",
    });
  }

  const participantsPath = join(rootPath, "participants.tsv");
  if (!(await fileExists(participantsPath))) {
    warnings.push({
      code: "MISSING_PARTICIPANTS",
      message: "participants.tsv is recommended but missing",
      path: participantsPath,
      severity: "warning",
    });
  }
}

/**
 * Validate dataset_description.json
 */
async function validateDatasetDescription(
  rootPath: string,
  errors: BIDSValidationError[],
  warnings: BIDSValidationError[],
): Promise<void> {
  const datasetDescPath = join(rootPath, "dataset_description.json");
  if (!(await fileExists(datasetDescPath))) {
    errors.push({
      code: "MISSING_DATASET_DESCRIPTION",
      message: "Required file dataset_description.json is missing",
      path: datasetDescPath,
      severity: "error",
    });
    return;
  }

  let desc: BIDSDatasetDescription;
  try {
    const content = await readFile(datasetDescPath, "utf8");
    desc = BIDSDatasetDescriptionSchema.parse(JSON.parse(content));
  } catch (error) {
    errors.push({
      code: "INVALID_DATASET_DESCRIPTION",
      message: `Failed to parse dataset_description.json: ${errorMessage(error)}`,
      path: datasetDescPath,
      severity: "error",
    });
    return;
  }

  // Required fields
  if (!desc.Name) {
    errors.push({
      code: "MISSING_NAME",
      message: 'dataset_description.json must include "Name" field',
      path: datasetDescPath,
      severity: "error",
    });
  }

  if (!desc.BIDSVersion) {
    errors.push({
      code: "MISSING_BIDS_VERSION",
      message: 'dataset_description.json must include "BIDSVersion" field',
      path: datasetDescPath,
      severity: "error",
    });
  }

  // Recommended fields
  if (!desc.License) {
    warnings.push({
      code: "MISSING_LICENSE",
      message: 'dataset_description.json should include "License" field',
      path: datasetDescPath,
      severity: "warning",
    });
  }

  if (!desc.Authors || desc.Authors.length === 0) {
    warnings.push({
      code: "MISSING_AUTHORS",
      message: 'dataset_description.json should include "Authors" field',
      path: datasetDescPath,
      severity: "warning",
    });
  }
}

/**
 * Validate subject directories
 */
async function validateSubjectDirectories(
  rootPath: string,
  errors: BIDSValidationError[],
  warnings: BIDSValidationError[],
): Promise<void> {
  const entries = await readdir(rootPath, { withFileTypes: true });
  const subjectDirs = entries.filter(
    (entry) => entry.isDirectory() && entry.name.startsWith("sub-"),
  );

  if (subjectDirs.length === 0) {
    errors.push({
      code: "NO_SUBJECTS",
      message: "No subject directories (sub-*) found",
      path: rootPath,
      severity: "error",
    });
    return;
  }

  for (const subDir of subjectDirs) {
    const subPath = join(rootPath, subDir.name);
    if (!SUBJECT_DIR.test(subDir.name)) {
      errors.push({
        code: "INVALID_SUBJECT_NAME",
        message: `Subject directory "${subDir.name}" has invalid format. Should be sub-<label>`,
        path: subPath,
        severity: "error",
      });
    }

    await validateSubjectDataDir(subPath, errors, warnings);
  }
}

/**
 * Validate subject data directories (ses-* or modality directories)
 */
async function validateSubjectDataDir(
  subjectPath: string,
  errors: BIDSValidationError[],
  warnings: BIDSValidationError[],
): Promise<void> {
  const entries = await readdir(subjectPath, { withFileTypes: true });

  const sessionDirs = entries.filter(
    (entry) => entry.isDirectory() && entry.name.startsWith("ses-"),
  );
  const modalityDirs = entries.filter(
    (entry) => entry.isDirectory() && DATA_DIRS.includes(entry.name),
  );

  if (sessionDirs.length === 0 && modalityDirs.length === 0) {
    warnings.push({
      code: "NO_DATA_DIRECTORIES",
      message: "Subject has no session or modality directories",
      path: subjectPath,
      severity: "warning",
    });
  }

  for (const sesDir of sessionDirs) {
    if (!SESSION_DIR.test(sesDir.name)) {
      errors.push({
        code: "INVALID_SESSION_NAME",
        message: `Session directory "${sesDir.name}" has invalid format. Should be ses-<label>`,
        path: join(subjectPath, sesDir.name),
        severity: "error",
      });
    }
  }
}
