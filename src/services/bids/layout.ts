/**
 * BIDS Dataset Layout
 *
 * Indexes subject and session directories of a BIDS dataset.
 */

import { readdir } from "node:fs/promises";
import { join } from "node:path";
import { loggers } from "../../lib/logger";
import { dirExists } from "../../utils/fs";

const SUBJECT_DIR = /^sub-([a-zA-Z0-9]+)$/;
// Any ses-* directory counts; naming is reported by the validator
const SESSION_DIR = /^ses-(.+)$/;

export const SUBJECT_PREFIX = "sub-";
export const SESSION_PREFIX = "ses-";

const logger = loggers.bids;

async function listLabels(dirPath: string, pattern: RegExp): Promise<string[]> {
  const entries = await readdir(dirPath, { withFileTypes: true });
  const labels: string[] = [];

  for (const entry of entries) {
    if (!entry.isDirectory()) continue;
    const match = entry.name.match(pattern);
    if (match) {
      labels.push(match[1]);
    }
  }

  return labels.sort();
}

/**
 * Subject labels (without "sub-") present in the dataset root
 */
export async function discoverSubjects(rootPath: string): Promise<string[]> {
  return listLabels(rootPath, SUBJECT_DIR);
}

/**
 * Session labels (without "ses-") of one subject; [] when the subject
 * directory does not exist
 */
export async function discoverSessions(
  rootPath: string,
  subjectLabel: string,
): Promise<string[]> {
  const subjectPath = join(rootPath, `${SUBJECT_PREFIX}${subjectLabel}`);
  if (!(await dirExists(subjectPath))) {
    return [];
  }
  return listLabels(subjectPath, SESSION_DIR);
}

/**
 * Sorted union of the session labels of every given subject
 */
export async function discoverSessionUnion(
  rootPath: string,
  subjectLabels: readonly string[],
): Promise<string[]> {
  const sessions = new Set<string>();
  for (const subject of subjectLabels) {
    for (const session of await discoverSessions(rootPath, subject)) {
      sessions.add(session);
    }
  }
  logger.debug("Found sessions", { sessions: [...sessions] });
  return [...sessions].sort();
}

/** Accepts "01" or "sub-01" and returns "01" */
export function stripPrefix(label: string, prefix: string): string {
  return label.startsWith(prefix) ? label.slice(prefix.length) : label;
}
