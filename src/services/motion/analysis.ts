/**
 * Participant / group level driver
 *
 * Expands an analysis request into subject/session pairs and hands each
 * pair to the MotionProcessor.
 */

import { join } from "node:path";
import { ValidationFailure, errorMessage } from "../../lib/errors";
import { loggers, type Logger } from "../../lib/logger";
import type {
  AnalysisRequest,
  AnalysisSummary,
  SessionOutcome,
} from "../../types/motion";
import { dirExists } from "../../utils/fs";
import {
  SESSION_PREFIX,
  SUBJECT_PREFIX,
  discoverSessionUnion,
  discoverSubjects,
  stripPrefix,
} from "../bids/layout";
import { MotionProcessor } from "./processor";

export interface SubjectSessionPairs {
  participantLabels: string[];
  sessionLabels: string[];
}

export async function resolvePairs(
  bidsDir: string,
  request: AnalysisRequest,
  logger: Logger = loggers.processor,
): Promise<SubjectSessionPairs> {
  if (request.level === "group") {
    logger.info(`Processing all participants and sessions in ${bidsDir}`);
    const participantLabels = await discoverSubjects(bidsDir);
    const sessionLabels = await discoverSessionUnion(
      bidsDir,
      participantLabels,
    );
    return { participantLabels, sessionLabels };
  }

  const participants = request.participantLabels ?? [];
  const sessions = request.sessionLabels ?? [];
  if (participants.length === 0 || sessions.length === 0) {
    throw new ValidationFailure(
      "MISSING_LABELS",
      "Participant labels or session labels not specified for participant level analysis",
    );
  }

  const participantLabels = participants.map((p) =>
    stripPrefix(p, SUBJECT_PREFIX),
  );
  logger.info("Processing specified participants", {
    participants: participantLabels,
  });
  return {
    participantLabels,
    sessionLabels: sessions.map((s) => stripPrefix(s, SESSION_PREFIX)),
  };
}

export async function runAnalysis(
  bidsDir: string,
  request: AnalysisRequest,
  processor: MotionProcessor = new MotionProcessor(),
  logger: Logger = loggers.processor,
): Promise<AnalysisSummary> {
  logger.info(`Starting ${request.level} level analysis`);

  const { participantLabels, sessionLabels } = await resolvePairs(
    bidsDir,
    request,
    logger,
  );

  const sessions: SessionOutcome[] = [];
  let skippedPairs = 0;

  for (const participantLabel of participantLabels) {
    for (const sessionLabel of sessionLabels) {
      const subject = `${SUBJECT_PREFIX}${participantLabel}`;
      const session = `${SESSION_PREFIX}${sessionLabel}`;
      logger.info(`Processing participant: ${subject}`);

      const subjectDir = join(bidsDir, subject);
      if (!(await dirExists(subjectDir))) {
        logger.warn(`Subject directory does not exist: ${subjectDir}`);
        skippedPairs++;
        continue;
      }

      logger.info(`Processing session: ${session}`);
      try {
        const outcome = await processor.processSubjectSession(
          bidsDir,
          subject,
          session,
        );
        if (outcome) {
          sessions.push(outcome);
        } else {
          skippedPairs++;
        }
      } catch (error) {
        logger.error(
          `Error processing ${subject}/${session}: ${errorMessage(error)}`,
        );
        skippedPairs++;
      }
    }
  }

  return summarize(request.level, sessions, skippedPairs);
}

export function summarize(
  level: AnalysisSummary["level"],
  sessions: SessionOutcome[],
  skippedPairs: number,
): AnalysisSummary {
  let filesProcessed = 0;
  let filesSkipped = 0;
  let filesFailed = 0;

  for (const outcome of sessions) {
    for (const file of outcome.files) {
      switch (file.status) {
        case "processed":
          filesProcessed++;
          break;
        case "failed":
          filesFailed++;
          break;
        default:
          filesSkipped++;
      }
    }
  }

  return {
    level,
    sessions,
    skippedPairs,
    filesProcessed,
    filesSkipped,
    filesFailed,
  };
}
