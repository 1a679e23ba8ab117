/**
 * Error types
 *
 * MotionTableError covers a single table and never aborts a batch.
 * ValidationFailure and UsageError end the process with a non-zero status.
 */

export type MotionTableErrorDetail =
  | { kind: "NotFound"; path: string }
  | { kind: "Empty"; path: string }
  | {
      kind: "SchemaMismatch";
      path: string;
      missing: string[];
      available: string[];
    }
  | { kind: "ProcessingError"; path: string; cause: string };

export type MotionTableErrorKind = MotionTableErrorDetail["kind"];

function describeDetail(detail: MotionTableErrorDetail): string {
  switch (detail.kind) {
    case "NotFound":
      return `File not found: ${detail.path}`;
    case "Empty":
      return `The file is empty: ${detail.path}`;
    case "SchemaMismatch":
      return `Missing required columns: ${detail.missing.join(", ")}`;
    case "ProcessingError":
      return `Error processing file: ${detail.cause}`;
  }
}

export class MotionTableError extends Error {
  readonly detail: MotionTableErrorDetail;

  constructor(detail: MotionTableErrorDetail) {
    super(describeDetail(detail));
    this.name = "MotionTableError";
    this.detail = detail;
  }

  get kind(): MotionTableErrorKind {
    return this.detail.kind;
  }
}

export type ValidationFailureCode =
  | "MISSING_DIRECTORY"
  | "INVALID_DATASET"
  | "MISSING_LABELS";

export class ValidationFailure extends Error {
  readonly code: ValidationFailureCode;

  constructor(code: ValidationFailureCode, message: string) {
    super(message);
    this.name = "ValidationFailure";
    this.code = code;
  }
}

/** Bad command line; reported with the usage text */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isErrnoException(
  error: unknown,
): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
