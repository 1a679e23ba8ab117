/**
 * Motion Table Transformer
 *
 * Reads an upstream motion table, keeps the configured columns and writes
 * them under their short names as strict TSV.
 *
 * Input quirk: the header row is tab-separated while body fields are
 * separated by runs of spaces or tabs, as written by the upstream pipeline.
 * Both are parsed as observed; revisit if the upstream format changes.
 */

import { readFile } from "node:fs/promises";
import { COLUMN_MAPPING } from "../../lib/constants";
import {
  MotionTableError,
  errorMessage,
  isErrnoException,
} from "../../lib/errors";
import { loggers, type Logger } from "../../lib/logger";
import type {
  ColumnMapping,
  MotionTable,
  TransformResult,
} from "../../types/motion";
import { writeFileAtomic } from "../../utils/fs";

const BODY_DELIMITER = /[ \t]+/;

/**
 * Parse motion table text. Values are kept as the exact text found in
 * the file.
 */
export function parseMotionTable(content: string, path: string): MotionTable {
  if (content.trim().length === 0) {
    throw new MotionTableError({ kind: "Empty", path });
  }

  const lines = content.split(/\r?\n/);
  const columns = lines[0].trim().split("\t");
  const rows: string[][] = [];

  for (let i = 1; i < lines.length; i++) {
    const line = lines[i].trim();
    if (line.length === 0) {
      continue;
    }

    const fields = line.split(BODY_DELIMITER);
    if (fields.length !== columns.length) {
      throw new MotionTableError({
        kind: "ProcessingError",
        path,
        cause: `Line ${i + 1}: expected ${columns.length} fields, found ${fields.length}`,
      });
    }
    rows.push(fields);
  }

  // A header without data rows is reported the same way as an empty file
  if (rows.length === 0) {
    throw new MotionTableError({ kind: "Empty", path });
  }

  return { columns, rows };
}

/**
 * Keep the mapped columns in mapping order and rename them.
 */
export function projectMotionTable(
  table: MotionTable,
  mapping: ColumnMapping,
  path: string,
): MotionTable {
  const missing = mapping
    .map(([source]) => source)
    .filter((source) => !table.columns.includes(source));

  if (missing.length > 0) {
    throw new MotionTableError({
      kind: "SchemaMismatch",
      path,
      missing,
      available: [...table.columns],
    });
  }

  const indices = mapping.map(([source]) => table.columns.indexOf(source));

  return {
    columns: mapping.map(([, target]) => target),
    rows: table.rows.map((row) => indices.map((index) => row[index])),
  };
}

export function serializeMotionTable(table: MotionTable): string {
  const lines = [table.columns, ...table.rows].map((fields) =>
    fields.join("\t"),
  );
  return `${lines.join("\n")}\n`;
}

export class MotionTableTransformer {
  private readonly mapping: ColumnMapping;
  private readonly logger: Logger;

  constructor(
    mapping: ColumnMapping = COLUMN_MAPPING,
    logger: Logger = loggers.table,
  ) {
    this.mapping = mapping;
    this.logger = logger;
  }

  async transform(
    inputPath: string,
    outputPath: string,
  ): Promise<TransformResult> {
    try {
      const content = await this.read(inputPath);
      const table = parseMotionTable(content, inputPath);
      this.logger.debug("Detected columns", { columns: table.columns });

      const projected = projectMotionTable(table, this.mapping, inputPath);

      this.logger.info(`Saving processed data to: ${outputPath}`);
      await writeFileAtomic(outputPath, serializeMotionTable(projected));

      this.logger.info("Processing completed successfully", {
        rows: projected.rows.length,
        columns: projected.columns.length,
      });
      return {
        ok: true,
        rows: projected.rows.length,
        columns: projected.columns.length,
      };
    } catch (error) {
      const tableError =
        error instanceof MotionTableError
          ? error
          : new MotionTableError({
              kind: "ProcessingError",
              path: inputPath,
              cause: errorMessage(error),
            });
      this.report(tableError);
      return { ok: false, error: tableError };
    }
  }

  private async read(path: string): Promise<string> {
    try {
      return await readFile(path, "utf8");
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        throw new MotionTableError({ kind: "NotFound", path });
      }
      throw error;
    }
  }

  private report(error: MotionTableError): void {
    const { detail } = error;
    if (detail.kind === "SchemaMismatch") {
      this.logger.error(`Missing required columns: ${detail.missing.join(", ")}`);
      this.logger.error(
        `Available columns in file: ${detail.available.join(", ")}`,
      );
      return;
    }
    this.logger.error(error.message);
  }
}
