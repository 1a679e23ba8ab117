import { vi } from "vitest";
import type { Logger } from "../lib/logger";

export interface RecordedLine {
  level: "debug" | "info" | "warn" | "error";
  message: string;
  context?: Record<string, unknown>;
}

/** Logger double that keeps every line in memory */
export function createRecordingLogger(): Logger & { lines: RecordedLine[] } {
  const lines: RecordedLine[] = [];
  const record =
    (level: RecordedLine["level"]) =>
    (message: string, context?: Record<string, unknown>) => {
      lines.push({ level, message, context });
    };

  const logger: Logger & { lines: RecordedLine[] } = {
    lines,
    debug: vi.fn(record("debug")),
    info: vi.fn(record("info")),
    warn: vi.fn(record("warn")),
    error: vi.fn(record("error")),
    child: () => logger,
  };
  return logger;
}

export function messagesAt(
  logger: { lines: RecordedLine[] },
  level: RecordedLine["level"],
): string[] {
  return logger.lines.filter((l) => l.level === level).map((l) => l.message);
}

export interface CapturedIO {
  stdout: string;
  stderr: string;
  out: (text: string) => void;
  err: (text: string) => void;
}

export function captureIO(): CapturedIO {
  const io: CapturedIO = {
    stdout: "",
    stderr: "",
    out: (text) => {
      io.stdout += text;
    },
    err: (text) => {
      io.stderr += text;
    },
  };
  return io;
}
