// Centralized environment configuration
// Values are read once from process.env and validated with zod

import { z } from "zod";

export const LogLevelSchema = z.enum([
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
]);

export const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).optional(),
  LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(LogLevelSchema)
    .optional(),
  /** Disable colored log output, see https://no-color.org */
  NO_COLOR: z.string().optional(),
});

export type LogLevelName = z.infer<typeof LogLevelSchema>;
export type EnvSchemaType = z.infer<typeof EnvSchema>;

export interface EnvConfig {
  logLevel: LogLevelName;
  colorize: boolean;
}

export function loadEnvConfig(
  source: Record<string, string | undefined> = process.env,
): EnvConfig {
  const parsed = EnvSchema.safeParse({
    NODE_ENV: source.NODE_ENV,
    LOG_LEVEL: source.LOG_LEVEL,
    NO_COLOR: source.NO_COLOR,
  });

  // An unknown LOG_LEVEL or NODE_ENV falls back to the defaults
  const env: EnvSchemaType = parsed.success ? parsed.data : {};

  return {
    logLevel:
      env.LOG_LEVEL ?? (env.NODE_ENV === "development" ? "debug" : "info"),
    colorize: env.NO_COLOR === undefined && Boolean(process.stdout.isTTY),
  };
}
