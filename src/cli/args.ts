/**
 * Command line parsing for both entry points. Tokens are scanned by hand;
 * the collected values are validated with zod.
 */

import { z } from "zod";
import { UsageError } from "../lib/errors";

// ============================================================================
// Option Schemas
// ============================================================================

const LabelListSchema = z.array(z.string().min(1)).min(1);

export const AnalysisLevelSchema = z.enum(["participant", "group"]);

export const AppOptionsSchema = z.object({
  bidsDir: z.string().min(1),
  analysisLevel: AnalysisLevelSchema,
  participantLabels: LabelListSchema.optional(),
  sessionLabels: LabelListSchema.optional(),
  skipBidsValidator: z.boolean(),
});

export const RunOptionsSchema = z.object({
  dataDir: z.string().min(1),
  subject: z.string().min(1),
  session: z.string().min(1),
  task: z.string().min(1),
  run: z.string().min(1),
});

export type AppOptions = z.infer<typeof AppOptionsSchema>;
export type RunOptions = z.infer<typeof RunOptionsSchema>;

export type AppCommand =
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "analyze"; options: AppOptions };

export type RunCommand =
  | { kind: "help" }
  | { kind: "run"; options: RunOptions };

const APP_POSITIONALS = ["bids_dir", "analysis_level"] as const;
const RUN_POSITIONALS = ["data_dir", "subject", "session", "task", "run"] as const;

function isOption(token: string): boolean {
  return token.startsWith("-") && token !== "-";
}

function checkPositionals(
  positionals: string[],
  names: readonly string[],
): void {
  if (positionals.length < names.length) {
    const missing = names.slice(positionals.length);
    throw new UsageError(
      `the following arguments are required: ${missing.join(", ")}`,
    );
  }
  if (positionals.length > names.length) {
    throw new UsageError(
      `unrecognized arguments: ${positionals.slice(names.length).join(" ")}`,
    );
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    .join("; ");
}

const APP_LONG_OPTIONS = [
  "--help",
  "--version",
  "--skip_bids_validator",
  "--participant_label",
  "--session_label",
] as const;

type AppLongOption = (typeof APP_LONG_OPTIONS)[number];

interface OptionToken {
  name: string;
  /** Value given as `--name=value` */
  inline?: string;
}

/**
 * Splits `--name=value` and expands an unambiguous prefix of a long option
 * to its full name. Short options and unknown names are returned as given.
 */
export function resolveLongOption(
  token: string,
  options: readonly string[],
): OptionToken {
  if (!token.startsWith("--")) {
    return { name: token };
  }

  const eq = token.indexOf("=");
  const name = eq === -1 ? token : token.slice(0, eq);
  const inline = eq === -1 ? undefined : token.slice(eq + 1);

  if (options.includes(name) || name === "--") {
    return { name, inline };
  }

  const candidates = options.filter((option) => option.startsWith(name));
  if (candidates.length > 1) {
    throw new UsageError(
      `ambiguous option: ${name} could match ${candidates.join(", ")}`,
    );
  }
  if (candidates.length === 1) {
    return { name: candidates[0], inline };
  }
  return { name: token };
}

function isAppLongOption(name: string): name is AppLongOption {
  return APP_LONG_OPTIONS.some((option) => option === name);
}

export function parseAppArgs(args: readonly string[]): AppCommand {
  const positionals: string[] = [];
  let participantLabels: string[] | undefined;
  let sessionLabels: string[] | undefined;
  let skipBidsValidator = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!isOption(arg)) {
      positionals.push(arg);
      continue;
    }

    const { name, inline } = resolveLongOption(arg, APP_LONG_OPTIONS);
    if (name === "-h") return { kind: "help" };
    if (name === "-v") return { kind: "version" };
    if (!isAppLongOption(name)) {
      throw new UsageError(`unrecognized arguments: ${arg}`);
    }

    switch (name) {
      case "--help":
        return { kind: "help" };
      case "--version":
        return { kind: "version" };
      case "--skip_bids_validator":
        if (inline !== undefined) {
          throw new UsageError(
            `argument ${name}: ignored explicit argument '${inline}'`,
          );
        }
        skipBidsValidator = true;
        break;
      case "--participant_label":
      case "--session_label": {
        // `--name=value` takes exactly that one value
        const values: string[] = [];
        if (inline !== undefined) {
          if (inline.length > 0) values.push(inline);
        } else {
          while (i + 1 < args.length && !isOption(args[i + 1])) {
            values.push(args[i + 1]);
            i++;
          }
        }
        if (values.length === 0) {
          throw new UsageError(
            `argument ${name}: expected at least one argument`,
          );
        }
        if (name === "--participant_label") {
          participantLabels = values;
        } else {
          sessionLabels = values;
        }
        break;
      }
    }
  }

  checkPositionals(positionals, APP_POSITIONALS);

  const [bidsDir, analysisLevel] = positionals;
  if (!AnalysisLevelSchema.safeParse(analysisLevel).success) {
    throw new UsageError(
      `argument analysis_level: invalid choice: '${analysisLevel}' (choose from 'participant', 'group')`,
    );
  }

  const parsed = AppOptionsSchema.safeParse({
    bidsDir,
    analysisLevel,
    participantLabels,
    sessionLabels,
    skipBidsValidator,
  });
  if (!parsed.success) {
    throw new UsageError(formatIssues(parsed.error));
  }

  return { kind: "analyze", options: parsed.data };
}

export function parseRunArgs(args: readonly string[]): RunCommand {
  const positionals: string[] = [];

  for (const arg of args) {
    if (!isOption(arg)) {
      positionals.push(arg);
      continue;
    }
    const { name } = resolveLongOption(arg, ["--help"]);
    if (name === "-h" || name === "--help") {
      return { kind: "help" };
    }
    throw new UsageError(`unrecognized arguments: ${arg}`);
  }

  checkPositionals(positionals, RUN_POSITIONALS);

  const [dataDir, subject, session, task, run] = positionals;
  const parsed = RunOptionsSchema.safeParse({
    dataDir,
    subject,
    session,
    task,
    run,
  });
  if (!parsed.success) {
    throw new UsageError(formatIssues(parsed.error));
  }

  return { kind: "run", options: parsed.data };
}
