import { APP_NAME } from "../lib/constants";

export const RUN_PROG = "bids-motion-run";
export const APP_PROG = "bids-motion-app";

export const RUN_USAGE = `usage: ${RUN_PROG} [-h] data_dir subject session task run`;

export const APP_USAGE = `usage: ${APP_PROG} [-h] [--session_label SESSION_LABEL [SESSION_LABEL ...]]
                       [--participant_label PARTICIPANT_LABEL [PARTICIPANT_LABEL ...]]
                       [--skip_bids_validator] [-v]
                       bids_dir {participant,group}`;

export const RUN_HELP = `${RUN_USAGE}

Process motion TSV files in BIDS-like directory structure

positional arguments:
  data_dir    Root data directory path
  subject     Subject ID (e.g., sub-01)
  session     Session ID (e.g., ses-01)
  task        Task name (e.g., rest)
  run         Run identifier (e.g., run-01)

options:
  -h, --help  show this help message and exit

Examples:
  ${RUN_PROG} /data sub-01 ses-01 rest run-01
  ${RUN_PROG} /path/to/data sub-02 ses-baseline task1 run-02

Expected directory structure:
  data_dir/
    subject/
      session/
        func/
          subject_session_task-TASK_run_desc-filteredincludingFD_motion.tsv
          subject_session_task-TASK_run_desc-includingFD_motion.tsv
`;

export const APP_HELP = `${APP_USAGE}

${APP_NAME} - BIDS App

positional arguments:
  bids_dir              The directory with the input dataset formatted according
                        to the BIDS standard.
  {participant,group}   Level of the analysis that will be performed.

options:
  -h, --help            show this help message and exit
  --session_label SESSION_LABEL [SESSION_LABEL ...]
                        The label(s) of the session(s) to analyze. The label
                        corresponds to ses-<session_label> (so it does not
                        include "ses-").
  --participant_label PARTICIPANT_LABEL [PARTICIPANT_LABEL ...]
                        The label(s) of the participant(s) to analyze. The label
                        corresponds to sub-<participant_label> (so it does not
                        include "sub-").
  --skip_bids_validator
                        Skip BIDS dataset validation
  -v, --version         show program's version number and exit

Processes motion TSV files by extracting specific columns and renaming them.

Examples:
  ${APP_PROG} /data participant --participant_label 01 02 --session_label 01
  ${APP_PROG} /data group

Expected input files:
  *_desc-filteredincludingFD_motion.tsv → *_desc-filtered_motion.tsv
  *_desc-includingFD_motion.tsv → *_motion.tsv
`;

export interface CliIO {
  out: (text: string) => void;
  err: (text: string) => void;
}

export const processIO: CliIO = {
  out: (text) => {
    process.stdout.write(text);
  },
  err: (text) => {
    process.stderr.write(text);
  },
};

export function formatUsageError(
  usage: string,
  prog: string,
  message: string,
): string {
  return `${usage}\n${prog}: error: ${message}\n`;
}
