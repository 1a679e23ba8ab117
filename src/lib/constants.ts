import type { ColumnMapping, TransformPattern } from "../types/motion";

export const APP_NAME = "BIDS Motion TSV";
export const APP_VERSION = "1.0.0";

// ============================================================================
// Motion Table Constants
// ============================================================================

/**
 * Upstream motion columns and the short names they are written under.
 * Output columns follow this order.
 */
export const COLUMN_MAPPING = [
  ["trans_x_mm", "X"],
  ["trans_y_mm", "Y"],
  ["trans_z_mm", "Z"],
  ["rot_x_degrees", "RotX"],
  ["rot_y_degrees", "RotY"],
  ["rot_z_degrees", "RotZ"],
  ["trans_x_mm_dt", "XDt"],
  ["trans_y_mm_dt", "YDt"],
  ["trans_z_mm_dt", "ZDt"],
  ["rot_x_degrees_dt", "RotXDt"],
  ["rot_y_degrees_dt", "RotYDt"],
  ["rot_z_degrees_dt", "RotZDt"],
] as const satisfies ColumnMapping;

export const TRANSFORM_PATTERNS: readonly TransformPattern[] = [
  {
    inputSuffix: "_desc-filteredincludingFD_motion.tsv",
    outputSuffix: "_desc-filtered_motion.tsv",
    label: "Filtered including FD → Filtered",
  },
  {
    inputSuffix: "_desc-includingFD_motion.tsv",
    outputSuffix: "_motion.tsv",
    label: "Including FD → Motion",
  },
];

// ============================================================================
// Run Discovery Constants
// ============================================================================

/** Samples acquired per resting-state run */
export const SAMPLES_PER_RUN = 383;

/** Task whose runs are counted from the dtseries artifact */
export const DERIVED_RUN_TASK = "rest";

export const FUNC_DIR_NAME = "func";
