/**
 * BIDS (Brain Imaging Data Structure) Services
 *
 * Provides validation and layout indexing of BIDS-formatted datasets.
 */

export * from "./validator";
export * from "./layout";
