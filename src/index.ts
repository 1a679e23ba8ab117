export * from "./types/motion";
export * from "./lib/constants";
export * from "./lib/errors";
export { createLogger, loggers, type Logger } from "./lib/logger";
export * from "./services/bids";
export * from "./services/motion";
export * from "./utils/niftiHeader";
export { runApp, type CliContext } from "./cli/app";
export { runSingle } from "./cli/run";
