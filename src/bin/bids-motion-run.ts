#!/usr/bin/env node
import { runSingle } from "../cli/run";

runSingle(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error("Unexpected failure:", error);
    process.exitCode = 1;
  },
);
