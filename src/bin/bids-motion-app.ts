#!/usr/bin/env node
import { runApp } from "../cli/app";

runApp(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error("Unexpected failure:", error);
    process.exitCode = 1;
  },
);
