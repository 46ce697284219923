#!/usr/bin/env node
import { runCli } from "./cli.js";

runCli(process.argv.slice(2), { env: process.env }).then(
  (code) => {
    process.exitCode = code;
  },
  (e: unknown) => {
    console.error(`[stag-hunt] ${e instanceof Error ? (e.stack ?? e.message) : String(e)}`);
    process.exitCode = 1;
  },
);
