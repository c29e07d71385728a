#!/usr/bin/env node
/**
 * stepshell: run a feature file against shell-script step implementations.
 * Usage:
 *   stepshell counter.feature
 *   stepshell counter.feature steps/counter.gherkin --json
 *   stepshell counter.feature --impl-dir ./steps --timeout 30000
 */
import { runCli } from "./cli/main.js";

const controller = new AbortController();
const abort = (): void => controller.abort();
process.once("SIGINT", abort);
process.once("SIGTERM", abort);

runCli(process.argv.slice(2), {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
  colors: process.stdout.isTTY === true && !("NO_COLOR" in process.env),
  signal: controller.signal,
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = 2;
  })
  .finally(() => {
    process.off("SIGINT", abort);
    process.off("SIGTERM", abort);
  });
