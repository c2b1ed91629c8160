/**
 * Test utilities for the datamodels CLI.
 */

import { runCli } from "../../src/cli/run.ts";

export interface CliResult {
  stdout: string[];
  stderr: string[];
  exitCode: number;
}

/** Run the CLI in-process and capture what it prints. */
export function run(...args: string[]): CliResult {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const exitCode = runCli(args, {
    out: (line) => stdout.push(line),
    err: (line) => stderr.push(line),
  });
  return { stdout, stderr, exitCode };
}
