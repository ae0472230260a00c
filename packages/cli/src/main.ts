#!/usr/bin/env node

/**
 * Name Groups CLI entry point
 */

import { run } from "./cli.js";

process.exitCode = await run(process.argv.slice(2), {
  stdout: process.stdout,
  stderr: process.stderr,
  stdin: process.stdin,
  env: process.env,
});
