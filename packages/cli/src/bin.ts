#!/usr/bin/env node
/**
 * brdocs executable
 * brdocs [--json] <value>
 */

import { run } from './cli.js';

process.exitCode = run(process.argv.slice(2), {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
  env: process.env,
});
