#!/usr/bin/env node

import { runCli } from '../cli.js';
import { GitService } from '../git-service.js';

const exitCode = await runCli(process.argv.slice(2), new GitService(), {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
});
process.exitCode = exitCode;
