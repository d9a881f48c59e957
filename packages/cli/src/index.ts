#!/usr/bin/env node

import dotenv from 'dotenv';
import { snapshotEnvironment } from '@opsflow/core';
import { createCli } from './cli.js';

// Load environment variables
dotenv.config();

async function main(): Promise<number> {
  const cli = createCli({
    cwd: process.cwd(),
    env: snapshotEnvironment(process.env),
    stdout: process.stdout,
    stderr: process.stderr,
  });
  return cli.execute(process.argv.slice(2));
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
