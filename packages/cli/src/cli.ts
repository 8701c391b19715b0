#!/usr/bin/env node
import { runCli } from './program.js';

runCli(process.argv).catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
