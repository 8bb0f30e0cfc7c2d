#!/usr/bin/env node
import { runCli } from './cli/orderCli.js';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error('❌ order command failed:', error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
