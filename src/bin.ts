#!/usr/bin/env node
import 'dotenv/config';
import { createDefaultContext, runCli } from './cli.js';

process.on('SIGINT', () => {
  process.stderr.write('\n👋 Interrupted by user\n');
  process.exit(130);
});

process.on('SIGTERM', () => {
  process.exit(0);
});

runCli(process.argv.slice(2), createDefaultContext()).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    process.stderr.write(`Fatal: ${error instanceof Error ? error.stack ?? error.message : String(error)}\n`);
    process.exitCode = 1;
  }
);
