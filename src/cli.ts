#!/usr/bin/env node
import './bootstrap.js';
import process from 'node:process';
import { runCli } from './cli/main.js';
import { logger } from './logger.js';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.fatal({ event: 'cli_crashed', message: error instanceof Error ? error.message : String(error) });
    process.exitCode = 1;
  });
