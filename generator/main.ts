#!/usr/bin/env node
import { config as loadEnv } from 'dotenv';
import { runCli } from './cli.js';
import { installPipeGuards, logger } from './safe-logger.js';

// Handle EPIPE errors globally to prevent crashes when stdout/stderr is closed
installPipeGuards();

// Populate process.env from .env before any config is read
loadEnv();

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.error('[Generator] Startup error:', err);
    process.exitCode = 1;
  });
