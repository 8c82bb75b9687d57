#!/usr/bin/env node
import 'dotenv/config';
import { runCli } from './cli.js';
import { logger } from './logger.js';

runCli(process.argv.slice(2), { log: logger })
  .then(({ result, exitCode }) => {
    process.stdout.write(`${JSON.stringify(result)}\n`);
    process.exitCode = exitCode;
  })
  .catch((err) => {
    logger.fatal({ err }, 'Unhandled error');
    process.stdout.write(`${JSON.stringify({ failed: true, msg: String(err) })}\n`);
    process.exitCode = 1;
  });
