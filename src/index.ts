#!/usr/bin/env node
import 'dotenv/config';

import { runCli } from './cli.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('main');

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    log.fatal({ err }, 'Command failed');
    process.exitCode = 1;
  });
