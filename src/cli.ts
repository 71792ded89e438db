#!/usr/bin/env node

import { run } from './scripts/download.js';
import { logger } from './utils/logger.js';

run(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    logger().error('Unexpected failure', { error });
    process.exitCode = 1;
  }
);
