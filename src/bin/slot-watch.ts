#!/usr/bin/env node

import { main } from '../cli.js';
import { logger } from '../utils/logger.js';

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.cli.error('Fatal error', { error });
    process.exitCode = 1;
  });
