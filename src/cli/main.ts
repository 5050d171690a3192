#!/usr/bin/env node
import { createCli } from './index.js';
import { describeError } from './context.js';
import { logger as log } from '../utils/logger.js';

createCli()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    log.error(describeError(error));
    process.exit(1);
  });
