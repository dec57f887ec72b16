#!/usr/bin/env node
import { buildProgram } from './cli.js';
import { createChildLogger } from './logger.js';
import { ConfigurationError, errorMessage } from './errors.js';
import { EXIT_FAILED } from './engine/job-runner.js';

const log = createChildLogger('main');

buildProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    if (err instanceof ConfigurationError) {
      console.error(`Configuration error: ${err.message}`);
    } else {
      log.fatal({ err }, 'Fatal error');
      console.error('Fatal error:', errorMessage(err));
    }
    process.exitCode = EXIT_FAILED;
  });
