#!/usr/bin/env node
/**
 * Command line entry point
 *
 * Usage:
 *   anim-track-rebuilder [config.json]
 */

import { logger, main } from './main';

main(process.argv.slice(2)).then(
  code => {
    process.exitCode = code;
  },
  (error: unknown) => {
    logger.logError(error instanceof Error ? error : new Error(String(error)));
    process.exitCode = 1;
  }
);
