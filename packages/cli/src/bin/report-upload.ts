#!/usr/bin/env node
/**
 * report-upload CLI
 *
 * Uploads Allure results to the report service as a post-run hook.
 */

import { main } from '../main.js';

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error('[report-upload] Fatal error:', error);
    process.exit(1);
  });
