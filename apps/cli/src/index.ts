#!/usr/bin/env -S npx tsx

/**
 * docstruct entry point
 *
 * Usage:
 *   npx tsx apps/cli/src/index.ts --api KEY1,KEY2 --json-template template.json
 *   npx tsx apps/cli/src/index.ts --no-json-template --inputPDF invoices --outputJSON out
 */

import { runCli } from './main.js';
import { EXIT_CODES } from './lib/exit-codes.js';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('[CLI] Fatal error:', error);
    process.exitCode = EXIT_CODES.UNEXPECTED_ERROR;
  });
