/**
 * buildlink command-line entry.
 *
 * ESM module — use .js extensions on imports.
 */

import { runCli } from './cli-bridge.js';

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error('[CLI] Fatal:', err);
    process.exitCode = 1;
  },
);
