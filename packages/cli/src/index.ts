#!/usr/bin/env node
/**
 * chatty: ask local models about a source file and benchmark their answers.
 */

import { main } from './cli';

main(process.argv).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error('Unexpected error:', err);
    process.exit(2);
  },
);
