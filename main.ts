#!/usr/bin/env node
/**
 * CLI entry point for pdf-outline
 */

import { main } from './src/cli';

main(process.argv.slice(2), process.env)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error('[pdf-outline] fatal', err);
    process.exitCode = 1;
  });
