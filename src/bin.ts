#!/usr/bin/env node

import { createProgram } from './cli.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
