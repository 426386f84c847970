#!/usr/bin/env node

import { createProgram } from './cli';
import { formatError } from './errors';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(formatError(error));
    process.exit(1);
  });
