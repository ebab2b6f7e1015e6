#!/usr/bin/env node
/**
 * `stm` CLI entry point.
 */

import { createProgram } from './program.js';
import { cliError } from './renderers/index.js';

createProgram()
  .parseAsync()
  .catch((err: unknown) => {
    cliError(err);
  });
