#!/usr/bin/env node
import { createRetryProgram } from '../cli/icloudpd.js';
import { handleError } from '../utils/errors.js';

createRetryProgram()
  .parseAsync(process.argv)
  .catch(handleError);
