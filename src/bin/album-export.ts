#!/usr/bin/env node
import { createAlbumsProgram } from '../cli/albums.js';
import { handleError } from '../utils/errors.js';

createAlbumsProgram()
  .parseAsync(process.argv)
  .catch(handleError);
