#!/usr/bin/env node
import { createVoiceMemosProgram } from '../cli/voice-memos.js';
import { handleError } from '../utils/errors.js';

createVoiceMemosProgram()
  .parseAsync(process.argv)
  .catch(handleError);
