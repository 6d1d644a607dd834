import { Command } from 'commander';
import type { VoiceMemoCliOptions } from './types.js';
import { extractVoiceMemos, type ExtractResult } from '../voice-memos/index.js';
import { getLogger } from '../utils/logger.js';
import { DEFAULT_PATHS } from '../utils/paths.js';

export async function runVoiceMemoExtract(
  outputDir: string,
  options: VoiceMemoCliOptions
): Promise<ExtractResult> {
  const logger = getLogger({ verbose: options.verbose ?? false });

  const result = await extractVoiceMemos({
    outputDir,
    recordingsDir: options.recordingsDir,
    dbPath: options.db,
  });

  if (result.skipped.length > 0) {
    logger.warn(`${result.skipped.length} recordings could not be extracted:`);
    for (const skipped of result.skipped) {
      logger.warn(`  ${skipped.source}: ${skipped.reason}`);
    }
  }

  logger.summary({
    recordings: {
      count: result.total,
      extracted: result.extracted.length,
      skipped: result.skipped.length,
    },
  });
  logger.info(`Done! Extracted ${result.extracted.length} Voice Memos to: ${result.outputDir}`);

  return result;
}

export type VoiceMemoHandler = (outputDir: string, options: VoiceMemoCliOptions) => Promise<unknown>;

export function createVoiceMemosProgram(handler: VoiceMemoHandler = runVoiceMemoExtract): Command {
  const program = new Command();

  program
    .name('voice-memo-extract')
    .description('Copy Voice Memos recordings with readable names and original timestamps')
    .version('0.1.0')
    .argument('<outputDir>', 'Destination directory for extracted recordings')
    .option('--recordings-dir <dir>', 'Voice Memos recordings directory', DEFAULT_PATHS.VOICE_MEMOS)
    .option('--db <file>', 'CloudRecordings.db path (default: <recordings-dir>/CloudRecordings.db)')
    .option('--verbose', 'Enable verbose logging')
    .action(async (outputDir: string, options: VoiceMemoCliOptions) => {
      await handler(outputDir, options);
    });

  return program;
}
