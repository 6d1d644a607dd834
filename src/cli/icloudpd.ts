import { Command } from 'commander';
import type { RetryCliOptions } from './types.js';
import { DEFAULT_DOWNLOADER, DEFAULT_RETRY_DELAY_MS, runUntilSuccess } from '../icloudpd/retry-loop.js';
import { InvalidInputError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * Parse --delay (seconds) into milliseconds
 */
export function parseDelay(value: string): number {
  const seconds = Number(value);
  if (value.trim() === '' || !Number.isFinite(seconds) || seconds < 0) {
    throw InvalidInputError.fromInvalidNumber('--delay', value);
  }
  return Math.round(seconds * 1000);
}

export async function runRetryLoop(args: string[], options: RetryCliOptions): Promise<number> {
  getLogger({ verbose: options.verbose ?? false });
  return runUntilSuccess({ command: options.command, args, delayMs: options.delayMs });
}

export type RetryHandler = (args: string[], options: RetryCliOptions) => Promise<unknown>;

export function createRetryProgram(handler: RetryHandler = runRetryLoop): Command {
  const program = new Command();

  program
    .name('icloudpd-retry')
    .description('Re-run icloudpd until it exits successfully')
    .version('0.1.0')
    .argument('[args...]', 'Arguments passed to the downloader (put them after --)')
    .option('--command <bin>', 'Downloader executable', DEFAULT_DOWNLOADER)
    .option('--delay <seconds>', 'Seconds to wait between attempts (default: 60)', parseDelay, DEFAULT_RETRY_DELAY_MS)
    .option('--verbose', 'Enable verbose logging')
    .passThroughOptions()
    .action(async (args: string[], options: { command: string; delay: number; verbose?: boolean }) => {
      await handler(args, { command: options.command, delayMs: options.delay, verbose: options.verbose });
    });

  return program;
}
