/**
 * Keep re-running the icloudpd downloader until it exits cleanly
 * - Fixed delay between attempts, no backoff
 * - No attempt limit and no error classification: any failure is retried
 */

import { spawn } from 'child_process';
import { getLogger } from '../utils/logger.js';
import { sleep } from '../utils/index.js';

export const DEFAULT_DOWNLOADER = 'icloudpd';
export const DEFAULT_RETRY_DELAY_MS = 60_000;

export interface AttemptOutcome {
  /** Process exit code, null when killed by a signal or never started */
  exitCode: number | null;
  signal?: NodeJS.Signals | null;
  error?: Error;
}

export type ProcessRunner = (command: string, args: string[]) => Promise<AttemptOutcome>;

export interface RetryLoopOptions {
  command?: string;
  args?: string[];
  delayMs?: number;
  runner?: ProcessRunner;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Run a child process with inherited stdio and report how it ended
 * Never rejects: a spawn failure is an outcome like any other
 */
export const spawnRunner: ProcessRunner = (command, args) =>
  new Promise((resolve) => {
    const child = spawn(command, args, { stdio: 'inherit' });
    child.once('error', (error) => resolve({ exitCode: null, error }));
    child.once('exit', (exitCode, signal) => resolve({ exitCode, signal }));
  });

function describeOutcome(outcome: AttemptOutcome): string {
  if (outcome.error) return `failed to start (${outcome.error.message})`;
  if (outcome.signal) return `killed by ${outcome.signal}`;
  return `exited with code ${outcome.exitCode}`;
}

/**
 * @returns the number of attempts it took
 */
export async function runUntilSuccess(options: RetryLoopOptions = {}): Promise<number> {
  const logger = getLogger();
  const command = options.command ?? DEFAULT_DOWNLOADER;
  const args = options.args ?? [];
  const delayMs = options.delayMs ?? DEFAULT_RETRY_DELAY_MS;
  const runner = options.runner ?? spawnRunner;
  const wait = options.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    logger.info(`Attempt ${attempt}: ${[command, ...args].join(' ')}`);
    const outcome = await runner(command, args);

    if (outcome.exitCode === 0) {
      logger.info(`${command} finished successfully after ${attempt} attempt(s)`);
      return attempt;
    }

    logger.warn(`${command} ${describeOutcome(outcome)}; retrying in ${Math.round(delayMs / 1000)}s`);
    await wait(delayMs);
  }
}
