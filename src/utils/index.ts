/**
 * Utility functions for logging, errors, naming, and timing
 */

export { getLogger, resetLogger, Logger } from './logger.js';
export type { LoggerConfig, ProgressStats, SummaryStats } from './logger.js';

export {
  BackupToolError,
  InvalidInputError,
  DataAccessError,
  SourceDirectoryError,
  ExportError,
  errorMessage,
  getExitCode,
  handleError,
} from './errors.js';

export {
  DEFAULT_PATHS,
  FAVORITES_DIRNAME,
  getPhotosDbPath,
  getVoiceMemosDbPath,
  sanitizeDirName,
  sanitizeFilename,
  NameRegistry,
  createAlbumNameRegistry,
  createFileNameRegistry,
} from './paths.js';
export type { NameRegistryOptions } from './paths.js';

export async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
