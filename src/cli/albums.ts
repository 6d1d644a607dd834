import { Command } from 'commander';
import type { AlbumCliOptions } from './types.js';
import {
  buildAlbumMapping,
  listAlbums,
  loadPhotoLibrary,
  materializeAlbums,
  writeAlbumMapping,
  writeMissingReport,
  assertSourceDirectory,
  type AlbumListing,
  type AlbumMapping,
  type MaterializeReport,
} from '../photos/index.js';
import { getLogger } from '../utils/logger.js';
import { DEFAULT_PATHS, FAVORITES_DIRNAME, getPhotosDbPath } from '../utils/paths.js';

export interface AlbumCommandResult {
  listing: AlbumListing;
  mapping?: AlbumMapping;
  report?: MaterializeReport;
}

function displayPath(folder: string[], name: string): string {
  return [...folder, name].join('/');
}

export async function runAlbumExport(options: AlbumCliOptions): Promise<AlbumCommandResult> {
  const logger = getLogger({ verbose: options.verbose ?? false });
  const dbPath = options.db ?? getPhotosDbPath(options.library);
  const exporting = !options.list && (options.outputJson !== undefined || options.outputDir !== undefined);

  // Both preconditions are checked before the first write
  if (exporting && options.outputDir !== undefined) {
    await assertSourceDirectory(options.sourceDir);
  }

  logger.info('Reading Photos.app database...');
  const listing = await listAlbums(options.library, dbPath);

  logger.info(`Found ${listing.summaries.length} albums and ${listing.favorites} favorites:`);
  for (const summary of listing.summaries) {
    logger.info(`  ${displayPath(summary.folder, summary.key)}: ${summary.count} photos`);
  }
  logger.info(`  ${FAVORITES_DIRNAME}: ${listing.favorites} photos`);

  if (options.list) {
    return { listing };
  }

  if (!exporting) {
    logger.info('Use --output-json or --output-dir to export');
    logger.info('Use --list to just list albums');
    return { listing };
  }

  const library = await loadPhotoLibrary(options.library, dbPath);
  const result: AlbumCommandResult = { listing };

  if (options.outputJson !== undefined) {
    result.mapping = buildAlbumMapping(library);
    await writeAlbumMapping(options.outputJson, result.mapping);
    logger.info(`Exported album mapping to: ${options.outputJson}`);
  }

  if (options.outputDir !== undefined) {
    logger.info(`Exporting to folders: ${options.outputDir}`);
    logger.info(`Source: ${options.sourceDir}`);

    const report = await materializeAlbums(library, {
      outputDir: options.outputDir,
      sourceDir: options.sourceDir,
      mode: options.copy ? 'copy' : 'symlink',
    });
    result.report = report;

    const { totals } = report;
    logger.info(`Total: ${totals.found} found, ${totals.missing} missing`);
    logger.summary({
      albums: { count: totals.albums, found: totals.found, missing: totals.missing, failed: totals.failed },
    });

    if (options.missingReport !== undefined) {
      await writeMissingReport(options.missingReport, report);
    }
  }

  return result;
}

export type AlbumHandler = (options: AlbumCliOptions) => Promise<unknown>;

export function createAlbumsProgram(handler: AlbumHandler = runAlbumExport): Command {
  const program = new Command();

  program
    .name('album-export')
    .description('Rebuild Photos.app album structure on top of an icloudpd download')
    .version('0.1.0')
    .option('--library <dir>', 'Photos library bundle', DEFAULT_PATHS.PHOTOS_LIBRARY)
    .option('--db <file>', 'Photos.sqlite path (default: <library>/database/Photos.sqlite)')
    .option('-l, --list', 'Just list albums')
    .option('-j, --output-json <file>', 'Write the album mapping as JSON')
    .option('-d, --output-dir <dir>', 'Create one folder per album under this directory')
    .option('-s, --source-dir <dir>', 'Directory with photos downloaded by icloudpd', DEFAULT_PATHS.ICLOUDPD_BACKUP)
    .option('--copy', 'Copy files instead of symlinking')
    .option('--missing-report <file>', 'Write photos with no downloaded file as JSON')
    .option('--verbose', 'Enable verbose logging')
    .action(async (options: AlbumCliOptions) => {
      await handler(options);
    });

  return program;
}
