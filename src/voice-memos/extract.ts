/**
 * Copy Voice Memos recordings out of the sync container under readable names,
 * stamped with the time each recording was made
 */

import { copyFile, mkdir, stat, utimes } from 'fs/promises';
import { basename, dirname, extname, join, resolve } from 'path';
import { errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import {
  DEFAULT_PATHS,
  createAlbumNameRegistry,
  createFileNameRegistry,
  sanitizeFilename,
} from '../utils/paths.js';
import { coreDataDate, loadVoiceMemos } from './recordings.js';
import type { ExtractResult, PlannedCopy, SkippedRecording, VoiceMemoLibrary } from './types.js';

const DEFAULT_EXTENSION = '.m4a';

export interface ExtractOptions {
  outputDir: string;
  recordingsDir?: string;
  /** Overrides `<recordingsDir>/CloudRecordings.db` */
  dbPath?: string;
}

/**
 * Decide every destination up front
 * Names are reserved in memory, in recording order, so two untitled recordings
 * never share a file and a re-run maps each recording to the same path
 */
export function planCopies(library: VoiceMemoLibrary, outputDir: string): PlannedCopy[] {
  const folderNames = createAlbumNameRegistry();
  const fileNames = createFileNameRegistry();
  const folderDirs = new Map<number, string>();

  const folderDir = (folderId: number | null): string => {
    if (folderId === null) return '';
    const folder = library.folders.get(folderId);
    if (!folder) return '';

    let dir = folderDirs.get(folderId);
    if (dir === undefined) {
      dir = folderNames.claim('', sanitizeFilename(folder.name) || `Folder ${folder.id}`);
      folderDirs.set(folderId, dir);
    }
    return dir;
  };

  return library.recordings.map((recording) => {
    const ext = extname(recording.path) || DEFAULT_EXTENSION;
    const base =
      sanitizeFilename(recording.label ?? '') ||
      sanitizeFilename(basename(recording.path, extname(recording.path))) ||
      `Recording ${recording.id}`;

    const dir = folderDir(recording.folderId);
    const filename = fileNames.claim(dir, base, ext);
    const relativePath = dir ? join(dir, filename) : filename;

    return {
      recording,
      source: join(library.recordingsDir, recording.path),
      destination: join(outputDir, relativePath),
      relativePath,
      timestamp: recording.date === null ? null : coreDataDate(recording.date),
    };
  });
}

/**
 * Copy one recording and set its access/modification time
 * Without a recorded timestamp the source file's times are carried over
 */
export async function copyAndStamp(plan: PlannedCopy): Promise<void> {
  await mkdir(dirname(plan.destination), { recursive: true });
  await copyFile(plan.source, plan.destination);

  if (plan.timestamp) {
    await utimes(plan.destination, plan.timestamp, plan.timestamp);
  } else {
    const source = await stat(plan.source);
    await utimes(plan.destination, source.atime, source.mtime);
  }
}

async function isReadableFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

export async function extractVoiceMemos(options: ExtractOptions): Promise<ExtractResult> {
  const logger = getLogger();
  const recordingsDir = resolve(options.recordingsDir ?? DEFAULT_PATHS.VOICE_MEMOS);
  const outputDir = resolve(options.outputDir);

  // Fatal database errors surface here, before the output directory exists
  const library = await loadVoiceMemos(recordingsDir, options.dbPath);

  if (library.folders.size > 0) {
    const names = [...library.folders.values()].map((folder) => folder.name);
    logger.info(`Found ${names.length} folders: ${names.join(', ')}`);
  }
  logger.info(`Found ${library.recordings.length} Voice Memos`);

  await mkdir(outputDir, { recursive: true });

  const plans = planCopies(library, outputDir);
  const extracted: PlannedCopy[] = [];
  const skipped: SkippedRecording[] = [];

  for (const plan of plans) {
    if (!(await isReadableFile(plan.source))) {
      logger.warn(`Source file not found: ${plan.source}`);
      skipped.push({ recording: plan.recording, source: plan.source, reason: 'source file not found' });
      continue;
    }

    try {
      await copyAndStamp(plan);
      extracted.push(plan);
      logger.info(`Extracted: ${plan.relativePath}`);
    } catch (error) {
      const reason = errorMessage(error);
      logger.warn(`Could not extract ${plan.source}: ${reason}`);
      skipped.push({ recording: plan.recording, source: plan.source, reason });
    }
  }
  logger.phaseComplete('Voice Memos', `${extracted.length}/${plans.length} copied`);

  return { outputDir, total: plans.length, extracted, skipped };
}
