/**
 * Project the album mapping onto the filesystem
 * <output>/<folder>/.../<album>/<original filename> → file in the flat icloudpd download
 */

import { copyFile, lstat, mkdir, readlink, stat, symlink, unlink, utimes } from 'fs/promises';
import type { Stats } from 'fs';
import { join, resolve } from 'path';
import { errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import {
  FAVORITES_DIRNAME,
  createAlbumNameRegistry,
  sanitizeDirName,
  type NameRegistry,
} from '../utils/paths.js';
import { assertSourceDirectory, buildFileIndex, lookupFile, type FileIndex } from './file-index.js';
import type { PhotoLibrary, PhotoRef } from './types.js';

export type LinkMode = 'symlink' | 'copy';

export interface MaterializeOptions {
  outputDir: string;
  sourceDir: string;
  mode?: LinkMode;
}

export type PlaceOutcome = 'created' | 'replaced' | 'unchanged';

export interface AlbumExportResult {
  key: string;
  /** Album directory, relative to the output root */
  path: string;
  total: number;
  /** Members present in the album directory after this run */
  found: number;
  created: number;
  unchanged: number;
  /** Filenames with no match in the source directory */
  missing: string[];
  /** Filenames whose link or copy could not be written */
  failed: string[];
}

export interface MaterializeReport {
  outputDir: string;
  sourceDir: string;
  mode: LinkMode;
  albums: AlbumExportResult[];
  totals: {
    albums: number;
    found: number;
    missing: number;
    failed: number;
  };
}

interface AlbumTarget {
  key: string;
  relativeDir: string;
  photos: PhotoRef[];
}

function isNotFound(error: unknown): boolean {
  return (error as NodeJS.ErrnoException).code === 'ENOENT';
}

/** Name icloudpd gives the downloaded file */
export function photoLookupName(photo: PhotoRef): string {
  return photo.originalFilename ?? photo.filename;
}

/**
 * Assign each album a unique relative directory
 * Folder directories are claimed once per distinct folder path, so albums in the
 * same folder share it and a folder never merges with a same-named album
 */
export function planAlbumDirectories(library: PhotoLibrary): AlbumTarget[] {
  const registry: NameRegistry = createAlbumNameRegistry();
  registry.reserve('', FAVORITES_DIRNAME);
  const folderDirs = new Map<string, string>();

  const resolveFolder = (parts: string[]): string => {
    let parentKey = '';
    let parentDir = '';
    for (const part of parts) {
      const key = `${parentKey}/${part}`;
      let dir = folderDirs.get(key);
      if (dir === undefined) {
        const name = registry.claim(parentDir, sanitizeDirName(part, 'Untitled Folder'));
        dir = parentDir ? `${parentDir}/${name}` : name;
        folderDirs.set(key, dir);
      }
      parentKey = key;
      parentDir = dir;
    }
    return parentDir;
  };

  const targets: AlbumTarget[] = library.albums.map((album) => {
    const parentDir = resolveFolder(album.folder);
    const name = registry.claim(parentDir, sanitizeDirName(album.title, `Album ${album.id}`));
    return {
      key: album.key,
      relativeDir: parentDir ? `${parentDir}/${name}` : name,
      photos: album.photos,
    };
  });

  if (library.favorites.length > 0) {
    targets.push({ key: FAVORITES_DIRNAME, relativeDir: FAVORITES_DIRNAME, photos: library.favorites });
  }

  return targets;
}

async function isUpToDate(existing: Stats, src: string, dest: string, mode: LinkMode): Promise<boolean> {
  if (mode === 'symlink') {
    return existing.isSymbolicLink() && (await readlink(dest)) === src;
  }
  if (!existing.isFile()) {
    return false;
  }
  const source = await stat(src);
  return (
    source.size === existing.size &&
    Math.floor(source.mtimeMs / 1000) === Math.floor(existing.mtimeMs / 1000)
  );
}

/**
 * Make `dest` a symlink to, or a copy of, `src`
 * An entry that already matches is left alone; anything else in the way is replaced
 */
export async function placeEntry(src: string, dest: string, mode: LinkMode): Promise<PlaceOutcome> {
  let existing: Stats | undefined;
  try {
    existing = await lstat(dest);
  } catch (error) {
    if (!isNotFound(error)) throw error;
  }

  if (existing) {
    if (existing.isDirectory()) {
      throw new Error(`a directory is in the way at ${dest}`);
    }
    if (await isUpToDate(existing, src, dest, mode)) {
      return 'unchanged';
    }
    await unlink(dest);
  }

  if (mode === 'symlink') {
    await symlink(src, dest);
  } else {
    await copyFile(src, dest);
    const source = await stat(src);
    await utimes(dest, source.atime, source.mtime);
  }

  return existing ? 'replaced' : 'created';
}

async function materializeAlbum(
  target: AlbumTarget,
  outputDir: string,
  index: FileIndex,
  mode: LinkMode
): Promise<AlbumExportResult> {
  const logger = getLogger();
  const albumDir = join(outputDir, target.relativeDir);

  const result: AlbumExportResult = {
    key: target.key,
    path: target.relativeDir,
    total: target.photos.length,
    found: 0,
    created: 0,
    unchanged: 0,
    missing: [],
    failed: [],
  };

  try {
    await mkdir(albumDir, { recursive: true });
  } catch (error) {
    result.failed = target.photos.map(photoLookupName);
    logger.error(`${target.key}: cannot create ${albumDir}: ${errorMessage(error)}`);
    return result;
  }

  // Upper-cased names already placed in this album directory
  const placed = new Set<string>();

  for (const photo of target.photos) {
    const name = photoLookupName(photo);
    const src = lookupFile(index, name);
    if (!src) {
      result.missing.push(name);
      logger.debug(`${target.key}: no downloaded file for ${name}`);
      continue;
    }
    if (placed.has(name.toUpperCase())) {
      result.missing.push(name);
      logger.warn(`${target.key}: more than one member is named ${name}; keeping the first`);
      continue;
    }
    placed.add(name.toUpperCase());

    try {
      const outcome = await placeEntry(src, join(albumDir, name), mode);
      result.found++;
      if (outcome === 'unchanged') {
        result.unchanged++;
      } else {
        result.created++;
      }
    } catch (error) {
      result.failed.push(name);
      logger.error(`${target.key}/${name}: ${errorMessage(error)}`);
    }
  }

  return result;
}

/**
 * Create one directory per album and fill it with links (or copies) of the
 * downloaded files. The source directory is checked before anything is written.
 */
export async function materializeAlbums(
  library: PhotoLibrary,
  options: MaterializeOptions
): Promise<MaterializeReport> {
  const logger = getLogger();
  const mode = options.mode ?? 'symlink';
  const sourceDir = resolve(options.sourceDir);
  const outputDir = resolve(options.outputDir);

  await assertSourceDirectory(sourceDir);
  const index = await buildFileIndex(sourceDir);
  await mkdir(outputDir, { recursive: true });

  const targets = planAlbumDirectories(library);
  const albums: AlbumExportResult[] = [];

  logger.phaseStart(`materialize ${targets.length} albums (${mode})`);
  for (const [i, target] of targets.entries()) {
    const result = await materializeAlbum(target, outputDir, index, mode);
    albums.push(result);
    logger.info(`  ${result.path}: ${result.found}/${result.total} photos`);
    logger.progress({ phase: 'Albums', current: i + 1, total: targets.length });
  }

  const totals = albums.reduce(
    (acc, album) => ({
      albums: acc.albums + 1,
      found: acc.found + album.found,
      missing: acc.missing + album.missing.length,
      failed: acc.failed + album.failed.length,
    }),
    { albums: 0, found: 0, missing: 0, failed: 0 }
  );
  logger.phaseComplete('Albums', `${totals.albums} directories under ${outputDir}`);

  return { outputDir, sourceDir, mode, albums, totals };
}
