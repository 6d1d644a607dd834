import { readdir, stat } from 'fs/promises';
import { join, resolve } from 'path';
import { SourceDirectoryError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

export interface FileIndex {
  root: string;
  /** Uppercased filename → absolute path of the first match */
  files: Map<string, string>;
  /** Uppercased filenames seen more than once */
  duplicates: Map<string, string[]>;
}

/**
 * Fail before any writes if the downloaded-photos directory is unusable
 */
export async function assertSourceDirectory(sourceDir: string): Promise<void> {
  try {
    const stats = await stat(sourceDir);
    if (!stats.isDirectory()) {
      throw SourceDirectoryError.fromNotDirectory(sourceDir);
    }
  } catch (error) {
    if (error instanceof SourceDirectoryError) {
      throw error;
    }
    throw SourceDirectoryError.fromMissing(sourceDir);
  }
}

/**
 * Index every non-hidden file under `sourceDir` by filename, case-insensitively
 * Directories are walked in sorted order, so "first match" is stable across runs
 */
export async function buildFileIndex(sourceDir: string): Promise<FileIndex> {
  const logger = getLogger();
  const root = resolve(sourceDir);
  await assertSourceDirectory(root);

  const files = new Map<string, string>();
  const duplicates = new Map<string, string[]>();

  const walk = async (dir: string): Promise<void> => {
    const entries = await readdir(dir, { withFileTypes: true });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      if (entry.name.startsWith('.')) continue;
      const fullPath = join(dir, entry.name);

      if (entry.isDirectory()) {
        await walk(fullPath);
      } else if (entry.isFile()) {
        const key = entry.name.toUpperCase();
        const first = files.get(key);
        if (first === undefined) {
          files.set(key, fullPath);
        } else {
          const paths = duplicates.get(key) ?? [first];
          paths.push(fullPath);
          duplicates.set(key, paths);
        }
      }
    }
  };

  logger.info(`Building filename index from ${root}...`);
  await walk(root);
  logger.info(`Indexed ${files.size} files`);

  for (const [name, paths] of duplicates) {
    logger.warn(`${paths.length} files named ${name}; using ${paths[0]}`);
  }

  return { root, files, duplicates };
}

export function lookupFile(index: FileIndex, filename: string): string | undefined {
  return index.files.get(filename.toUpperCase());
}
