/**
 * Path utilities and naming policy for output layout
 * Defines default source locations, filename sanitizing, and collision-safe naming
 */

import { homedir } from 'os';
import { join } from 'path';

const HOME = homedir();

/**
 * Default locations on a macOS machine with iCloud sync enabled
 */
export const DEFAULT_PATHS = {
  /** Photos.app library bundle */
  PHOTOS_LIBRARY: join(HOME, 'Pictures', 'Photos Library.photoslibrary'),
  /** Flat download directory written by icloudpd */
  ICLOUDPD_BACKUP: join(HOME, 'icloud-photos-backup'),
  /** Voice Memos recordings, including CloudRecordings.db */
  VOICE_MEMOS: join(
    HOME,
    'Library',
    'Group Containers',
    'group.com.apple.VoiceMemos.shared',
    'Recordings'
  ),
} as const;

export const PHOTOS_DB_RELATIVE = join('database', 'Photos.sqlite');
export const VOICE_MEMOS_DB_FILENAME = 'CloudRecordings.db';
export const FAVORITES_DIRNAME = '_Favorites';

export function getPhotosDbPath(library: string): string {
  return join(library, PHOTOS_DB_RELATIVE);
}

export function getVoiceMemosDbPath(recordingsDir: string): string {
  return join(recordingsDir, VOICE_MEMOS_DB_FILENAME);
}

/**
 * Directory-safe album or folder name
 * Letters, digits, space, hyphen and underscore are kept; everything else becomes "_"
 *
 * @param fallback - Used when the sanitized name would be empty
 */
export function sanitizeDirName(name: string, fallback: string): string {
  const sanitized = name.replace(/[^\p{L}\p{M}\p{N} _-]/gu, '_').trim();
  return sanitized || fallback;
}

/**
 * Replace characters that are invalid in macOS/Windows filenames with "_"
 */
export function sanitizeFilename(name: string): string {
  return name.replace(/[<>:"/\\|?*]/g, '_').trim();
}

export interface NameRegistryOptions {
  /** Suffix appended for the nth claim of an already-used name */
  suffix: (n: number) => string;
  /** First n tried after the bare name */
  firstCounter: number;
}

/**
 * Hands out names that are unique within a scope (usually a parent directory)
 * Comparison ignores case, matching the default macOS filesystem
 * The same sequence of claims always yields the same names
 */
export class NameRegistry {
  private readonly used = new Map<string, Set<string>>();

  constructor(private readonly options: NameRegistryOptions) {}

  /**
   * Mark a name as taken without claiming it (e.g. reserved directory names)
   */
  reserve(scope: string, name: string): void {
    this.scopeSet(scope).add(name.toLowerCase());
  }

  /**
   * Claim `base + ext`, or the first free `base + suffix(n) + ext`
   */
  claim(scope: string, base: string, ext: string = ''): string {
    const taken = this.scopeSet(scope);
    let candidate = `${base}${ext}`;
    let counter = this.options.firstCounter;

    while (taken.has(candidate.toLowerCase())) {
      candidate = `${base}${this.options.suffix(counter)}${ext}`;
      counter++;
    }

    taken.add(candidate.toLowerCase());
    return candidate;
  }

  private scopeSet(scope: string): Set<string> {
    let set = this.used.get(scope);
    if (!set) {
      set = new Set();
      this.used.set(scope, set);
    }
    return set;
  }
}

/** "Trip", "Trip (2)", "Trip (3)" */
export function createAlbumNameRegistry(): NameRegistry {
  return new NameRegistry({ suffix: (n) => ` (${n})`, firstCounter: 2 });
}

/** "memo.m4a", "memo_1.m4a", "memo_2.m4a" */
export function createFileNameRegistry(): NameRegistry {
  return new NameRegistry({ suffix: (n) => `_${n}`, firstCounter: 1 });
}
