import { assertSchema, withReadOnlyDatabase, type SqliteDatabase } from '../core/database.js';
import { getVoiceMemosDbPath } from '../utils/paths.js';
import type { Recording, VoiceMemoFolder, VoiceMemoLibrary } from './types.js';

/** Seconds between the Unix epoch and 2001-01-01T00:00:00Z */
export const CORE_DATA_EPOCH_OFFSET = 978307200;

const REQUIRED_COLUMNS = {
  ZFOLDER: ['Z_PK', 'ZENCRYPTEDNAME'],
  ZCLOUDRECORDING: ['Z_PK', 'ZPATH', 'ZCUSTOMLABELFORSORTING', 'ZDATE', 'ZFOLDER', 'ZEVICTIONDATE'],
} as const;

export function coreDataDate(seconds: number): Date {
  return new Date((seconds + CORE_DATA_EPOCH_OFFSET) * 1000);
}

export function readFolders(db: SqliteDatabase): Map<number, VoiceMemoFolder> {
  const rows = db
    .prepare<[], { id: number; name: string | null }>(
      `SELECT Z_PK AS id, ZENCRYPTEDNAME AS name FROM ZFOLDER ORDER BY Z_PK`
    )
    .all();

  return new Map(
    rows.flatMap(({ id, name }) => (name ? [[id, { id, name }] as const] : []))
  );
}

/**
 * Recordings that still have audio on disk
 * "Recently Deleted" entries carry an eviction date and are left out
 */
export function readRecordings(db: SqliteDatabase): Recording[] {
  return db
    .prepare<[], Recording>(
      `SELECT
         Z_PK AS id,
         ZCUSTOMLABELFORSORTING AS label,
         ZPATH AS path,
         ZDATE AS date,
         ZFOLDER AS folderId
       FROM ZCLOUDRECORDING
       WHERE ZEVICTIONDATE IS NULL AND ZPATH IS NOT NULL AND ZPATH != ''
       ORDER BY ZDATE, Z_PK`
    )
    .all();
}

/**
 * Read folders and recordings from `<recordingsDir>/CloudRecordings.db`
 */
export async function loadVoiceMemos(recordingsDir: string, dbPath?: string): Promise<VoiceMemoLibrary> {
  const path = dbPath ?? getVoiceMemosDbPath(recordingsDir);

  return withReadOnlyDatabase(
    path,
    (db) => {
      assertSchema(db, path, REQUIRED_COLUMNS);
      return {
        recordingsDir,
        folders: readFolders(db),
        recordings: readRecordings(db),
      };
    },
    { missingHint: 'Make sure Voice Memos iCloud sync is enabled.' }
  );
}
