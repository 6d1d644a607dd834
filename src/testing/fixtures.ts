/**
 * Throwaway Photos.app and Voice Memos databases for tests
 * Only the tables and columns the tools read are created
 */

import { mkdirSync, mkdtempSync, readdirSync, readlinkSync, lstatSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import Database from 'better-sqlite3';

export function makeTempDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), `${prefix}-`));
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

export function writeFiles(root: string, files: Record<string, string>): void {
  for (const [relativePath, content] of Object.entries(files)) {
    const fullPath = join(root, relativePath);
    mkdirSync(dirname(fullPath), { recursive: true });
    writeFileSync(fullPath, content);
  }
}

/**
 * Every entry under `root`, sorted, with symlink targets or file contents
 */
export function snapshotTree(root: string): string[] {
  const lines: string[] = [];
  const walk = (dir: string, prefix: string): void => {
    for (const name of readdirSync(dir).sort()) {
      const fullPath = join(dir, name);
      const relative = prefix ? `${prefix}/${name}` : name;
      const stats = lstatSync(fullPath);
      if (stats.isSymbolicLink()) {
        lines.push(`${relative} -> ${readlinkSync(fullPath)}`);
      } else if (stats.isDirectory()) {
        lines.push(`${relative}/`);
        walk(fullPath, relative);
      } else {
        lines.push(`${relative} = ${readFileSync(fullPath, 'utf-8')}`);
      }
    }
  };
  walk(root, '');
  return lines;
}

export interface FixtureAsset {
  id: number;
  filename: string | null;
  uuid: string;
  directory: string;
  originalFilename: string | null;
  favorite?: boolean;
}

export interface FixtureAlbum {
  id: number;
  kind: number;
  title: string | null;
  parent?: number | null;
  cachedCount?: number | null;
  assets?: number[];
}

export interface PhotosFixture {
  albums: FixtureAlbum[];
  assets: FixtureAsset[];
  /** Join table number, e.g. 32 for Z_32ASSETS */
  joinEntity?: number;
  /** Leave out the album/asset join table */
  omitJoinTable?: boolean;
}

/**
 * Create `<library>/database/Photos.sqlite`
 */
export function createPhotosLibrary(library: string, fixture: PhotosFixture): string {
  const dbPath = join(library, 'database', 'Photos.sqlite');
  mkdirSync(dirname(dbPath), { recursive: true });

  const entity = fixture.joinEntity ?? 32;
  const joinTable = `Z_${entity}ASSETS`;
  const albumColumn = `Z_${entity}ALBUMS`;

  const db = new Database(dbPath);
  try {
    db.exec(`
      CREATE TABLE ZGENERICALBUM (Z_PK INTEGER PRIMARY KEY, ZKIND INTEGER, ZTITLE VARCHAR, ZPARENTFOLDER INTEGER, ZCACHEDCOUNT INTEGER);
      CREATE TABLE ZASSET (Z_PK INTEGER PRIMARY KEY, ZDIRECTORY VARCHAR, ZFILENAME VARCHAR, ZUUID VARCHAR, ZFAVORITE INTEGER);
      CREATE TABLE ZADDITIONALASSETATTRIBUTES (Z_PK INTEGER PRIMARY KEY, ZASSET INTEGER, ZORIGINALFILENAME VARCHAR);
      CREATE TABLE Z_1KEYWORDS (Z_1ASSETATTRIBUTES INTEGER, Z_52KEYWORDS INTEGER);
    `);
    if (!fixture.omitJoinTable) {
      db.exec(`CREATE TABLE ${joinTable} (${albumColumn} INTEGER, Z_3ASSETS INTEGER, PRIMARY KEY (${albumColumn}, Z_3ASSETS))`);
    }

    const insertAlbum = db.prepare(
      'INSERT INTO ZGENERICALBUM (Z_PK, ZKIND, ZTITLE, ZPARENTFOLDER, ZCACHEDCOUNT) VALUES (?, ?, ?, ?, ?)'
    );
    const insertAsset = db.prepare(
      'INSERT INTO ZASSET (Z_PK, ZDIRECTORY, ZFILENAME, ZUUID, ZFAVORITE) VALUES (?, ?, ?, ?, ?)'
    );
    const insertAttributes = db.prepare(
      'INSERT INTO ZADDITIONALASSETATTRIBUTES (ZASSET, ZORIGINALFILENAME) VALUES (?, ?)'
    );

    for (const asset of fixture.assets) {
      insertAsset.run(asset.id, asset.directory, asset.filename, asset.uuid, asset.favorite ? 1 : 0);
      insertAttributes.run(asset.id, asset.originalFilename);
    }

    for (const album of fixture.albums) {
      insertAlbum.run(album.id, album.kind, album.title, album.parent ?? null, album.cachedCount ?? null);
      if (!fixture.omitJoinTable) {
        const insertMember = db.prepare(`INSERT INTO ${joinTable} (${albumColumn}, Z_3ASSETS) VALUES (?, ?)`);
        for (const assetId of album.assets ?? []) {
          insertMember.run(album.id, assetId);
        }
      }
    }
  } finally {
    db.close();
  }

  return dbPath;
}

/**
 * A small library:
 * - folders Travel/Europe (4000) under the untitled root folder (3999)
 * - "Paris" in Travel/Europe, two albums titled "Family", an empty album,
 *   a title with a slash, and a smart album that must be ignored
 * - favorites: assets 1 and 5
 */
export const SAMPLE_LIBRARY: PhotosFixture = {
  assets: [
    { id: 1, filename: 'AAAA-1.heic', uuid: 'AAAA-1', directory: 'A', originalFilename: 'IMG_0001.HEIC', favorite: true },
    { id: 2, filename: 'BBBB-2.jpeg', uuid: 'BBBB-2', directory: 'B', originalFilename: 'IMG_0002.JPG' },
    { id: 3, filename: 'CCCC-3.mov', uuid: 'CCCC-3', directory: 'C', originalFilename: 'IMG_0003.MOV' },
    { id: 4, filename: 'DDDD-4.jpeg', uuid: 'DDDD-4', directory: 'D', originalFilename: null },
    { id: 5, filename: 'EEEE-5.png', uuid: 'EEEE-5', directory: 'E', originalFilename: 'Screenshot 1.PNG', favorite: true },
  ],
  albums: [
    { id: 1, kind: 3999, title: null },
    { id: 10, kind: 4000, title: 'Travel', parent: 1 },
    { id: 11, kind: 4000, title: 'Europe', parent: 10 },
    { id: 20, kind: 2, title: 'Paris', parent: 11, cachedCount: 3, assets: [3, 1, 2] },
    { id: 21, kind: 2, title: 'Family', parent: 1, cachedCount: 2, assets: [4, 2] },
    { id: 22, kind: 2, title: 'Family', parent: null, cachedCount: 1, assets: [5] },
    { id: 23, kind: 2, title: 'Empty', parent: 1, cachedCount: 0 },
    { id: 24, kind: 2, title: 'Drafts/2024', parent: 1, cachedCount: 1, assets: [1] },
    { id: 30, kind: 1505, title: 'Recents', parent: 1, assets: [1, 2, 3, 4, 5] },
  ],
};

/**
 * Files as icloudpd would leave them for SAMPLE_LIBRARY
 * IMG_0003.MOV was never downloaded; the screenshot exists twice
 */
export const SAMPLE_DOWNLOADS: Record<string, string> = {
  'IMG_0001.HEIC': 'photo-1',
  'img_0002.jpg': 'photo-2',
  '2024/01/Screenshot 1.PNG': 'shot-a',
  '2024/02/Screenshot 1.PNG': 'shot-b',
  '.DS_Store': 'finder',
};

export interface FixtureRecording {
  id: number;
  path: string | null;
  label: string | null;
  date: number | null;
  folder?: number | null;
  evictionDate?: number | null;
}

export interface VoiceMemosFixture {
  folders: { id: number; name: string | null }[];
  recordings: FixtureRecording[];
}

/**
 * Create `<recordingsDir>/CloudRecordings.db`
 */
export function createVoiceMemosDb(recordingsDir: string, fixture: VoiceMemosFixture): string {
  mkdirSync(recordingsDir, { recursive: true });
  const dbPath = join(recordingsDir, 'CloudRecordings.db');

  const db = new Database(dbPath);
  try {
    db.exec(`
      CREATE TABLE ZFOLDER (Z_PK INTEGER PRIMARY KEY, ZENCRYPTEDNAME VARCHAR);
      CREATE TABLE ZCLOUDRECORDING (Z_PK INTEGER PRIMARY KEY, ZPATH VARCHAR, ZCUSTOMLABELFORSORTING VARCHAR, ZDATE TIMESTAMP, ZFOLDER INTEGER, ZEVICTIONDATE TIMESTAMP);
    `);

    const insertFolder = db.prepare('INSERT INTO ZFOLDER (Z_PK, ZENCRYPTEDNAME) VALUES (?, ?)');
    for (const folder of fixture.folders) {
      insertFolder.run(folder.id, folder.name);
    }

    const insertRecording = db.prepare(
      'INSERT INTO ZCLOUDRECORDING (Z_PK, ZPATH, ZCUSTOMLABELFORSORTING, ZDATE, ZFOLDER, ZEVICTIONDATE) VALUES (?, ?, ?, ?, ?, ?)'
    );
    for (const recording of fixture.recordings) {
      insertRecording.run(
        recording.id,
        recording.path,
        recording.label,
        recording.date,
        recording.folder ?? null,
        recording.evictionDate ?? null
      );
    }
  } finally {
    db.close();
  }

  return dbPath;
}

/**
 * Recordings covering folders, duplicate labels, untitled memos, a missing
 * audio file, a deleted memo, a ghost row, and a memo without a date
 */
export const SAMPLE_MEMOS: VoiceMemosFixture = {
  folders: [
    { id: 1, name: 'Work' },
    { id: 2, name: 'Ideas: new' },
  ],
  recordings: [
    { id: 1, path: 'AAAA.m4a', label: 'Standup', date: 700000000, folder: 1 },
    { id: 2, path: 'BBBB.m4a', label: 'Standup', date: 700000050, folder: 1 },
    { id: 3, path: 'x/memo.m4a', label: '', date: 700000100 },
    { id: 4, path: 'y/memo.m4a', label: null, date: 700000200 },
    { id: 5, path: 'CCCC.m4a', label: 'What? Why/How', date: 700000300, folder: 2 },
    { id: 6, path: 'DDDD.m4a', label: 'Missing one', date: 700000400 },
    { id: 7, path: 'EEEE.m4a', label: 'Deleted', date: 700000500, evictionDate: 700000600 },
    { id: 8, path: '', label: 'Ghost', date: 700000700 },
    { id: 9, path: 'FFFF.qta', label: 'No date', date: null, folder: 99 },
  ],
};

export const SAMPLE_AUDIO: Record<string, string> = {
  'AAAA.m4a': 'audio-1',
  'BBBB.m4a': 'audio-2',
  'x/memo.m4a': 'audio-3',
  'y/memo.m4a': 'audio-4',
  'CCCC.m4a': 'audio-5',
  'EEEE.m4a': 'audio-7',
  'FFFF.qta': 'audio-9',
};
