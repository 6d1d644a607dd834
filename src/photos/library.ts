import {
  assertSchema,
  getTableColumns,
  withReadOnlyDatabase,
  type SqliteDatabase,
} from '../core/database.js';
import { DataAccessError } from '../utils/errors.js';
import { getPhotosDbPath, createAlbumNameRegistry } from '../utils/paths.js';
import type { Album, AlbumSummary, PhotoLibrary, PhotoRef } from './types.js';

const ALBUM_KIND_USER = 2;
const ALBUM_KIND_FOLDER = 4000;

const REQUIRED_COLUMNS = {
  ZGENERICALBUM: ['Z_PK', 'ZKIND', 'ZTITLE', 'ZPARENTFOLDER', 'ZCACHEDCOUNT'],
  ZASSET: ['Z_PK', 'ZDIRECTORY', 'ZFILENAME', 'ZUUID', 'ZFAVORITE'],
  ZADDITIONALASSETATTRIBUTES: ['ZASSET', 'ZORIGINALFILENAME'],
} as const;

/**
 * Album/asset many-to-many table. Core Data numbers it after the entity ids,
 * which shift between macOS releases (Z_26ASSETS, Z_32ASSETS, ...).
 */
export interface AlbumAssetJoin {
  table: string;
  albumColumn: string;
  assetColumn: string;
}

interface FolderRow {
  id: number;
  title: string;
  parent: number | null;
}

interface AlbumPhotoRow {
  id: number;
  title: string;
  cachedCount: number | null;
  parentFolder: number | null;
  directory: string | null;
  filename: string | null;
  uuid: string | null;
  originalFilename: string | null;
}

interface AssetRow {
  directory: string | null;
  filename: string | null;
  uuid: string | null;
  originalFilename: string | null;
}

interface SummaryRow {
  id: number;
  title: string;
  parentFolder: number | null;
  count: number;
}

export function resolveAlbumAssetJoin(db: SqliteDatabase, dbPath: string): AlbumAssetJoin {
  const tables = db
    .prepare<[], { name: string }>(
      `SELECT name FROM sqlite_master WHERE type = 'table' AND name GLOB 'Z_[0-9]*ASSETS' ORDER BY name`
    )
    .all();

  for (const { name } of tables) {
    const columns = getTableColumns(db, name);
    const albumColumn = columns.find((column) => /^Z_\d+ALBUMS$/.test(column));
    const assetColumn = columns.find((column) => /^Z_\d+ASSETS$/.test(column));
    if (albumColumn && assetColumn) {
      return { table: name, albumColumn, assetColumn };
    }
  }

  throw DataAccessError.fromSchema(dbPath, 'no album/asset join table found');
}

type FolderMap = Map<number, { title: string; parent: number | null }>;

function loadFolders(db: SqliteDatabase): FolderMap {
  const rows = db
    .prepare<[number], FolderRow>(
      `SELECT Z_PK AS id, ZTITLE AS title, ZPARENTFOLDER AS parent
       FROM ZGENERICALBUM
       WHERE ZKIND = ? AND ZTITLE IS NOT NULL`
    )
    .all(ALBUM_KIND_FOLDER);

  return new Map(rows.map((row) => [row.id, { title: row.title, parent: row.parent }]));
}

/**
 * Folder titles from the outermost folder down to the album's parent
 * The untitled root folder is not in the map, which ends the walk
 */
export function resolveFolderPath(folders: FolderMap, parentId: number | null): string[] {
  const parts: string[] = [];
  const seen = new Set<number>();
  let current = parentId;

  while (current !== null && !seen.has(current)) {
    const folder = folders.get(current);
    if (!folder) break;
    seen.add(current);
    parts.unshift(folder.title);
    current = folder.parent;
  }

  return parts;
}

function toPhotoRef(row: AssetRow & { filename: string }): PhotoRef {
  return {
    filename: row.filename,
    uuid: row.uuid,
    relativePath: row.directory ? `${row.directory}/${row.filename}` : row.filename,
    originalFilename: row.originalFilename,
  };
}

/**
 * All user albums with their members, ordered by title then row id
 * Albums with the same title stay separate and get distinct keys
 */
export function readAlbums(db: SqliteDatabase, dbPath: string): Album[] {
  const join = resolveAlbumAssetJoin(db, dbPath);
  const folders = loadFolders(db);

  const rows = db
    .prepare<[number], AlbumPhotoRow>(
      `SELECT
         alb.Z_PK AS id,
         alb.ZTITLE AS title,
         alb.ZCACHEDCOUNT AS cachedCount,
         alb.ZPARENTFOLDER AS parentFolder,
         asset.ZDIRECTORY AS directory,
         asset.ZFILENAME AS filename,
         asset.ZUUID AS uuid,
         attr.ZORIGINALFILENAME AS originalFilename
       FROM ZGENERICALBUM alb
       LEFT JOIN ${join.table} j ON j.${join.albumColumn} = alb.Z_PK
       LEFT JOIN ZASSET asset ON asset.Z_PK = j.${join.assetColumn}
       LEFT JOIN ZADDITIONALASSETATTRIBUTES attr ON attr.ZASSET = asset.Z_PK
       WHERE alb.ZTITLE IS NOT NULL AND alb.ZKIND = ?
       ORDER BY alb.ZTITLE, alb.Z_PK, asset.ZFILENAME`
    )
    .all(ALBUM_KIND_USER);

  const keys = createAlbumNameRegistry();
  const albums: Album[] = [];
  const byId = new Map<number, Album>();

  for (const row of rows) {
    let album = byId.get(row.id);
    if (!album) {
      album = {
        id: row.id,
        title: row.title,
        key: keys.claim('', row.title),
        folder: resolveFolderPath(folders, row.parentFolder),
        expectedCount: row.cachedCount,
        photos: [],
      };
      byId.set(row.id, album);
      albums.push(album);
    }

    const { filename } = row;
    if (filename) {
      album.photos.push(toPhotoRef({ ...row, filename }));
    }
  }

  return albums;
}

export function readFavorites(db: SqliteDatabase): PhotoRef[] {
  const rows = db
    .prepare<[], AssetRow>(
      `SELECT
         asset.ZFILENAME AS filename,
         asset.ZUUID AS uuid,
         asset.ZDIRECTORY AS directory,
         attr.ZORIGINALFILENAME AS originalFilename
       FROM ZASSET asset
       LEFT JOIN ZADDITIONALASSETATTRIBUTES attr ON attr.ZASSET = asset.Z_PK
       WHERE asset.ZFAVORITE = 1
       ORDER BY asset.ZFILENAME`
    )
    .all();

  return rows.flatMap(({ filename, ...rest }) => (filename ? [toPhotoRef({ ...rest, filename })] : []));
}

/**
 * Lazily yield one summary per user album, in the same order and with the
 * same keys as readAlbums
 */
export function* iterateAlbumSummaries(
  db: SqliteDatabase,
  dbPath: string
): Generator<AlbumSummary> {
  const join = resolveAlbumAssetJoin(db, dbPath);
  const folders = loadFolders(db);
  const keys = createAlbumNameRegistry();

  const statement = db.prepare<[number], SummaryRow>(
    `SELECT
       alb.Z_PK AS id,
       alb.ZTITLE AS title,
       alb.ZPARENTFOLDER AS parentFolder,
       COUNT(asset.ZFILENAME) AS count
     FROM ZGENERICALBUM alb
     LEFT JOIN ${join.table} j ON j.${join.albumColumn} = alb.Z_PK
     LEFT JOIN ZASSET asset ON asset.Z_PK = j.${join.assetColumn}
     WHERE alb.ZTITLE IS NOT NULL AND alb.ZKIND = ?
     GROUP BY alb.Z_PK
     ORDER BY alb.ZTITLE, alb.Z_PK`
  );

  for (const row of statement.iterate(ALBUM_KIND_USER)) {
    yield {
      key: keys.claim('', row.title),
      title: row.title,
      folder: resolveFolderPath(folders, row.parentFolder),
      count: row.count,
    };
  }
}

export function countFavorites(db: SqliteDatabase): number {
  const row = db
    .prepare<[], { count: number }>(
      `SELECT COUNT(*) AS count FROM ZASSET WHERE ZFAVORITE = 1 AND ZFILENAME IS NOT NULL`
    )
    .get();
  return row?.count ?? 0;
}

/**
 * Read albums and favorites from `<library>/database/Photos.sqlite`
 *
 * @param dbPath - Overrides the database location inside the library
 */
export async function loadPhotoLibrary(libraryPath: string, dbPath?: string): Promise<PhotoLibrary> {
  const path = dbPath ?? getPhotosDbPath(libraryPath);

  return withReadOnlyDatabase(
    path,
    (db) => {
      assertSchema(db, path, REQUIRED_COLUMNS);
      return {
        libraryPath,
        albums: readAlbums(db, path),
        favorites: readFavorites(db),
      };
    },
    { missingHint: 'Is this a Photos.app library with iCloud Photos enabled?' }
  );
}

export interface AlbumListing {
  summaries: AlbumSummary[];
  favorites: number;
}

/**
 * Album names and member counts, for display
 */
export async function listAlbums(libraryPath: string, dbPath?: string): Promise<AlbumListing> {
  const path = dbPath ?? getPhotosDbPath(libraryPath);

  return withReadOnlyDatabase(
    path,
    (db) => {
      assertSchema(db, path, REQUIRED_COLUMNS);
      return {
        summaries: [...iterateAlbumSummaries(db, path)],
        favorites: countFavorites(db),
      };
    },
    { missingHint: 'Is this a Photos.app library with iCloud Photos enabled?' }
  );
}
