/**
 * Album mapping document: schema, builder, atomic save, and validated load
 */

import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { ExportError, errorMessage } from '../utils/errors.js';
import type { AlbumMembership, PhotoLibrary, PhotoRef } from './types.js';

/**
 * Increment when the document structure changes
 */
export const MAPPING_SCHEMA_VERSION = '1.0.0';

export interface MappedPhoto {
  uuid: string | null;
  /** Filename inside the library bundle */
  uuid_filename: string;
  /** Filename the downloaded copy carries */
  original_filename: string | null;
}

export interface MappedAlbum {
  photo_count: number;
  expected_count: number | null;
  /** Parent folders joined with "/", null at the top level */
  folder: string | null;
  photos: MappedPhoto[];
}

export interface AlbumMapping {
  schemaVersion: string;
  /** ISO 8601 */
  exported_at: string;
  photos_library: string;
  total_albums: number;
  total_favorites: number;
  albums: Record<string, MappedAlbum>;
  favorites: {
    photo_count: number;
    photos: MappedPhoto[];
  };
}

function mapPhoto(photo: PhotoRef): MappedPhoto {
  return {
    uuid: photo.uuid,
    uuid_filename: photo.filename,
    original_filename: photo.originalFilename,
  };
}

export function buildAlbumMapping(library: PhotoLibrary, exportedAt: Date = new Date()): AlbumMapping {
  const albums: Record<string, MappedAlbum> = Object.fromEntries(
    library.albums.map((album): [string, MappedAlbum] => [
      album.key,
      {
        photo_count: album.photos.length,
        expected_count: album.expectedCount,
        folder: album.folder.length > 0 ? album.folder.join('/') : null,
        photos: album.photos.map(mapPhoto),
      },
    ])
  );

  return {
    schemaVersion: MAPPING_SCHEMA_VERSION,
    exported_at: exportedAt.toISOString(),
    photos_library: library.libraryPath,
    total_albums: library.albums.length,
    total_favorites: library.favorites.length,
    albums,
    favorites: {
      photo_count: library.favorites.length,
      photos: library.favorites.map(mapPhoto),
    },
  };
}

/**
 * Album key → member identifiers, in album order
 */
export function membershipFromLibrary(library: PhotoLibrary): AlbumMembership {
  return Object.fromEntries(
    library.albums.map((album): [string, string[]] => [album.key, album.photos.map((photo) => photo.filename)])
  );
}

export function membershipFromMapping(mapping: AlbumMapping): AlbumMembership {
  return Object.fromEntries(
    Object.entries(mapping.albums).map(([key, album]): [string, string[]] => [
      key,
      album.photos.map((photo) => photo.uuid_filename),
    ])
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNullableString(value: unknown): value is string | null {
  return value === null || typeof value === 'string';
}

export function isValidMappedPhoto(value: unknown): value is MappedPhoto {
  return (
    isRecord(value) &&
    isNullableString(value.uuid) &&
    typeof value.uuid_filename === 'string' &&
    isNullableString(value.original_filename)
  );
}

export function isValidMappedAlbum(value: unknown): value is MappedAlbum {
  return (
    isRecord(value) &&
    typeof value.photo_count === 'number' &&
    (value.expected_count === null || typeof value.expected_count === 'number') &&
    isNullableString(value.folder) &&
    Array.isArray(value.photos) &&
    value.photos.every(isValidMappedPhoto)
  );
}

export function isValidAlbumMapping(value: unknown): value is AlbumMapping {
  if (!isRecord(value)) return false;
  const { albums, favorites } = value;

  return (
    typeof value.schemaVersion === 'string' &&
    typeof value.exported_at === 'string' &&
    typeof value.photos_library === 'string' &&
    typeof value.total_albums === 'number' &&
    typeof value.total_favorites === 'number' &&
    isRecord(albums) &&
    Object.values(albums).every(isValidMappedAlbum) &&
    isRecord(favorites) &&
    typeof favorites.photo_count === 'number' &&
    Array.isArray(favorites.photos) &&
    favorites.photos.every(isValidMappedPhoto)
  );
}

/**
 * Save atomically: write to a temp file, then rename over the target
 */
export async function writeAlbumMapping(outputPath: string, mapping: AlbumMapping): Promise<void> {
  const tempPath = `${outputPath}.tmp`;

  try {
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(tempPath, `${JSON.stringify(mapping, null, 2)}\n`, 'utf-8');
    await rename(tempPath, outputPath);
  } catch (error) {
    throw ExportError.fromWriteFailure(outputPath, errorMessage(error));
  }
}

export async function readAlbumMapping(inputPath: string): Promise<AlbumMapping> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(inputPath, 'utf-8'));
  } catch (error) {
    throw ExportError.fromInvalidMapping(inputPath, errorMessage(error));
  }

  if (!isValidAlbumMapping(parsed)) {
    throw ExportError.fromInvalidMapping(inputPath, 'unexpected document structure');
  }
  return parsed;
}
