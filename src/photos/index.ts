/**
 * Photos.app album reconstruction
 */

export type { Album, AlbumSummary, AlbumMembership, PhotoLibrary, PhotoRef } from './types.js';

export {
  loadPhotoLibrary,
  listAlbums,
  iterateAlbumSummaries,
  readAlbums,
  readFavorites,
  resolveAlbumAssetJoin,
} from './library.js';
export type { AlbumListing, AlbumAssetJoin } from './library.js';

export {
  MAPPING_SCHEMA_VERSION,
  buildAlbumMapping,
  writeAlbumMapping,
  readAlbumMapping,
  membershipFromLibrary,
  membershipFromMapping,
  isValidAlbumMapping,
} from './mapping.js';
export type { AlbumMapping, MappedAlbum, MappedPhoto } from './mapping.js';

export { buildFileIndex, assertSourceDirectory, lookupFile } from './file-index.js';
export type { FileIndex } from './file-index.js';

export { materializeAlbums, planAlbumDirectories, placeEntry } from './materialize.js';
export type { LinkMode, MaterializeOptions, MaterializeReport, AlbumExportResult } from './materialize.js';

export { writeMissingReport, buildMissingReport } from './missing-report.js';
export type { MissingReport } from './missing-report.js';
