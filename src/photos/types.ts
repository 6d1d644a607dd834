/**
 * Photos.app library model, rebuilt read-only on every run
 */

/**
 * A library asset as referenced by an album
 * `originalFilename` is what icloudpd names the downloaded file
 */
export interface PhotoRef {
  /** UUID-based filename inside the library bundle */
  filename: string;
  uuid: string | null;
  /** `<directory>/<filename>` relative to the library's originals */
  relativePath: string;
  originalFilename: string | null;
}

export interface Album {
  /** Row id in ZGENERICALBUM */
  id: number;
  title: string;
  /** Title, made unique across the library with a " (n)" suffix */
  key: string;
  /** Parent folder titles, outermost first */
  folder: string[];
  /** Member count cached by Photos.app, may disagree with `photos.length` */
  expectedCount: number | null;
  photos: PhotoRef[];
}

export interface AlbumSummary {
  key: string;
  title: string;
  folder: string[];
  count: number;
}

export interface PhotoLibrary {
  libraryPath: string;
  albums: Album[];
  favorites: PhotoRef[];
}

/** Album key → ordered member filenames */
export type AlbumMembership = Record<string, string[]>;
