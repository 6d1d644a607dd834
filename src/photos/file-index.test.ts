import { join } from 'path';
import { buildFileIndex, lookupFile } from './file-index';
import { SourceDirectoryError } from '../utils/errors';
import { makeTempDir, removeDir, writeFiles, SAMPLE_DOWNLOADS } from '../testing/fixtures';

describe('buildFileIndex', () => {
  let tempDir: string;
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => {});
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => {});
    tempDir = makeTempDir('file-index');
    writeFiles(tempDir, SAMPLE_DOWNLOADS);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    removeDir(tempDir);
  });

  it('should index files recursively and skip hidden files', async () => {
    const index = await buildFileIndex(tempDir);

    expect([...index.files.keys()].sort()).toEqual(['IMG_0001.HEIC', 'IMG_0002.JPG', 'SCREENSHOT 1.PNG']);
  });

  it('should match filenames case-insensitively', async () => {
    const index = await buildFileIndex(tempDir);

    expect(lookupFile(index, 'IMG_0002.JPG')).toBe(join(tempDir, 'img_0002.jpg'));
    expect(lookupFile(index, 'img_0001.heic')).toBe(join(tempDir, 'IMG_0001.HEIC'));
    expect(lookupFile(index, 'IMG_0003.MOV')).toBeUndefined();
  });

  it('should keep the first match for duplicate names and warn', async () => {
    const index = await buildFileIndex(tempDir);

    expect(lookupFile(index, 'Screenshot 1.PNG')).toBe(join(tempDir, '2024', '01', 'Screenshot 1.PNG'));
    expect(index.duplicates.get('SCREENSHOT 1.PNG')).toEqual([
      join(tempDir, '2024', '01', 'Screenshot 1.PNG'),
      join(tempDir, '2024', '02', 'Screenshot 1.PNG'),
    ]);
    expect(warnSpy).toHaveBeenCalledWith(
      `[icloud-backup] WARNING: 2 files named SCREENSHOT 1.PNG; using ${join(tempDir, '2024', '01', 'Screenshot 1.PNG')}`
    );
  });

  it('should fail on a missing source directory', async () => {
    await expect(buildFileIndex(join(tempDir, 'nope'))).rejects.toBeInstanceOf(SourceDirectoryError);
  });

  it('should fail when the source is a file', async () => {
    await expect(buildFileIndex(join(tempDir, 'IMG_0001.HEIC'))).rejects.toThrow('Source path is not a directory');
  });
});
