/**
 * Missing-file report for a materialize run
 * Lists, per album, the members with no downloaded file to link to
 */

import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import type { MaterializeReport } from './materialize.js';

export interface MissingReport {
  timestamp: string;
  sourceDir: string;
  totals: MaterializeReport['totals'];
  /** Album key → filenames not found in the source directory */
  missing: Record<string, string[]>;
  /** Album key → filenames whose link or copy failed */
  failed: Record<string, string[]>;
}

export function buildMissingReport(report: MaterializeReport, now: Date = new Date()): MissingReport {
  return {
    timestamp: now.toISOString(),
    sourceDir: report.sourceDir,
    totals: report.totals,
    missing: Object.fromEntries(
      report.albums
        .filter((album) => album.missing.length > 0)
        .map((album): [string, string[]] => [album.key, album.missing])
    ),
    failed: Object.fromEntries(
      report.albums
        .filter((album) => album.failed.length > 0)
        .map((album): [string, string[]] => [album.key, album.failed])
    ),
  };
}

/**
 * Write the report as pretty-printed JSON
 * A write failure is logged, not thrown
 *
 * @returns whether the report was written
 */
export async function writeMissingReport(reportPath: string, report: MaterializeReport): Promise<boolean> {
  const logger = getLogger();

  try {
    await mkdir(dirname(reportPath), { recursive: true });
    await writeFile(reportPath, JSON.stringify(buildMissingReport(report), null, 2), 'utf-8');
    logger.debug(`Missing report written: ${reportPath}`);
    return true;
  } catch (error) {
    logger.warn(`Failed to write missing report: ${errorMessage(error)}`);
    return false;
  }
}
