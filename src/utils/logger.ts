/**
 * Logger utility with verbose mode support
 * - info(): always prints (concise mode)
 * - debug(): only prints with --verbose
 * - progress(): phase progress indicator
 * - summary(): final summary statistics
 */

const PREFIX = '[icloud-backup]';

export interface LoggerConfig {
  verbose?: boolean;
}

export interface ProgressStats {
  phase: string;
  current: number;
  total: number;
}

export interface SummaryStats {
  albums?: {
    count: number;
    found: number;
    missing: number;
    failed: number;
  };
  recordings?: {
    count: number;
    extracted: number;
    skipped: number;
  };
}

class Logger {
  private verbose: boolean = false;

  constructor(config?: LoggerConfig) {
    this.verbose = config?.verbose ?? false;
  }

  setVerbose(verbose: boolean): void {
    this.verbose = verbose;
  }

  info(message: string): void {
    console.log(`${PREFIX} ${message}`);
  }

  /**
   * Only prints in verbose mode - per-item details, skipped entries
   */
  debug(message: string): void {
    if (this.verbose) {
      console.log(`${PREFIX} DEBUG: ${message}`);
    }
  }

  /**
   * Progress indicator for a phase
   * Every step in verbose mode; only 0%, 50% and 100% otherwise
   */
  progress(stats: ProgressStats): void {
    const { phase, current, total } = stats;
    const percentage = total > 0 ? Math.round((current / total) * 100) : 0;

    if (this.verbose) {
      console.log(`${PREFIX} PROGRESS: ${phase} - ${current}/${total} (${percentage}%)`);
    } else if (current === 0 || current === total || percentage === 50) {
      console.log(`${PREFIX} ${phase}: ${current}/${total} (${percentage}%)`);
    }
  }

  summary(stats: SummaryStats): void {
    const lines: string[] = [];

    if (stats.albums) {
      const { count, found, missing, failed } = stats.albums;
      lines.push(`Albums: ${count} exported (${found} found, ${missing} missing, ${failed} failed)`);
    }

    if (stats.recordings) {
      const { count, extracted, skipped } = stats.recordings;
      lines.push(`Recordings: ${count} listed (${extracted} extracted, ${skipped} skipped)`);
    }

    lines.forEach((line) => this.info(line));
  }

  phaseComplete(phaseName: string, details?: string): void {
    const msg = details ? `${phaseName} complete: ${details}` : `${phaseName} complete`;
    this.info(msg);
  }

  phaseStart(phaseName: string): void {
    this.debug(`Starting phase: ${phaseName}`);
  }

  warn(message: string): void {
    console.warn(`${PREFIX} WARNING: ${message}`);
  }

  error(message: string): void {
    console.error(`${PREFIX} ERROR: ${message}`);
  }
}

let loggerInstance: Logger | null = null;

/**
 * Get or create the logger singleton
 * A verbose flag passed to an existing instance still takes effect
 */
export function getLogger(config?: LoggerConfig): Logger {
  if (!loggerInstance) {
    loggerInstance = new Logger(config);
  } else if (config?.verbose !== undefined) {
    loggerInstance.setVerbose(config.verbose);
  }
  return loggerInstance;
}

/**
 * Reset logger (useful for testing)
 */
export function resetLogger(): void {
  loggerInstance = null;
}

export { Logger };
