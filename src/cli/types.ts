/**
 * CLI option types, as commander hands them to the command actions
 */

export interface AlbumCliOptions {
  library: string;
  db?: string;
  list?: boolean;
  outputJson?: string;
  outputDir?: string;
  sourceDir: string;
  copy?: boolean;
  missingReport?: string;
  verbose?: boolean;
}

export interface VoiceMemoCliOptions {
  recordingsDir: string;
  db?: string;
  verbose?: boolean;
}

export interface RetryCliOptions {
  command: string;
  delayMs: number;
  verbose?: boolean;
}
