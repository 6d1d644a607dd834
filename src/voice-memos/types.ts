/**
 * Voice Memos sync database model
 */

export interface VoiceMemoFolder {
  id: number;
  name: string;
}

export interface Recording {
  /** Row id in ZCLOUDRECORDING */
  id: number;
  /** User-visible title; empty or null for untitled recordings */
  label: string | null;
  /** Audio file path relative to the recordings directory */
  path: string;
  /** Seconds since 2001-01-01T00:00:00Z (Core Data reference date) */
  date: number | null;
  folderId: number | null;
}

export interface VoiceMemoLibrary {
  recordingsDir: string;
  folders: Map<number, VoiceMemoFolder>;
  recordings: Recording[];
}

export interface PlannedCopy {
  recording: Recording;
  source: string;
  destination: string;
  /** Destination relative to the output directory */
  relativePath: string;
  /** Original recording time, null when the database has none */
  timestamp: Date | null;
}

export interface SkippedRecording {
  recording: Recording;
  source: string;
  reason: string;
}

export interface ExtractResult {
  outputDir: string;
  total: number;
  extracted: PlannedCopy[];
  skipped: SkippedRecording[];
}
