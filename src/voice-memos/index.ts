/**
 * Voice Memos extraction
 */

export type {
  Recording,
  VoiceMemoFolder,
  VoiceMemoLibrary,
  PlannedCopy,
  SkippedRecording,
  ExtractResult,
} from './types.js';

export {
  CORE_DATA_EPOCH_OFFSET,
  coreDataDate,
  loadVoiceMemos,
  readFolders,
  readRecordings,
} from './recordings.js';

export { extractVoiceMemos, planCopies, copyAndStamp } from './extract.js';
export type { ExtractOptions } from './extract.js';
