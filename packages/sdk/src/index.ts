/**
 * studylog SDK
 *
 * Study session records, their hand-written text codec, and a file-backed tracker
 */

// Re-export types
export type {
  IsoDate,
  TimeOfDay,
  SessionData,
  NewSessionInput,
  SessionPatch,
  CollectionLayout,
  EncodeCollectionOptions,
  SkippedSpan,
  CollectionDecodeReport,
  SafeDecodeResult,
  TrackerOptions,
  SessionSort,
  ListSessionsOptions,
  DateRange,
  SessionStats,
  ImportConflictPolicy,
  ImportOptions,
  ImportSummary,
  Tracker,
} from "./types.js";

// Model
export { StudySession } from "./session.js";

// Codec
export { escapeText, unescapeText } from "./codec/escape.js";
export { tokenizeObject, type FieldValue } from "./codec/tokenizer.js";
export { encodeRecord, decodeRecord, safeDecodeRecord, RECORD_FIELDS } from "./codec/record.js";
export { splitSpans, scanSpans, type SpanScan } from "./codec/splitter.js";
export {
  encodeCollection,
  decodeCollection,
  decodeCollectionWithReport,
} from "./codec/collection.js";

// Persistence and tracker
export { SessionFile, type SessionFileOptions } from "./session-file.js";
export { FileLock, Mutex, type FileLockOptions } from "./lock.js";
export { errorCode } from "./io.js";
export { openTracker, DEFAULT_FILE_NAME } from "./tracker.js";
export { computeStats, filterByDateRange, formatDuration } from "./stats.js";

// Validation
export {
  isIsoDate,
  parseIsoDate,
  parseTimeOfDay,
  tryParseTimeOfDay,
  validateSubject,
  validateDuration,
  todayIsoDate,
  MAX_DURATION_MINUTES,
} from "./validation.js";

// Errors
export {
  StudyLogError,
  MalformedRecordError,
  MalformedCollectionError,
  InvalidSessionError,
  SessionNotFoundError,
  DuplicateSessionError,
  DocumentReadError,
  DocumentWriteError,
  DirectoryError,
  LockTimeoutError,
} from "./errors.js";

// Observability
export { logger, type LogLevel, type LogEntry } from "./observability/logs.js";
