/**
 * Utility exports
 */

// Crypto utilities
export { generateShortId, generateUUID } from "./crypto";

// Formatting utilities
export { formatBytes, formatDuration, parseSize } from "./format";
export type { LogLevel, ScopedLogger } from "./logger";
// Logger
export {
  createLogger,
  debug,
  error,
  getLogLevel,
  info,
  isLogLevel,
  logger,
  setLogLevel,
  warn,
} from "./logger";
export type { ParsedArchiveName } from "./naming";
// Naming utilities
export {
  ARCHIVE_NAME_PATTERN,
  formatArchiveTimestamp,
  generateArchiveName,
  isValidArchiveName,
  parseArchiveName,
  previewNameFor,
} from "./naming";
// Path utilities
export { expandHome, isPathWithinDir, slotBackupDir, toPosix } from "./path";
