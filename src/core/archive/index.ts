/**
 * Archive codec exports
 */

export {
  type ArchiveWriteResult,
  countArchiveEntries,
  DEFAULT_COMPRESSION_LEVEL,
  DEFAULT_PREVIEW_FILE,
  estimateRequiredBytes,
  type WriteArchiveOptions,
  writeArchive,
} from "./archive-creator";
export { type ExtractOptions, type ExtractResult, extractArchive } from "./archive-extractor";
export {
  type CollectedFile,
  type CollectOptions,
  collectFiles,
  measureTree,
  type TreeScan,
} from "./file-collector";
