/**
 * Core module exports
 */

// Archive codec
export {
  type ArchiveWriteResult,
  collectFiles,
  type ExtractOptions,
  type ExtractResult,
  extractArchive,
  measureTree,
  type WriteArchiveOptions,
  writeArchive,
} from "./archive";

// Engine
export { BackupEngine, type EngineOptions } from "./engine";
export {
  BusyError,
  CorruptArchiveError,
  type ErrorKind,
  ErrorKinds,
  InsufficientSpaceError,
  InUseError,
  IOError,
  NotFoundError,
  SaveguardError,
} from "./errors";
export { type EngineEventHandler, EngineEvents } from "./events";
export {
  type BackupPassOptions,
  type BackupPassResult,
  runBackupPass,
  type SlotPassResult,
  type SlotPassStatus,
} from "./headless";

// Restore
export { RestoreOperator, type RestoreResult } from "./restore";

// Retention
export { type RetentionCandidate, resolveRetentionPolicy, selectForDeletion } from "./retention";

// Saves
export { discoverSaveSlots, findSaveSlot, readSaveStats, thumbnailPath } from "./saves";

// Scheduler
export { KeyedMutex, Scheduler, type SchedulerStatus } from "./scheduler";

// Snapshots
export { type CreateSnapshotResult, type PruneResult, SnapshotStore } from "./snapshots";

// Usage
export { DiskUsageProbe, type ProbeRequest } from "./usage";
