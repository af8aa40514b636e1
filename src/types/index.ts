/**
 * Centralized type exports for saveguard
 */

// Config types
export type {
  ArchiveConfig,
  DatabaseConfig,
  Preferences,
  QuotaWriter,
  RestoreConfig,
  RestoreMode,
  SaveguardConfig,
  SchedulerConfig,
} from "./config";
// Catalog types
export type {
  DeletionLogRecord,
  DeletionReason,
  Migration,
  SnapshotInsert,
  SnapshotRecord,
  SnapshotStatus,
} from "./database";
// Job and event types
export type {
  BackupJob,
  BackupOutcome,
  EngineEvent,
  JobError,
  JobKind,
  JobOutcomeEvent,
  JobStatus,
  RestoreJob,
  TriggerKind,
  UsageEvent,
} from "./jobs";
// Save and snapshot types
export type {
  RetentionPolicy,
  SaveSlot,
  SaveStats,
  Snapshot,
  SnapshotOrder,
} from "./snapshot";
