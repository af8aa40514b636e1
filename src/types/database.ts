/**
 * Catalog record type definitions
 */

export type SnapshotStatus = "active" | "deleted";
export type DeletionReason = "retention_count" | "retention_quota" | "manual" | "missing";

export interface SnapshotRecord {
  id: number;
  snapshot_id: string;
  slot_id: string;
  archive_name: string;
  archive_path: string;
  size_bytes: number;
  compressed: boolean;
  files_count: number;
  created_at: number;
  sequence: number;
  source_modified_at: number | null;
  preview_path: string | null;
  status: SnapshotStatus;
  deleted_at: string | null;
}

export interface SnapshotInsert {
  snapshot_id: string;
  slot_id: string;
  archive_name: string;
  archive_path: string;
  size_bytes: number;
  compressed: boolean;
  files_count: number;
  created_at: number;
  sequence: number;
  source_modified_at: number | null;
  preview_path: string | null;
}

export interface DeletionLogRecord {
  id: number;
  snapshot_id: string;
  slot_id: string;
  archive_path: string;
  reason: DeletionReason;
  deleted_at: string;
  success: boolean;
  error_message: string | null;
}

export interface Migration {
  version: number;
  name: string;
  description: string;
  up: string;
}
