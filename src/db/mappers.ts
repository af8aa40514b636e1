/**
 * Catalog row mapping utilities
 */

import type { Snapshot } from "../types";
import type { DeletionLogRecord, DeletionReason, SnapshotRecord, SnapshotStatus } from "../types/database";

export type RawSnapshotRow = Omit<SnapshotRecord, "compressed" | "status"> & {
  compressed: number;
  status: string;
};

export type RawDeletionLogRow = Omit<DeletionLogRecord, "success" | "reason"> & {
  success: number;
  reason: string;
};

const DELETION_REASONS: readonly DeletionReason[] = [
  "retention_count",
  "retention_quota",
  "manual",
  "missing",
];

function parseStatus(value: string): SnapshotStatus {
  return value === "deleted" ? "deleted" : "active";
}

function parseReason(value: string): DeletionReason {
  return DELETION_REASONS.find((reason) => reason === value) ?? "manual";
}

export function parseSnapshotRow(row: RawSnapshotRow): SnapshotRecord {
  return {
    ...row,
    compressed: Boolean(row.compressed),
    status: parseStatus(row.status),
  };
}

export function parseDeletionLogRow(row: RawDeletionLogRow): DeletionLogRecord {
  return {
    ...row,
    reason: parseReason(row.reason),
    success: Boolean(row.success),
  };
}

export function toSnapshot(record: SnapshotRecord): Snapshot {
  return {
    id: record.snapshot_id,
    slotId: record.slot_id,
    createdAt: record.created_at,
    sequence: record.sequence,
    archiveName: record.archive_name,
    archivePath: record.archive_path,
    sizeBytes: record.size_bytes,
    compressed: record.compressed,
    filesCount: record.files_count,
    sourceModifiedAt: record.source_modified_at,
    previewPath: record.preview_path,
  };
}
