import type { Migration } from "../../types/database";

export const migration: Migration = {
  version: 1,
  name: "initial",
  description: "Snapshot catalog and deletion log",
  up: `
CREATE TABLE snapshots (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    snapshot_id TEXT UNIQUE NOT NULL,
    slot_id TEXT NOT NULL,
    archive_name TEXT NOT NULL,
    archive_path TEXT NOT NULL,
    size_bytes INTEGER NOT NULL,
    compressed INTEGER NOT NULL DEFAULT 1,
    files_count INTEGER NOT NULL,
    created_at INTEGER NOT NULL,
    sequence INTEGER NOT NULL,
    source_modified_at INTEGER,
    preview_path TEXT,
    status TEXT NOT NULL DEFAULT 'active',
    deleted_at TEXT
);

CREATE INDEX idx_snapshots_slot_order ON snapshots(slot_id, created_at, sequence);
CREATE INDEX idx_snapshots_status ON snapshots(status);
CREATE UNIQUE INDEX idx_snapshots_archive_path ON snapshots(archive_path) WHERE status = 'active';

CREATE TABLE deletion_log (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    snapshot_id TEXT NOT NULL,
    slot_id TEXT NOT NULL,
    archive_path TEXT NOT NULL,
    reason TEXT NOT NULL,
    deleted_at TEXT DEFAULT (datetime('now')),
    success INTEGER NOT NULL,
    error_message TEXT
);

CREATE INDEX idx_deletion_log_slot ON deletion_log(slot_id, deleted_at DESC);

CREATE TABLE schema_version (
    version INTEGER PRIMARY KEY,
    applied_at TEXT DEFAULT (datetime('now'))
);
`,
};
