/**
 * Snapshot record repository
 */

import type { SnapshotInsert, SnapshotRecord } from "../types";
import type { Catalog } from "./connection";
import { parseSnapshotRow, type RawSnapshotRow } from "./mappers";

export function insertSnapshot(database: Catalog, snapshot: SnapshotInsert): SnapshotRecord {
  database
    .prepare(`
      INSERT INTO snapshots (
        snapshot_id, slot_id, archive_name, archive_path, size_bytes, compressed,
        files_count, created_at, sequence, source_modified_at, preview_path
      ) VALUES (@snapshot_id, @slot_id, @archive_name, @archive_path, @size_bytes, @compressed,
        @files_count, @created_at, @sequence, @source_modified_at, @preview_path)
    `)
    .run({
      ...snapshot,
      compressed: snapshot.compressed ? 1 : 0,
    });

  const inserted = getSnapshotById(database, snapshot.snapshot_id);
  if (!inserted) {
    throw new Error(`Failed to retrieve inserted snapshot: ${snapshot.snapshot_id}`);
  }
  return inserted;
}

export function getSnapshotById(database: Catalog, snapshotId: string): SnapshotRecord | null {
  const row = database
    .prepare<[string], RawSnapshotRow>("SELECT * FROM snapshots WHERE snapshot_id = ?")
    .get(snapshotId);

  return row ? parseSnapshotRow(row) : null;
}

/**
 * Active snapshots of a slot, oldest first.
 */
export function getActiveSnapshotsBySlot(database: Catalog, slotId: string): SnapshotRecord[] {
  const rows = database
    .prepare<[string], RawSnapshotRow>(`
      SELECT * FROM snapshots
      WHERE slot_id = ? AND status = 'active'
      ORDER BY created_at ASC, sequence ASC
    `)
    .all(slotId);

  return rows.map(parseSnapshotRow);
}

export function getAllActiveSnapshots(database: Catalog): SnapshotRecord[] {
  const rows = database
    .prepare<[], RawSnapshotRow>(`
      SELECT * FROM snapshots
      WHERE status = 'active'
      ORDER BY slot_id ASC, created_at ASC, sequence ASC
    `)
    .all();

  return rows.map(parseSnapshotRow);
}

/**
 * Highest sequence ever issued for the slot, deleted snapshots included.
 */
export function getMaxSequence(database: Catalog, slotId: string): number {
  const row = database
    .prepare<[string], { sequence: number | null }>(
      "SELECT MAX(sequence) AS sequence FROM snapshots WHERE slot_id = ?",
    )
    .get(slotId);
  return row?.sequence ?? 0;
}

export function markSnapshotDeleted(database: Catalog, snapshotId: string): void {
  database
    .prepare<[string]>(
      "UPDATE snapshots SET status = 'deleted', deleted_at = datetime('now') WHERE snapshot_id = ?",
    )
    .run(snapshotId);
}
