/**
 * Deletion log repository
 */

import type { DeletionLogRecord } from "../types";
import type { Catalog } from "./connection";
import { parseDeletionLogRow, type RawDeletionLogRow } from "./mappers";

export type DeletionLogInsert = Omit<DeletionLogRecord, "id" | "deleted_at">;

export function logDeletion(database: Catalog, log: DeletionLogInsert): void {
  database
    .prepare(
      `INSERT INTO deletion_log (
        snapshot_id, slot_id, archive_path, reason, success, error_message
      ) VALUES (?, ?, ?, ?, ?, ?)`,
    )
    .run(
      log.snapshot_id,
      log.slot_id,
      log.archive_path,
      log.reason,
      log.success ? 1 : 0,
      log.error_message ?? null,
    );
}

export function getDeletionLogs(database: Catalog, limit = 100, slotId?: string): DeletionLogRecord[] {
  const rows = slotId
    ? database
        .prepare<[string, number], RawDeletionLogRow>(
          "SELECT * FROM deletion_log WHERE slot_id = ? ORDER BY id DESC LIMIT ?",
        )
        .all(slotId, limit)
    : database
        .prepare<[number], RawDeletionLogRow>("SELECT * FROM deletion_log ORDER BY id DESC LIMIT ?")
        .all(limit);

  return rows.map(parseDeletionLogRow);
}
