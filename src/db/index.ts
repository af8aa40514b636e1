/**
 * Catalog module exports
 */

// Connection
export { type Catalog, closeCatalog, IN_MEMORY, openCatalog } from "./connection";
export type { DeletionLogInsert } from "./deletion-log-repository";
// Deletion log repository
export { getDeletionLogs, logDeletion } from "./deletion-log-repository";
export type { RawDeletionLogRow, RawSnapshotRow } from "./mappers";
// Mappers
export { parseDeletionLogRow, parseSnapshotRow, toSnapshot } from "./mappers";
// Migrations
export {
  getAllMigrations,
  getCurrentVersion,
  getLatestVersion,
  getPendingMigrations,
} from "./migrations";
// Snapshot repository
export {
  getActiveSnapshotsBySlot,
  getAllActiveSnapshots,
  getMaxSequence,
  getSnapshotById,
  insertSnapshot,
  markSnapshotDeleted,
} from "./snapshot-repository";
