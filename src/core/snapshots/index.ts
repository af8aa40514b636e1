export {
  type CreateSnapshotOptions,
  type CreateSnapshotResult,
  type PruneDeletion,
  type PruneResult,
  type ReconcileResult,
  SnapshotStore,
  type SnapshotStoreOptions,
} from "./store";
