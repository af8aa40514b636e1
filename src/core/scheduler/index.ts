export {
  type BackupRequest,
  type BackupRunner,
  type BackupRunResult,
  DEFAULT_POLL_MS,
  Scheduler,
  type SchedulerOptions,
  type SchedulerStatus,
  type SlotRunState,
  type SlotStatus,
  type TriggerOptions,
} from "./scheduler";
export { KeyedMutex, type Release } from "./slot-mutex";
