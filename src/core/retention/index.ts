export {
  compareSnapshots,
  type RetentionCandidate,
  type RetentionReason,
  resolveRetentionPolicy,
  type SelectOptions,
  selectForDeletion,
} from "./policy";
