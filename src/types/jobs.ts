/**
 * Transient job records and outbound engine events
 */

import type { ErrorKind } from "../core/errors";

export type TriggerKind = "interval" | "manual";
export type JobStatus = "queued" | "running" | "succeeded" | "failed";
export type JobKind = "backup" | "restore";
export type BackupOutcome = "created" | "unchanged";

export interface JobError {
  kind: ErrorKind;
  message: string;
}

export interface BackupJob {
  id: string;
  slotId: string;
  trigger: TriggerKind;
  status: JobStatus;
  enqueuedAt: number;
  startedAt: number | null;
  finishedAt: number | null;
  outcome: BackupOutcome | null;
  /** Set when a snapshot was created */
  snapshotId: string | null;
  error: JobError | null;
}

export interface RestoreJob {
  id: string;
  slotId: string;
  snapshotId: string;
  status: JobStatus;
  enqueuedAt: number;
  startedAt: number | null;
  finishedAt: number | null;
  error: JobError | null;
}

export interface JobOutcomeEvent {
  type: "job";
  slotId: string;
  jobKind: JobKind;
  trigger?: TriggerKind;
  status: "succeeded" | "failed";
  startedAt: number;
  finishedAt: number;
  outcome?: BackupOutcome;
  snapshotId?: string;
  errorKind?: ErrorKind;
  message?: string;
}

export interface UsageEvent {
  type: "usage";
  path: string;
  bytes: number;
}

export type EngineEvent = JobOutcomeEvent | UsageEvent;
