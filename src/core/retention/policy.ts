/**
 * Retention policy logic
 */

import type { RetentionPolicy, Snapshot } from "../../types";

export type RetentionReason = "retention_count" | "retention_quota";

export interface RetentionCandidate {
  snapshot: Snapshot;
  reason: RetentionReason;
}

export interface SelectOptions {
  /** Snapshot ids in use by a restore; counted but never selected */
  pinned?: ReadonlySet<string>;
}

/**
 * Order by creation time, then by per-slot sequence.
 */
export function compareSnapshots(a: Snapshot, b: Snapshot): number {
  return a.createdAt - b.createdAt || a.sequence - b.sequence;
}

/**
 * Pick the snapshots to delete, oldest first.
 *
 * The newest snapshot is never selected, even when it alone exceeds the quota.
 * Count is enforced before size, so the effective retention is whichever of
 * the two limits is tighter.
 */
export function selectForDeletion(
  snapshots: readonly Snapshot[],
  policy: RetentionPolicy,
  options: SelectOptions = {},
): RetentionCandidate[] {
  const pinned = options.pinned ?? new Set<string>();
  const oldestFirst = [...snapshots].sort(compareSnapshots);
  const newest = oldestFirst.at(-1);
  if (!newest) return [];

  const candidates: RetentionCandidate[] = [];
  const marked = new Set<string>();
  const deletable = oldestFirst.filter((s) => s.id !== newest.id && !pinned.has(s.id));

  if (policy.keepLastN > 0 && oldestFirst.length > policy.keepLastN) {
    const excess = oldestFirst.length - policy.keepLastN;
    for (const snapshot of deletable.slice(0, excess)) {
      candidates.push({ snapshot, reason: "retention_count" });
      marked.add(snapshot.id);
    }
  }

  if (policy.quotaBytes > 0) {
    let remainingBytes = oldestFirst
      .filter((s) => !marked.has(s.id))
      .reduce((sum, s) => sum + s.sizeBytes, 0);

    for (const snapshot of deletable) {
      if (remainingBytes <= policy.quotaBytes) break;
      if (marked.has(snapshot.id)) continue;

      candidates.push({ snapshot, reason: "retention_quota" });
      marked.add(snapshot.id);
      remainingBytes -= snapshot.sizeBytes;
    }
  }

  return candidates.sort((a, b) => compareSnapshots(a.snapshot, b.snapshot));
}

/**
 * Resolve the policy for one slot: a per-save quota override wins over the default.
 */
export function resolveRetentionPolicy(
  slotId: string,
  settings: { keepLastNSaves: number; defaultQuotaBytes: number; saveQuotas: Record<string, number> },
): RetentionPolicy {
  const override = settings.saveQuotas[slotId];
  return {
    keepLastN: settings.keepLastNSaves,
    quotaBytes: override ?? settings.defaultQuotaBytes,
  };
}
