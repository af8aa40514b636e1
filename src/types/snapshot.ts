/**
 * Save slot and snapshot type definitions
 */

export interface SaveSlot {
  /** `<gameMode>/<saveName>`, posix separators */
  id: string;
  name: string;
  gameMode: string;
  /** Live save directory */
  path: string;
  /** Epoch ms */
  lastModified: number;
}

export interface Snapshot {
  id: string;
  slotId: string;
  /** Epoch ms; primary sort key */
  createdAt: number;
  /** Per-slot insertion counter; breaks createdAt ties */
  sequence: number;
  archiveName: string;
  archivePath: string;
  sizeBytes: number;
  compressed: boolean;
  filesCount: number;
  /** Newest mtime in the save tree when captured; null for adopted archives */
  sourceModifiedAt: number | null;
  previewPath: string | null;
}

export interface RetentionPolicy {
  /** 0 = unlimited */
  keepLastN: number;
  /** 0 = unlimited */
  quotaBytes: number;
}

export type SnapshotOrder = "newest" | "oldest";

export interface SaveStats {
  characterName: string;
  hoursSurvived: number;
  zombiesKilled: number;
  profession: string | null;
  traits: string[];
}
