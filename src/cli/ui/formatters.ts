/**
 * Table and summary formatters
 */

import color from "picocolors";
import type { Snapshot } from "../../types";
import { formatBytes } from "../../utils/format";

export const TABLE_WIDTHS = {
  snapshotId: 36,
  slot: 28,
  created: 19,
  size: 12,
  files: 6,
  archiveName: 40,
} as const;

export interface SummaryItem {
  label: string;
  value: string | number | null | undefined;
}

export function formatSummary(items: SummaryItem[]): string {
  const maxLabelLen = Math.max(...items.map((i) => i.label.length));
  return items
    .filter((i) => i.value !== null && i.value !== undefined)
    .map((i) => `${color.dim(i.label.padEnd(maxLabelLen))}  ${i.value}`)
    .join("\n");
}

export function formatTableRow(columns: string[], widths: number[]): string {
  return columns
    .map((col, i) => col.padEnd(widths[i] ?? 0))
    .join(color.dim(" │ "));
}

export function formatTableSeparator(widths: number[]): string {
  return color.dim(widths.map((w) => "─".repeat(w)).join("─┼─"));
}

/**
 * `2026-10-19 13:05:07`, UTC
 */
export function formatTimestamp(epochMs: number): string {
  return new Date(epochMs).toISOString().substring(0, 19).replace("T", " ");
}

const CSV_HEADER =
  "snapshot_id,slot_id,archive_name,created_at,sequence,size_bytes,compressed,files_count,archive_path,preview_path";

function csvField(value: string): string {
  return /[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function formatSnapshotCsv(snapshots: Snapshot[]): string {
  const rows = snapshots.map((s) =>
    [
      s.id,
      s.slotId,
      s.archiveName,
      new Date(s.createdAt).toISOString(),
      String(s.sequence),
      String(s.sizeBytes),
      String(s.compressed),
      String(s.filesCount),
      s.archivePath,
      s.previewPath ?? "",
    ]
      .map(csvField)
      .join(","),
  );
  return [CSV_HEADER, ...rows].join("\n");
}

export function snapshotRow(snapshot: Snapshot, verbose: boolean): string[] {
  const base = [
    verbose ? snapshot.id : snapshot.archiveName,
    snapshot.slotId,
    formatTimestamp(snapshot.createdAt),
    formatBytes(snapshot.sizeBytes),
  ];
  return verbose ? [...base, String(snapshot.filesCount)] : base;
}

export function snapshotTableWidths(verbose: boolean): number[] {
  const first = verbose ? TABLE_WIDTHS.snapshotId : TABLE_WIDTHS.archiveName;
  const widths = [first, TABLE_WIDTHS.slot, TABLE_WIDTHS.created, TABLE_WIDTHS.size];
  return verbose ? [...widths, TABLE_WIDTHS.files] : widths;
}
