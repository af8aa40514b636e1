/**
 * Snapshot archive naming utilities
 *
 * Names look like `2026-10-19T13-05-07-123Z_000004.zip` (deflated) or
 * `2026-10-19T13-05-07-123Z_000004.stored.zip` (uncompressed), so a plain
 * lexical sort of a slot directory is also chronological.
 */

// Pattern: timestamp_sequence[.stored].zip
export const ARCHIVE_NAME_PATTERN =
  /^(\d{4}-\d{2}-\d{2}T\d{2}-\d{2}-\d{2}-\d{3}Z)_(\d{6})(\.stored)?\.zip$/;

export const PREVIEW_EXTENSION = ".png";

const SEQUENCE_WIDTH = 6;

export interface ParsedArchiveName {
  createdAt: number;
  sequence: number;
  compressed: boolean;
}

export function formatArchiveTimestamp(createdAt: number): string {
  return new Date(createdAt).toISOString().replace(/:/g, "-").replace(".", "-");
}

export function generateArchiveName(
  createdAt: number,
  sequence: number,
  compressed: boolean,
): string {
  const seq = String(sequence).padStart(SEQUENCE_WIDTH, "0");
  const suffix = compressed ? ".zip" : ".stored.zip";
  return `${formatArchiveTimestamp(createdAt)}_${seq}${suffix}`;
}

export function parseArchiveName(archiveName: string): ParsedArchiveName | null {
  const match = ARCHIVE_NAME_PATTERN.exec(archiveName);
  if (!match) return null;

  const [, stamp, seq, stored] = match;
  if (!stamp || !seq) return null;

  // 2026-10-19T13-05-07-123Z -> 2026-10-19T13:05:07.123Z
  const iso = `${stamp.slice(0, 10)}T${stamp.slice(11, 13)}:${stamp.slice(14, 16)}:${stamp.slice(17, 19)}.${stamp.slice(20, 23)}Z`;
  const createdAt = Date.parse(iso);
  if (Number.isNaN(createdAt)) return null;

  return {
    createdAt,
    sequence: Number.parseInt(seq, 10),
    compressed: stored === undefined,
  };
}

export function isValidArchiveName(archiveName: string): boolean {
  return parseArchiveName(archiveName) !== null;
}

/**
 * Preview image stored beside an archive: `<stem>.png`.
 */
export function previewNameFor(archiveName: string): string {
  const stem = archiveName.replace(/(\.stored)?\.zip$/, "");
  return `${stem}${PREVIEW_EXTENSION}`;
}
