/**
 * Human-readable formatting helpers
 */

const BYTE_UNITS = ["B", "KB", "MB", "GB", "TB"] as const;

export function formatBytes(bytes: number): string {
  if (bytes <= 0) return "0 B";

  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < BYTE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }

  const digits = unit === 0 ? 0 : 2;
  return `${value.toFixed(digits)} ${BYTE_UNITS[unit]}`;
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;

  const seconds = ms / 1000;
  if (seconds < 60) return `${seconds.toFixed(1)}s`;

  const minutes = Math.floor(seconds / 60);
  const rest = Math.round(seconds % 60);
  return `${minutes}m ${rest}s`;
}

const SIZE_PATTERN = /^(\d+(?:\.\d+)?)\s*(b|kb|mb|gb|tb)?$/i;

/**
 * Parse "512", "200MB" or "1.5 GB" into bytes (binary multiples).
 * Returns null for anything else.
 */
export function parseSize(input: string): number | null {
  const match = SIZE_PATTERN.exec(input.trim());
  if (!match) return null;

  const amount = Number(match[1]);
  const unit = (match[2] ?? "b").toUpperCase();
  const exponent = BYTE_UNITS.findIndex((u) => u === unit);
  if (exponent < 0 || !Number.isFinite(amount)) return null;

  return Math.round(amount * 1024 ** exponent);
}
