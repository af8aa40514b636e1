/**
 * Engine error taxonomy
 */

export const ErrorKinds = {
  IO: "IOError",
  INSUFFICIENT_SPACE: "InsufficientSpaceError",
  CORRUPT_ARCHIVE: "CorruptArchiveError",
  BUSY: "BusyError",
  IN_USE: "InUseError",
  NOT_FOUND: "NotFoundError",
} as const;

export type ErrorKind = (typeof ErrorKinds)[keyof typeof ErrorKinds];

/**
 * Base class for engine errors
 */
export class SaveguardError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = kind;
  }
}

/**
 * Read or write failure. Retried on the next scheduled tick, never within a job.
 */
export class IOError extends SaveguardError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorKinds.IO, message, options);
  }
}

export class InsufficientSpaceError extends SaveguardError {
  constructor(
    public readonly requiredBytes: number,
    public readonly availableBytes: number | null,
    options?: { cause?: unknown },
  ) {
    super(
      ErrorKinds.INSUFFICIENT_SPACE,
      availableBytes === null
        ? `Not enough free space (need ${requiredBytes} bytes)`
        : `Not enough free space (need ${requiredBytes} bytes, ${availableBytes} available)`,
      options,
    );
  }
}

export class CorruptArchiveError extends SaveguardError {
  constructor(
    public readonly archivePath: string,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super(ErrorKinds.CORRUPT_ARCHIVE, `Cannot read archive ${archivePath}: ${detail}`, options);
  }
}

/**
 * A job is already running (or a restore is waiting) for the slot.
 */
export class BusyError extends SaveguardError {
  constructor(public readonly slotId: string) {
    super(ErrorKinds.BUSY, `A job is already running for ${slotId}`);
  }
}

export class InUseError extends SaveguardError {
  constructor(public readonly snapshotId: string) {
    super(ErrorKinds.IN_USE, `Snapshot ${snapshotId} is being restored`);
  }
}

export class NotFoundError extends SaveguardError {
  constructor(message: string) {
    super(ErrorKinds.NOT_FOUND, message);
  }
}

function errnoCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

export function isErrnoError(error: unknown, code?: string): boolean {
  const actual = errnoCode(error);
  return actual !== undefined && (code === undefined || actual === code);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap anything that is not already an engine error as an IOError.
 */
export function toSaveguardError(error: unknown, context: string): SaveguardError {
  if (error instanceof SaveguardError) return error;
  return new IOError(`${context}: ${errorMessage(error)}`, { cause: error });
}
