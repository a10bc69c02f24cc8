/**
 * Error taxonomy for archive parsing and patch application.
 */

export const ErrorCodes = {
  MALFORMED_ARCHIVE: 'MALFORMED_ARCHIVE',
  TRUNCATED_DATA: 'TRUNCATED_DATA',
  DUPLICATE_ENTRY: 'DUPLICATE_ENTRY',
  OVERFLOW: 'OVERFLOW',
  FILE_LOCKED: 'FILE_LOCKED',
  DOWNLOAD_INCOMPLETE: 'DOWNLOAD_INCOMPLETE',
  CHECKPOINT_CORRUPT: 'CHECKPOINT_CORRUPT',
  UNSAFE_PATH: 'UNSAFE_PATH',
  DESTINATION_BUSY: 'DESTINATION_BUSY',
  VERSION_UNAVAILABLE: 'VERSION_UNAVAILABLE',
  INVALID_CONFIG: 'INVALID_CONFIG',
  IO_FAILURE: 'IO_FAILURE',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

/**
 * Base class for every error raised by the patcher.
 */
export class PatchError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'PatchError';
  }
}

/**
 * Bad signature or entry table in an archive header.
 */
export class MalformedArchiveError extends PatchError {
  constructor(message: string, public readonly source?: string) {
    super(ErrorCodes.MALFORMED_ARCHIVE, source ? `${message} (${source})` : message);
    this.name = 'MalformedArchiveError';
  }
}

/**
 * Data file shorter than an entry claims.
 */
export class TruncatedDataError extends PatchError {
  constructor(
    public readonly entryPath: string,
    public readonly expectedEnd: number,
    public readonly available: number,
  ) {
    super(
      ErrorCodes.TRUNCATED_DATA,
      `Entry "${entryPath}" ends at byte ${expectedEnd} but only ${available} bytes are available`,
    );
    this.name = 'TruncatedDataError';
  }
}

/**
 * Two entries resolve to the same case-insensitive path.
 */
export class DuplicateEntryError extends PatchError {
  constructor(public readonly entryPath: string, reason: string) {
    super(ErrorCodes.DUPLICATE_ENTRY, `Duplicate entry "${entryPath}": ${reason}`);
    this.name = 'DuplicateEntryError';
  }
}

export class OverflowError extends PatchError {
  constructor(value: number | bigint, domain: string) {
    super(ErrorCodes.OVERFLOW, `Value ${value} does not fit in ${domain}`);
    this.name = 'OverflowError';
  }
}

/**
 * A destination file stayed locked through every retry.
 */
export class FileLockedError extends PatchError {
  constructor(
    public readonly filePath: string,
    public readonly attempts: number,
    cause?: unknown,
  ) {
    super(ErrorCodes.FILE_LOCKED, `Could not write ${filePath} after ${attempts} attempts`, cause);
    this.name = 'FileLockedError';
  }
}

export class DownloadIncompleteError extends PatchError {
  constructor(public readonly version: number, public readonly missing: readonly string[]) {
    super(ErrorCodes.DOWNLOAD_INCOMPLETE, `Patch ${version} is incomplete after download: ${missing.join(', ')}`);
    this.name = 'DownloadIncompleteError';
  }
}

export class CheckpointCorruptError extends PatchError {
  constructor(message: string) {
    super(ErrorCodes.CHECKPOINT_CORRUPT, message);
    this.name = 'CheckpointCorruptError';
  }
}

/**
 * A relative path that would resolve outside its root.
 */
export class UnsafePathError extends PatchError {
  constructor(public readonly relativePath: string, root: string) {
    super(ErrorCodes.UNSAFE_PATH, `Path "${relativePath}" escapes ${root}`);
    this.name = 'UnsafePathError';
  }
}

export class DestinationBusyError extends PatchError {
  constructor(public readonly root: string, public readonly ownerPid: number) {
    super(ErrorCodes.DESTINATION_BUSY, `${root} is held by process ${ownerPid}`);
    this.name = 'DestinationBusyError';
  }
}

export class VersionUnavailableError extends PatchError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCodes.VERSION_UNAVAILABLE, message, cause);
    this.name = 'VersionUnavailableError';
  }
}

export class InvalidConfigError extends PatchError {
  constructor(message: string) {
    super(ErrorCodes.INVALID_CONFIG, message);
    this.name = 'InvalidConfigError';
  }
}

/**
 * Fatal failure of a sequencer run, tagged with where it happened.
 */
export class PatchRunError extends PatchError {
  constructor(
    code: ErrorCode,
    public readonly phase: string,
    /** Patch being applied; undefined when the failure was outside any patch. */
    public readonly version: number | undefined,
    cause: unknown,
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    const subject = version === undefined ? 'Patch run' : `Patch ${version}`;
    super(code, `${subject} failed during ${phase}: ${detail}`, cause);
    this.name = 'PatchRunError';
  }

  /**
   * Wraps any thrown value, keeping the code of a PatchError cause.
   */
  static from(phase: string, version: number | undefined, cause: unknown): PatchRunError {
    if (cause instanceof PatchRunError) {
      return cause;
    }
    const code = cause instanceof PatchError ? cause.code : ErrorCodes.IO_FAILURE;
    return new PatchRunError(code, phase, version, cause);
  }
}
