/**
 * Error taxonomy for the restore pipeline.
 *
 * Recoverable conditions (a missing blob, one corrupt annotation) never reach
 * the orchestrator as exceptions; they come back as result variants. Everything
 * defined here either drives a retry decision or stops the run.
 */

export class RestoreError extends Error {
  constructor(
    message: string,
    public remediation?: string,
    public cause?: unknown,
  ) {
    super(message);
    this.name = "RestoreError";
  }
}

/** Network, range or status anomaly. Retried by the fetcher. */
export class TransientTransferError extends RestoreError {
  constructor(message: string, cause?: unknown) {
    super(message, undefined, cause);
    this.name = "TransientTransferError";
  }
}

export const ACCESS_EXPIRED_MESSAGE =
  "The access to your project backup has expired due to inactivity.";

/** The backup stayed unreachable for the whole retry budget. Ends the run cleanly. */
export class ExpiredSourceError extends RestoreError {
  constructor(public attempts: number, cause?: unknown) {
    super(ACCESS_EXPIRED_MESSAGE, undefined, cause);
    this.name = "ExpiredSourceError";
  }
}

export class TransferFailureError extends RestoreError {
  constructor(message: string, remediation?: string, cause?: unknown) {
    super(message, remediation, cause);
    this.name = "TransferFailureError";
  }
}

export class ArchiveIntegrityError extends RestoreError {
  constructor(
    message: string,
    public archivePath: string,
    cause?: unknown,
  ) {
    super(
      message,
      "The backup archive is damaged or is not a zip/tar file. Download it again or contact support.",
      cause,
    );
    this.name = "ArchiveIntegrityError";
  }
}

export class InsufficientStorageError extends RestoreError {
  constructor(
    public requiredBytes: number,
    public freeBytes: number,
    public location: string,
  ) {
    super(
      `Not enough disk space at ${location}: ${requiredBytes} bytes required, ${freeBytes} bytes free`,
      "Free up disk space or run the restore on a machine with a larger disk.",
    );
    this.name = "InsufficientStorageError";
  }
}

/** Structured "hashes not found" answer of the remote content store. */
export class HashesNotFoundError extends RestoreError {
  constructor(public hashes: string[]) {
    super(`Hashes not found: ${hashes.length}`);
    this.name = "HashesNotFoundError";
  }
}

export class RemoteStoreError extends RestoreError {
  constructor(message: string, public statusCode?: number, cause?: unknown) {
    super(message, undefined, cause);
    this.name = "RemoteStoreError";
  }
}

export class AnnotationCorruptionError extends RestoreError {
  constructor(message: string, public annotationPath: string, cause?: unknown) {
    super(message, undefined, cause);
    this.name = "AnnotationCorruptionError";
  }
}

export class StructuralPreconditionError extends RestoreError {
  constructor(message: string, public dataset?: string) {
    super(message);
    this.name = "StructuralPreconditionError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
