/**
 * Error types surfaced by the note pipeline.
 * `statusCode` is what the HTTP layer answers with. Messages are safe to show
 * the caller; internal detail travels in `cause`.
 */
export abstract class NoteAppError extends Error {
  abstract readonly statusCode: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Note id failed validation. Raised before any storage access.
 */
export class NoteValidationError extends NoteAppError {
  readonly statusCode = 400;
}

/**
 * Request body declared a format it does not satisfy (e.g. broken JSON).
 */
export class MalformedRequestError extends NoteAppError {
  readonly statusCode = 400;
}

export type StorageOperation = 'read' | 'write' | 'delete';

/**
 * Backing store I/O failure. The cause stays server-side.
 */
export class NoteStorageError extends NoteAppError {
  readonly statusCode = 500;
  readonly operation: StorageOperation;
  readonly noteId: string;
  readonly backend: string;

  constructor(
    message: string,
    details: { operation: StorageOperation; noteId: string; backend: string; cause: unknown }
  ) {
    super(message, { cause: details.cause });
    this.operation = details.operation;
    this.noteId = details.noteId;
    this.backend = details.backend;
  }
}
