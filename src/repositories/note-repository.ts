/**
 * Storage abstraction for note content, keyed by note id.
 * Implementations may keep data on disk, in S3 or in memory, and must agree on:
 * - content is stored and returned byte-for-byte
 * - a missing note reads as empty content, never an error
 * - write replaces the whole note
 * - deleting a missing note succeeds
 * Errors are reserved for real I/O failures.
 */
export interface NoteRepository {
  /**
   * Backend name, used in log context.
   */
  readonly backend: string;

  /**
   * Return the content stored under id, or an empty buffer when nothing is stored.
   */
  read(id: string, signal?: AbortSignal): Promise<Buffer>;

  /**
   * Create or fully overwrite the note.
   */
  write(id: string, content: Buffer, signal?: AbortSignal): Promise<void>;

  /**
   * Remove the note if it exists.
   */
  delete(id: string, signal?: AbortSignal): Promise<void>;
}
