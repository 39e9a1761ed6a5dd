import type { NoteRepository } from './note-repository.js';

/**
 * In-memory NoteRepository implementation.
 * Used by tests and local development; state is lost on restart.
 */
export class MemoryNoteRepository implements NoteRepository {
  readonly backend = 'memory';
  private notes = new Map<string, Buffer>();

  async read(id: string, signal?: AbortSignal): Promise<Buffer> {
    signal?.throwIfAborted();
    const stored = this.notes.get(id);
    return stored ? Buffer.from(stored) : Buffer.alloc(0);
  }

  async write(id: string, content: Buffer, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    // Copy so later changes to the caller's buffer do not leak in
    this.notes.set(id, Buffer.from(content));
  }

  async delete(id: string, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    this.notes.delete(id);
  }

  /**
   * Number of notes currently stored.
   */
  get size(): number {
    return this.notes.size;
  }
}
