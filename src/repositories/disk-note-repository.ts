import { promises as fs } from 'node:fs';
import { resolve, sep } from 'node:path';

import type { NoteRepository } from './note-repository.js';
import logger from '../utils/logger.js';

/**
 * Disk-backed NoteRepository implementation.
 * Stores one file per note, named exactly as the note id, under a root directory.
 * Files hold the raw note bytes.
 */
export class DiskNoteRepository implements NoteRepository {
  readonly backend = 'disk';
  private readonly root: string;
  private ready?: Promise<void>;

  constructor(noteDir: string) {
    this.root = resolve(noteDir);
  }

  /**
   * Create the root directory if needed. Every operation waits on this;
   * a failed attempt is forgotten so the next call tries again.
   */
  initialize(): Promise<void> {
    if (!this.ready) {
      this.ready = fs.mkdir(this.root, { recursive: true }).then(
        () => {
          logger.info({ noteDir: this.root }, 'Disk note repository initialized');
        },
        (error: unknown) => {
          this.ready = undefined;
          logger.error({ err: error, noteDir: this.root }, 'Failed to create note directory');
          throw error;
        }
      );
    }
    return this.ready;
  }

  async read(id: string, signal?: AbortSignal): Promise<Buffer> {
    await this.initialize();
    const target = this.resolveWithinRoot(id);
    try {
      const content = await fs.readFile(target, { signal });
      logger.debug({ id, bytes: content.length }, 'Note read from disk');
      return content;
    } catch (error) {
      if (isNotFound(error)) {
        logger.debug({ id }, 'Note file does not exist');
        return Buffer.alloc(0);
      }
      throw error;
    }
  }

  async write(id: string, content: Buffer, signal?: AbortSignal): Promise<void> {
    await this.initialize();
    const target = this.resolveWithinRoot(id);
    await fs.writeFile(target, content, { signal });
    logger.debug({ id, bytes: content.length }, 'Note written to disk');
  }

  async delete(id: string, signal?: AbortSignal): Promise<void> {
    await this.initialize();
    signal?.throwIfAborted();
    const target = this.resolveWithinRoot(id);
    await fs.rm(target, { force: true });
    logger.debug({ id }, 'Note removed from disk');
  }

  /**
   * Ids are validated upstream; this only guards against a caller that skipped it.
   */
  private resolveWithinRoot(id: string): string {
    if (!id || id.includes('/') || id.includes('\\')) {
      throw new Error('Invalid note path');
    }
    const fullPath = resolve(this.root, id);
    const prefix = this.root.endsWith(sep) ? this.root : this.root + sep;
    if (!fullPath.startsWith(prefix)) {
      throw new Error('Invalid note path');
    }
    return fullPath;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
