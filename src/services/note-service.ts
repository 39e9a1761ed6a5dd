import type { NoteRepository } from '../repositories/note-repository.js';
import type { NoteRequest, SaveAction, SaveResult } from '../types/index.js';
import { NoteStorageError, NoteValidationError } from '../core/errors.js';
import type { StorageOperation } from '../core/errors.js';
import { generateNoteId, isValidNoteId } from '../utils/note-id.js';
import logger from '../utils/logger.js';

const FAILURE_MESSAGES: Record<StorageOperation, string> = {
  read: 'Failed to read note',
  write: 'Failed to save note',
  delete: 'Failed to delete note',
};

/**
 * Read / write / delete pipeline on top of a NoteRepository.
 * Every id is validated before the repository sees it, and each call performs at
 * most one repository operation. Nothing is retried.
 */
export class NoteService {
  private repository: NoteRepository;

  constructor(repository: NoteRepository) {
    this.repository = repository;
  }

  /**
   * Content of a note. An empty id is the "new note" state and reads as empty
   * without touching storage; a missing note also reads as empty.
   */
  async load(noteId: string, signal?: AbortSignal): Promise<Buffer> {
    if (noteId === '') {
      return Buffer.alloc(0);
    }
    this.assertValid(noteId);

    try {
      return await this.repository.read(noteId, signal);
    } catch (error) {
      throw this.storageFailure('read', noteId, error);
    }
  }

  /**
   * Store content under an explicit id. Blank content deletes the note instead.
   */
  async write(noteId: string, content: Buffer, signal?: AbortSignal): Promise<SaveAction> {
    this.assertValid(noteId);

    if (isBlank(content)) {
      try {
        await this.repository.delete(noteId, signal);
      } catch (error) {
        throw this.storageFailure('delete', noteId, error);
      }
      logger.info({ noteId, backend: this.repository.backend }, 'Note deleted');
      return 'deleted';
    }

    try {
      await this.repository.write(noteId, content, signal);
    } catch (error) {
      throw this.storageFailure('write', noteId, error);
    }
    logger.info(
      { noteId, size: content.length, backend: this.repository.backend },
      'Note saved'
    );
    return 'saved';
  }

  /**
   * Handle a normalized write request, generating an id when none was supplied.
   */
  async save(request: NoteRequest, signal?: AbortSignal): Promise<SaveResult> {
    let noteId = request.noteId.trim();
    if (noteId === '') {
      noteId = generateNoteId();
      logger.debug({ noteId }, 'Generated new note id');
    }

    const action = await this.write(noteId, request.content, signal);
    return { noteId, action };
  }

  private assertValid(noteId: string): void {
    if (!isValidNoteId(noteId)) {
      logger.warn({ noteId }, 'Rejected invalid note id');
      throw new NoteValidationError('Invalid note ID format');
    }
  }

  private storageFailure(operation: StorageOperation, noteId: string, cause: unknown): NoteStorageError {
    const backend = this.repository.backend;
    logger.error({ err: cause, operation, noteId, backend }, 'Note storage operation failed');
    return new NoteStorageError(FAILURE_MESSAGES[operation], { operation, noteId, backend, cause });
  }
}

/**
 * Only the blank check looks at the content as text; what is stored stays raw bytes.
 */
function isBlank(content: Buffer): boolean {
  return content.toString('utf-8').trim() === '';
}
