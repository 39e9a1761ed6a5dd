import type { StorageConfig } from '../types/index.js';
import { DiskNoteRepository } from './disk-note-repository.js';
import { MemoryNoteRepository } from './memory-note-repository.js';
import type { NoteRepository } from './note-repository.js';
import { S3NoteRepository } from './s3-note-repository.js';

export type { NoteRepository } from './note-repository.js';
export { DiskNoteRepository, MemoryNoteRepository, S3NoteRepository };

/**
 * Pick the backend once at startup; request handling never switches it.
 * The disk root is created here so an unusable NOTE_DIR fails startup.
 */
export async function createNoteRepository(config: StorageConfig): Promise<NoteRepository> {
  switch (config.backend) {
    case 'disk': {
      const repository = new DiskNoteRepository(config.disk.dir);
      await repository.initialize();
      return repository;
    }
    case 's3':
      if (!config.s3) {
        throw new Error('S3 storage selected but no bucket configured');
      }
      return S3NoteRepository.fromConfig(config.s3);
    case 'memory':
      return new MemoryNoteRepository();
  }
}
