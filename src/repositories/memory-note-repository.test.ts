import { beforeEach, describe, expect, it } from 'vitest';

import { MemoryNoteRepository } from './memory-note-repository.js';

describe('MemoryNoteRepository', () => {
  let repository: MemoryNoteRepository;

  beforeEach(() => {
    repository = new MemoryNoteRepository();
  });

  it('reads back what was written', async () => {
    await repository.write('abc', Buffer.from('Hello world'));

    expect((await repository.read('abc')).toString('utf-8')).toBe('Hello world');
    expect(repository.size).toBe(1);
  });

  it('keeps binary content byte for byte', async () => {
    const bytes = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0xff, 0xfe, 0x80, 0x41]);
    await repository.write('bin', bytes);

    expect((await repository.read('bin')).equals(bytes)).toBe(true);
  });

  it('is not affected by later changes to the written buffer', async () => {
    const content = Buffer.from('abc');
    await repository.write('abc', content);
    content.fill(0);

    expect((await repository.read('abc')).toString('utf-8')).toBe('abc');
  });

  it('overwrites notes with the same id', async () => {
    await repository.write('abc', Buffer.from('old'));
    await repository.write('abc', Buffer.from('new'));

    expect((await repository.read('abc')).toString('utf-8')).toBe('new');
    expect(repository.size).toBe(1);
  });

  it('returns empty content for unknown ids', async () => {
    expect((await repository.read('missing')).length).toBe(0);
  });

  it('deletes notes idempotently', async () => {
    await repository.write('abc', Buffer.from('content'));

    await repository.delete('abc');
    await expect(repository.delete('abc')).resolves.toBeUndefined();

    expect((await repository.read('abc')).length).toBe(0);
    expect(repository.size).toBe(0);
  });

  it('refuses to run with an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(repository.write('abc', Buffer.from('content'), controller.signal)).rejects.toThrow();
    expect(repository.size).toBe(0);
  });
});
