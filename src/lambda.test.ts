import { describe, expect, it, vi } from 'vitest';

import { buildApp } from './app.js';
import { createLambdaHandler } from './lambda.js';
import { MemoryNoteRepository } from './repositories/memory-note-repository.js';
import type { AppConfig } from './types/index.js';

const config: AppConfig = {
  server: { port: 0, host: '127.0.0.1', bodyLimit: 1024 },
  storage: { backend: 'memory', disk: { dir: '/unused' } },
  logLevel: 'silent',
};

function createHandler() {
  const repository = new MemoryNoteRepository();
  const factory = vi.fn(() => buildApp({ repository, config }));
  return { repository, factory, handler: createLambdaHandler(factory) };
}

interface EventInit {
  query?: string;
  headers?: Record<string, string>;
  body?: string;
}

function v2Event(method: string, rawPath: string, init: EventInit = {}) {
  return {
    version: '2.0',
    routeKey: '$default',
    rawPath,
    rawQueryString: init.query ?? '',
    headers: init.headers ?? {},
    body: init.body,
    isBase64Encoded: false,
    requestContext: { http: { method, path: rawPath, sourceIp: '203.0.113.7' } },
  };
}

describe('createLambdaHandler', () => {
  it('saves and reads a note through HTTP API events', async () => {
    const { handler, repository } = createHandler();

    const saved = await handler(
      v2Event('POST', '/', {
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify({ noteId: 'abc', content: 'hello' }),
      })
    );
    expect(saved.statusCode).toBe(200);
    expect(JSON.parse(saved.body)).toEqual({ success: true, noteId: 'abc' });
    expect((await repository.read('abc')).toString('utf-8')).toBe('hello');

    const read = await handler(
      v2Event('GET', '/', { query: 'note=abc', headers: { 'user-agent': 'curl/8.4.0' } })
    );
    expect(read.statusCode).toBe(200);
    expect(read.body).toBe('hello');
    expect(read.isBase64Encoded).toBe(false);
  });

  it('handles REST API events', async () => {
    const { handler, repository } = createHandler();
    await repository.write('abc', Buffer.from('from rest'));

    const result = await handler({
      httpMethod: 'GET',
      path: '/noteid/abc',
      headers: { Accept: 'application/json' },
      multiValueQueryStringParameters: null,
      queryStringParameters: null,
      body: null,
      isBase64Encoded: false,
      requestContext: { identity: { sourceIp: '198.51.100.4' } },
    });

    expect(result.statusCode).toBe(200);
    expect(JSON.parse(result.body)).toEqual({ success: true, noteId: 'abc', content: 'from rest' });
  });

  it('returns binary notes base64-encoded', async () => {
    const { handler, repository } = createHandler();
    const bytes = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0xff, 0xfe, 0x80, 0x41]);
    await repository.write('BIN', bytes);

    const result = await handler(
      v2Event('GET', '/noteid/BIN', { headers: { 'user-agent': 'curl/8.4.0' } })
    );

    expect(result.statusCode).toBe(200);
    expect(result.isBase64Encoded).toBe(true);
    expect(Buffer.from(result.body, 'base64').equals(bytes)).toBe(true);
  });

  it('serves the new-note page for console test events', async () => {
    const { handler } = createHandler();
    const result = await handler({ key1: 'value1' });
    expect(result.statusCode).toBe(200);
    expect(result.headers['content-type']).toBe('text/html; charset=utf-8');
    expect(result.body).toContain('<body data-note-id="">');
  });

  it('returns the favicon base64-encoded', async () => {
    const { handler } = createHandler();
    const result = await handler(v2Event('GET', '/favicon.ico'));
    expect(result.isBase64Encoded).toBe(true);
    expect(Buffer.from(result.body, 'base64').toString('utf-8')).toContain('<svg');
  });

  it('rejects unrecognised events without building the app', async () => {
    const { handler, factory } = createHandler();
    const result = await handler({});
    expect(result.statusCode).toBe(400);
    expect(JSON.parse(result.body)).toEqual({
      success: false,
      error:
        'Unsupported event format. Expected an API Gateway REST (v1) or HTTP API (v2) event, or a console test event.',
    });
    expect(factory).not.toHaveBeenCalled();
  });

  it('rejects methods the app does not route', async () => {
    const { handler } = createHandler();
    const result = await handler(v2Event('TRACE', '/'));
    expect(result.statusCode).toBe(405);
    expect(JSON.parse(result.body)).toEqual({ success: false, error: 'Method not allowed' });
  });

  it('builds the app once per container', async () => {
    const { handler, factory } = createHandler();
    await handler(v2Event('GET', '/'));
    await handler(v2Event('GET', '/'));
    expect(factory).toHaveBeenCalledTimes(1);
  });

  it('retries initialization after a failure', async () => {
    const repository = new MemoryNoteRepository();
    const factory = vi
      .fn(() => buildApp({ repository, config }))
      .mockImplementationOnce(async () => {
        throw new Error('S3_BUCKET environment variable is required');
      });
    const handler = createLambdaHandler(factory);

    await expect(handler(v2Event('GET', '/'))).rejects.toThrow('S3_BUCKET environment variable is required');
    const result = await handler(v2Event('GET', '/'));
    expect(result.statusCode).toBe(200);
    expect(factory).toHaveBeenCalledTimes(2);
  });
});
