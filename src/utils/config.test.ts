import { describe, expect, it } from 'vitest';

import { loadConfig } from './config.js';

describe('loadConfig', () => {
  it('uses disk storage and server defaults outside Lambda', () => {
    const config = loadConfig({});

    expect(config.server).toEqual({ port: 8080, host: '0.0.0.0', bodyLimit: 5242880 });
    expect(config.storage.backend).toBe('disk');
    expect(config.storage.disk.dir).toBe('/note');
    expect(config.storage.s3).toBeUndefined();
    expect(config.publicUrl).toBeUndefined();
    expect(config.logLevel).toBe('info');
  });

  it('reads server, disk and link settings from the environment', () => {
    const config = loadConfig({
      PORT: '9090',
      HOST: '127.0.0.1',
      MAX_BODY_BYTES: '1024',
      NOTE_DIR: '/tmp/notes',
      URL: 'https://notes.example.com/',
      LOG_LEVEL: 'debug',
    });

    expect(config.server).toEqual({ port: 9090, host: '127.0.0.1', bodyLimit: 1024 });
    expect(config.storage.disk.dir).toBe('/tmp/notes');
    expect(config.publicUrl).toBe('https://notes.example.com/');
    expect(config.logLevel).toBe('debug');
  });

  it('defaults to S3 when running inside Lambda', () => {
    const config = loadConfig({ AWS_LAMBDA_FUNCTION_NAME: 'notes', S3_BUCKET: 'test-bucket' });

    expect(config.storage.backend).toBe('s3');
    expect(config.storage.s3).toEqual({
      bucket: 'test-bucket',
      prefix: 'note',
      region: undefined,
      endpoint: undefined,
    });
  });

  it('reads S3 prefix, region and endpoint', () => {
    const config = loadConfig({
      STORAGE_BACKEND: 'S3',
      S3_BUCKET: 'test-bucket',
      S3_PREFIX: 'shared/notes',
      AWS_REGION: 'eu-west-1',
      S3_ENDPOINT: 'http://localhost:9000',
    });

    expect(config.storage.backend).toBe('s3');
    expect(config.storage.s3).toEqual({
      bucket: 'test-bucket',
      prefix: 'shared/notes',
      region: 'eu-west-1',
      endpoint: 'http://localhost:9000',
    });
  });

  it('lets STORAGE_BACKEND override the Lambda default', () => {
    const config = loadConfig({ AWS_LAMBDA_FUNCTION_NAME: 'notes', STORAGE_BACKEND: 'memory' });
    expect(config.storage.backend).toBe('memory');
  });

  it('requires a bucket for the S3 backend', () => {
    expect(() => loadConfig({ STORAGE_BACKEND: 's3' })).toThrow(
      'S3_BUCKET environment variable is required'
    );
  });

  it('rejects unknown backends', () => {
    expect(() => loadConfig({ STORAGE_BACKEND: 'redis' })).toThrow('Unknown STORAGE_BACKEND "redis"');
  });
});
