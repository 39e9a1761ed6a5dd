import dotenv from 'dotenv';
import { AppConfig, StorageBackend } from '../types/index.js';

dotenv.config();

const BACKENDS: readonly StorageBackend[] = ['disk', 's3', 'memory'];

function parseBackend(env: NodeJS.ProcessEnv): StorageBackend {
  const raw = env.STORAGE_BACKEND?.trim().toLowerCase();
  if (!raw) {
    // Lambda has no writable persistent disk, so it defaults to the bucket
    return env.AWS_LAMBDA_FUNCTION_NAME ? 's3' : 'disk';
  }
  const backend = BACKENDS.find((candidate) => candidate === raw);
  if (!backend) {
    throw new Error(`Unknown STORAGE_BACKEND "${raw}" (expected one of ${BACKENDS.join(', ')})`);
  }
  return backend;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const backend = parseBackend(env);

  const bucket = env.S3_BUCKET?.trim();
  if (backend === 's3' && !bucket) {
    throw new Error('S3_BUCKET environment variable is required');
  }

  return {
    server: {
      port: parseInt(env.PORT || '8080', 10),
      host: env.HOST || '0.0.0.0',
      bodyLimit: parseInt(env.MAX_BODY_BYTES || '5242880', 10),
    },
    storage: {
      backend,
      disk: {
        dir: env.NOTE_DIR || '/note',
      },
      s3: bucket
        ? {
            bucket,
            prefix: env.S3_PREFIX || 'note',
            region: env.AWS_REGION || undefined,
            endpoint: env.S3_ENDPOINT || undefined,
          }
        : undefined,
    },
    publicUrl: env.URL || undefined,
    logLevel: env.LOG_LEVEL || 'info',
  };
}
