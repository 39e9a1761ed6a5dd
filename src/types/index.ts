/**
 * Core type definitions for notedrop
 */

import type { IncomingHttpHeaders } from 'node:http';

export type StorageBackend = 'disk' | 's3' | 'memory';

export interface DiskStorageConfig {
  dir: string;
}

export interface S3StorageConfig {
  bucket: string;
  prefix: string;
  region?: string;
  endpoint?: string; // Custom endpoint (MinIO, LocalStack); switches to path-style addressing
}

export interface StorageConfig {
  backend: StorageBackend;
  disk: DiskStorageConfig;
  s3?: S3StorageConfig;
}

export interface AppConfig {
  server: {
    port: number;
    host: string;
    bodyLimit: number;
  };
  storage: StorageConfig;
  publicUrl?: string;
  logLevel: string;
}

/**
 * Transport-neutral view of an inbound HTTP request.
 * Built from a Fastify request, whether it came off the socket or from an injected gateway event.
 */
export interface InboundRequest {
  method: string;
  url: string; // Path plus query string, as received
  headers: IncomingHttpHeaders;
  body: Buffer;
  remoteAddress?: string;
  encrypted?: boolean;
}

/**
 * Canonical write request after body/query/path normalization.
 * Content is kept as bytes; raw bodies may be binary.
 */
export interface NoteRequest {
  noteId: string;
  content: Buffer;
}

export interface ParsedNoteRequest extends NoteRequest {
  contentType: string;
}

export type SaveAction = 'saved' | 'deleted';

export interface SaveResult {
  noteId: string;
  action: SaveAction;
}

/**
 * JSON body returned to programmatic callers.
 */
export interface NoteResponse {
  success: boolean;
  noteId?: string;
  content?: string;
  error?: string;
}
