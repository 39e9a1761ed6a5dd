import { readFile } from 'node:fs/promises';

import cors from '@fastify/cors';
import { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';

import { NoteAppError } from '../core/errors.js';
import {
  extractReadNoteId,
  isCurlRequest,
  isFormRequest,
  parseNoteRequest,
  resolveBaseUrl,
  wantsJson,
} from '../core/request-normalizer.js';
import { NoteService } from '../services/note-service.js';
import { AppConfig, InboundRequest, NoteResponse } from '../types/index.js';
import { isLoopback, resolveClientIp } from '../utils/client-ip.js';
import logger from '../utils/logger.js';
import { renderNotePage } from './templates.js';

const NOTE_PATHS = ['/', '/*'];
const TEXT = 'text/plain; charset=utf-8';

function toInboundRequest(request: FastifyRequest): InboundRequest {
  return {
    method: request.method,
    url: request.url,
    headers: request.headers,
    body: Buffer.isBuffer(request.body) ? request.body : Buffer.alloc(0),
    remoteAddress: request.ip,
    encrypted: request.protocol === 'https',
  };
}

/**
 * The part of the outgoing response that tells whether the client hung up.
 */
export interface ClientResponse {
  readonly writableFinished: boolean;
  once(event: 'close', listener: () => void): unknown;
}

/**
 * Signal that fires if the client goes away before the response is written,
 * so storage calls can stop early. Completed writes are not rolled back.
 */
export function clientAbortSignal(response: ClientResponse): AbortSignal {
  const controller = new AbortController();
  response.once('close', () => {
    if (!response.writableFinished) {
      controller.abort();
    }
  });
  return controller.signal;
}

function methodNotAllowed(_request: FastifyRequest, reply: FastifyReply) {
  return reply.code(405).type(TEXT).send('Method not allowed\n');
}

export async function registerRoutes(
  app: FastifyInstance,
  noteService: NoteService,
  config: AppConfig
) {
  const favicon = await readFile(new URL('../../assets/favicon.svg', import.meta.url));

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof NoteAppError) {
      const body: NoteResponse = { success: false, error: error.message };
      return reply.code(error.statusCode).send(body);
    }

    // Fastify's own client errors (oversized body, bad content length)
    if (error.statusCode !== undefined && error.statusCode < 500) {
      const body: NoteResponse = { success: false, error: error.message };
      return reply.code(error.statusCode).send(body);
    }

    logger.error({ err: error, method: request.method, url: request.url }, 'Unhandled request error');
    const body: NoteResponse = { success: false, error: 'Internal server error' };
    return reply.code(500).send(body);
  });

  // Favicon
  app.get('/favicon.ico', async (_request, reply) => {
    return reply.type('image/svg+xml').header('Cache-Control', 'public, max-age=86400').send(favicon);
  });
  app.route({
    method: ['POST', 'PUT', 'DELETE', 'PATCH', 'OPTIONS'],
    url: '/favicon.ico',
    handler: methodNotAllowed,
  });

  // Note routes. Every other path is a note path so the app works under a proxy subpath.
  await app.register(async (notes) => {
    // Answers any OPTIONS with 200 and permissive headers
    await notes.register(cors, {
      origin: '*',
      methods: ['POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type'],
      optionsSuccessStatus: 200,
      strictPreflight: false,
    });

    for (const url of NOTE_PATHS) {
      // Read a note
      notes.get(url, async (request, reply) => {
        const inbound = toInboundRequest(request);
        const clientIp = resolveClientIp(inbound.headers, inbound.remoteAddress);
        const noteId = extractReadNoteId(inbound);

        if (noteId) {
          logger.info({ noteId, clientIp }, 'Retrieving note');
        } else if (!isLoopback(clientIp)) {
          logger.info({ clientIp }, 'Serving new note');
        }

        const content = await noteService.load(noteId, clientAbortSignal(reply.raw));

        // Stored bytes go back to curl untouched
        if (isCurlRequest(inbound) && noteId) {
          if (content.length === 0) {
            return reply.code(404).type(TEXT).send('Note not found\n');
          }
          return reply.type(TEXT).send(content);
        }

        const text = content.toString('utf-8');
        if (wantsJson(inbound)) {
          const body: NoteResponse = { success: true, noteId, content: text };
          return reply.send(body);
        }

        return reply.type('text/html; charset=utf-8').send(renderNotePage(noteId, text));
      });

      // Create, update or delete a note
      notes.post(url, async (request, reply) => {
        const inbound = toInboundRequest(request);
        const clientIp = resolveClientIp(inbound.headers, inbound.remoteAddress);

        const parsed = parseNoteRequest(inbound);
        logger.info(
          { clientIp, noteId: parsed.noteId || undefined, contentType: parsed.contentType || undefined },
          'Note write request'
        );

        const result = await noteService.save(parsed, clientAbortSignal(reply.raw));

        if (isCurlRequest(inbound)) {
          const baseUrl = resolveBaseUrl(inbound, config.publicUrl);
          return reply.type(TEXT).send(`${baseUrl}noteid/${result.noteId}\n`);
        }

        if (isFormRequest(parsed.contentType)) {
          return reply.type(TEXT).send(`OK: ${result.noteId}\n`);
        }

        const body: NoteResponse = { success: true, noteId: result.noteId };
        return reply.send(body);
      });

      notes.route({ method: ['PUT', 'DELETE', 'PATCH'], url, handler: methodNotAllowed });
    }
  });
}
