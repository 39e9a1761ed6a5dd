import Fastify, { FastifyInstance } from 'fastify';

import { registerRoutes } from './api/routes.js';
import type { NoteRepository } from './repositories/note-repository.js';
import { NoteService } from './services/note-service.js';
import { AppConfig } from './types/index.js';

export interface BuildAppOptions {
  repository: NoteRepository;
  config: AppConfig;
}

/**
 * Assemble the Fastify app. Shared by the HTTP server and the Lambda handler,
 * which feeds gateway events in through `inject()`.
 */
export async function buildApp({ repository, config }: BuildAppOptions): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false, // Using pino logger directly
    bodyLimit: config.server.bodyLimit,
  });

  // The request normalizer decides how to read a body, so every body arrives as raw bytes
  app.removeAllContentTypeParsers();
  app.addContentTypeParser('*', { parseAs: 'buffer' }, (_request, body, done) => {
    done(null, body);
  });

  const noteService = new NoteService(repository);
  await registerRoutes(app, noteService, config);

  return app;
}
