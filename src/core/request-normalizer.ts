import type { IncomingHttpHeaders } from 'node:http';

import type { InboundRequest, ParsedNoteRequest } from '../types/index.js';
import { MalformedRequestError } from './errors.js';

const PATH_MARKER = '/noteid/';
const JSON_TYPE = 'application/json';
const FORM_TYPE = 'application/x-www-form-urlencoded';
const MALFORMED_ESCAPE = /%(?![0-9A-Fa-f]{2})/;

function header(headers: IncomingHttpHeaders, name: string): string {
  const value = headers[name];
  if (Array.isArray(value)) {
    return value.join(', ');
  }
  return value ?? '';
}

function splitUrl(url: string): { path: string; query: URLSearchParams } {
  const queryStart = url.indexOf('?');
  if (queryStart === -1) {
    return { path: url, query: new URLSearchParams() };
  }
  return {
    path: url.slice(0, queryStart),
    query: new URLSearchParams(url.slice(queryStart + 1)),
  };
}

/**
 * Note id embedded in the path after the `/noteid/` marker, e.g. `/app/noteid/AB3K9/`.
 * Returns '' when the path has no marker.
 */
export function extractPathNoteId(path: string): string {
  const idx = path.indexOf(PATH_MARKER);
  if (idx === -1) {
    return '';
  }
  return path.slice(idx + PATH_MARKER.length).replace(/^\/+|\/+$/g, '');
}

/**
 * Id for a read: `?note=` wins over the path. '' means "show a new note".
 */
export function extractReadNoteId(request: InboundRequest): string {
  const { path, query } = splitUrl(request.url);
  return query.get('note') || extractPathNoteId(path);
}

function parseJsonBody(raw: string, pathId: string, contentType: string): ParsedNoteRequest {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new MalformedRequestError('Invalid JSON format', { cause: error });
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new MalformedRequestError('Invalid JSON format');
  }

  const noteId = 'noteId' in parsed ? parsed.noteId : undefined;
  const content = 'content' in parsed ? parsed.content : undefined;
  if (!isOptionalString(noteId) || !isOptionalString(content)) {
    throw new MalformedRequestError('Invalid JSON format');
  }

  return {
    noteId: noteId || pathId,
    content: Buffer.from(content ?? '', 'utf-8'),
    contentType,
  };
}

function isOptionalString(value: unknown): value is string | null | undefined {
  return value === undefined || value === null || typeof value === 'string';
}

/**
 * Strict form decoding: a stray `%` or a `;` separator means the body is not
 * really a form and is kept as raw content instead.
 */
function parseForm(raw: string): URLSearchParams | undefined {
  if (raw.includes(';') || MALFORMED_ESCAPE.test(raw)) {
    return undefined;
  }
  return new URLSearchParams(raw);
}

/**
 * Reduce a write request to (noteId, content) according to its declared content type.
 *
 * - JSON: `{ noteId, content }`, id falls back to the path
 * - form: `text` and `noteId` fields when present, otherwise the raw body is the note
 * - anything else: the raw body is the note, byte for byte
 *
 * For form and raw bodies a `?noteId=` query parameter takes precedence over the body
 * and the path. The returned id is untrimmed and unvalidated.
 */
export function parseNoteRequest(request: InboundRequest): ParsedNoteRequest {
  const contentType = header(request.headers, 'content-type');
  const { path, query } = splitUrl(request.url);
  const pathId = extractPathNoteId(path);
  const queryId = query.get('noteId') ?? '';

  if (contentType.toLowerCase().includes(JSON_TYPE)) {
    return parseJsonBody(request.body.toString('utf-8'), pathId, contentType);
  }

  if (isFormRequest(contentType)) {
    const form = parseForm(request.body.toString('utf-8'));
    if (form && (form.has('text') || form.has('noteId'))) {
      return {
        noteId: queryId || form.get('noteId') || pathId,
        content: Buffer.from(form.get('text') ?? '', 'utf-8'),
        contentType,
      };
    }
  }

  // Plain text, piped binary, or a "form" body that is not actually a form
  return {
    noteId: queryId || pathId,
    content: request.body,
    contentType,
  };
}

export function isFormRequest(contentType: string): boolean {
  return contentType.toLowerCase().includes(FORM_TYPE);
}

/**
 * Terminal clients get plain text instead of the HTML editor.
 * Presentation only; the user agent is client-controlled.
 */
export function isCurlRequest(request: InboundRequest): boolean {
  return header(request.headers, 'user-agent').toLowerCase().includes('curl');
}

export function wantsJson(request: InboundRequest): boolean {
  return header(request.headers, 'accept').toLowerCase().includes(JSON_TYPE);
}

/**
 * Application root URL with a trailing slash, used to build shareable links.
 * Keeps any reverse-proxy subpath in front of `/noteid/`.
 */
export function resolveBaseUrl(request: InboundRequest, publicUrl?: string): string {
  if (publicUrl) {
    return publicUrl.endsWith('/') ? publicUrl : `${publicUrl}/`;
  }

  const forwardedProto = header(request.headers, 'x-forwarded-proto').split(',')[0].trim();
  const scheme = request.encrypted || forwardedProto === 'https' ? 'https' : 'http';
  const host = header(request.headers, 'x-forwarded-host') || header(request.headers, 'host');

  let { path } = splitUrl(request.url);
  const idx = path.indexOf(PATH_MARKER);
  if (idx !== -1) {
    path = path.slice(0, idx);
  }
  if (!path.endsWith('/')) {
    path += '/';
  }
  return `${scheme}://${host}${path}`;
}
