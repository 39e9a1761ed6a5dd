import { isUtf8 } from 'node:buffer';

import type {
  APIGatewayProxyEvent,
  APIGatewayProxyEventV2,
} from 'aws-lambda';
import type { HTTPMethods, InjectOptions, LightMyRequestResponse } from 'fastify';

/**
 * Mapping between API Gateway event envelopes and plain HTTP requests/responses.
 * Pure field mapping; the Fastify routes do all the work.
 */

export type GatewayEventKind = 'v1' | 'v2' | 'test' | 'unsupported';

/**
 * Response shape accepted by both REST API (v1) and HTTP API (v2) integrations.
 */
export interface GatewayResult {
  statusCode: number;
  headers: Record<string, string>;
  body: string;
  isBase64Encoded: boolean;
}

const METHODS = ['GET', 'HEAD', 'POST', 'PUT', 'DELETE', 'PATCH', 'OPTIONS'] as const satisfies readonly HTTPMethods[];
type GatewayMethod = (typeof METHODS)[number];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * HTTP API payload format 2.0: carries requestContext.http.method.
 */
export function isV2Event(event: unknown): event is APIGatewayProxyEventV2 {
  if (!isRecord(event) || !isRecord(event.requestContext)) {
    return false;
  }
  const http = event.requestContext.http;
  return isRecord(http) && typeof http.method === 'string' && http.method !== '';
}

/**
 * REST API / payload format 1.0: carries httpMethod.
 */
export function isV1Event(event: unknown): event is APIGatewayProxyEvent {
  return isRecord(event) && typeof event.httpMethod === 'string' && event.httpMethod !== '';
}

/**
 * Anything the Lambda console test button sends: a plain object with none of the gateway fields.
 */
export function isConsoleTestEvent(event: unknown): boolean {
  return (
    isRecord(event) &&
    Object.keys(event).length > 0 &&
    !('requestContext' in event) &&
    !('httpMethod' in event) &&
    !('rawPath' in event)
  );
}

export function detectGatewayEvent(event: unknown): GatewayEventKind {
  if (isV2Event(event)) return 'v2';
  if (isV1Event(event)) return 'v1';
  if (isConsoleTestEvent(event)) return 'test';
  return 'unsupported';
}

export function toGatewayMethod(raw: string): GatewayMethod | undefined {
  const upper = raw.toUpperCase();
  return METHODS.find((method) => method === upper);
}

function decodeBody(body: string | null | undefined, isBase64Encoded: boolean): Buffer {
  if (!body) {
    return Buffer.alloc(0);
  }
  return isBase64Encoded ? Buffer.from(body, 'base64') : Buffer.from(body, 'utf-8');
}

function lowerCaseHeaders(
  headers: Record<string, string | undefined> | null | undefined
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers ?? {})) {
    if (value !== undefined) {
      result[name.toLowerCase()] = value;
    }
  }
  return result;
}

export function fromV2Event(event: APIGatewayProxyEventV2, method: GatewayMethod): InjectOptions {
  const path = event.rawPath || '/';
  const headers = lowerCaseHeaders(event.headers);
  if (event.cookies && event.cookies.length > 0) {
    headers.cookie = event.cookies.join('; ');
  }
  return {
    method,
    url: event.rawQueryString ? `${path}?${event.rawQueryString}` : path,
    headers,
    payload: decodeBody(event.body, event.isBase64Encoded),
    remoteAddress: event.requestContext.http.sourceIp || undefined,
  };
}

export function fromV1Event(event: APIGatewayProxyEvent, method: GatewayMethod): InjectOptions {
  const query = new URLSearchParams();
  if (event.multiValueQueryStringParameters) {
    for (const [name, values] of Object.entries(event.multiValueQueryStringParameters)) {
      for (const value of values ?? []) {
        query.append(name, value);
      }
    }
  } else if (event.queryStringParameters) {
    for (const [name, value] of Object.entries(event.queryStringParameters)) {
      if (value !== undefined) {
        query.append(name, value);
      }
    }
  }

  const path = event.path || '/';
  const search = query.toString();
  return {
    method,
    url: search ? `${path}?${search}` : path,
    headers: lowerCaseHeaders(event.headers),
    payload: decodeBody(event.body, event.isBase64Encoded),
    remoteAddress: event.requestContext?.identity?.sourceIp || undefined,
  };
}

/**
 * What a console test invocation turns into: the new-note page.
 */
export function consoleTestRequest(): InjectOptions {
  return {
    method: 'GET',
    url: '/',
    headers: { 'user-agent': 'AWS-Lambda-Test' },
    remoteAddress: '127.0.0.1',
  };
}

/**
 * Images and bodies that are not valid UTF-8 (binary notes) travel base64-encoded.
 */
export function toGatewayResult(response: LightMyRequestResponse): GatewayResult {
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(response.headers)) {
    if (value === undefined) continue;
    headers[name] = Array.isArray(value) ? value.join(', ') : String(value);
  }

  const contentType = headers['content-type'] ?? '';
  const binary = contentType.startsWith('image/') || !isUtf8(response.rawPayload);
  return {
    statusCode: response.statusCode,
    headers,
    body: binary ? response.rawPayload.toString('base64') : response.body,
    isBase64Encoded: binary,
  };
}

export function errorResult(statusCode: number, error: string): GatewayResult {
  return {
    statusCode,
    headers: { 'content-type': 'application/json; charset=utf-8' },
    body: JSON.stringify({ success: false, error }),
    isBase64Encoded: false,
  };
}
