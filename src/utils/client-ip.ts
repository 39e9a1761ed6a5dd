import type { IncomingHttpHeaders } from 'node:http';

function headerValue(headers: IncomingHttpHeaders, name: string): string {
  const value = headers[name];
  if (Array.isArray(value)) {
    return value[0] ?? '';
  }
  return value ?? '';
}

/**
 * Strip quotes, IPv6 brackets and a trailing port from an address token.
 * "[2001:db8::1]:4711" -> "2001:db8::1", "203.0.113.7:80" -> "203.0.113.7".
 */
export function stripHostPort(raw: string): string {
  const value = raw.trim().replace(/^"+|"+$/g, '');
  if (value.startsWith('[')) {
    const close = value.indexOf(']');
    return close === -1 ? value.slice(1) : value.slice(1, close);
  }
  const firstColon = value.indexOf(':');
  // Exactly one colon means host:port; more than one is a bare IPv6 address
  if (firstColon !== -1 && firstColon === value.lastIndexOf(':')) {
    return value.slice(0, firstColon);
  }
  return value;
}

function forwardedFor(header: string): string | undefined {
  // Forwarded: for=203.0.113.60;proto=https;by=203.0.113.43
  for (const element of header.split(',')[0].split(';')) {
    const pair = element.trim();
    if (pair.toLowerCase().startsWith('for=')) {
      return pair.slice(4);
    }
  }
  return undefined;
}

/**
 * Best-effort client address for logging when running behind proxies.
 * Preference: Forwarded for=, first X-Forwarded-For entry, X-Real-IP, socket peer.
 * Never use the result for authorization; every header here is client-controlled.
 */
export function resolveClientIp(headers: IncomingHttpHeaders, remoteAddress?: string): string {
  const forwarded = headerValue(headers, 'forwarded');
  if (forwarded) {
    const candidate = forwardedFor(forwarded);
    if (candidate) {
      return stripHostPort(candidate);
    }
  }

  const xff = headerValue(headers, 'x-forwarded-for');
  if (xff.trim()) {
    return stripHostPort(xff.split(',')[0]);
  }

  const realIp = headerValue(headers, 'x-real-ip').trim();
  if (realIp) {
    return stripHostPort(realIp);
  }

  return remoteAddress ? stripHostPort(remoteAddress) : '';
}

export function isLoopback(ip: string): boolean {
  return ip === '127.0.0.1' || ip === '::1' || ip === '::ffff:127.0.0.1';
}
