import type { CapturedRequest } from '../types/index.js';
import { RequestSerializationError } from './errors.js';

// RFC 9110 token characters
const TOKEN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;
const HTTP_VERSION = /^\d\.\d$/;
const FORBIDDEN_VALUE_CHARS = /[\r\n\0]/;

// Hop-by-hop framing headers that do not describe the request itself
const EXCLUDED_HEADERS = new Set(['host', 'transfer-encoding', 'trailer']);

/** `content-type` -> `Content-Type` */
export function canonicalHeaderName(name: string): string {
  return name
    .toLowerCase()
    .split('-')
    .map((part) => (part ? part[0].toUpperCase() + part.slice(1) : part))
    .join('-');
}

function headerValues(value: string | string[] | undefined): string[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

function assertValue(name: string, value: string): void {
  if (FORBIDDEN_VALUE_CHARS.test(value)) {
    throw new RequestSerializationError(`header ${name} contains a line break or NUL`);
  }
}

/**
 * Render a captured request as HTTP/1.x wire text: request line, Host, the
 * remaining headers sorted by name, a blank line and the body.
 */
export function serializeRequest(request: CapturedRequest): string {
  const version = request.httpVersion ?? '1.1';

  if (!TOKEN.test(request.method)) {
    throw new RequestSerializationError(`invalid method "${request.method}"`);
  }
  if (!request.url || /\s/.test(request.url)) {
    throw new RequestSerializationError(`invalid request target "${request.url}"`);
  }
  if (!HTTP_VERSION.test(version)) {
    throw new RequestSerializationError(`invalid HTTP version "${version}"`);
  }

  const lines = [`${request.method} ${request.url} HTTP/${version}`];
  const fields: Array<[string, string]> = [];
  let host: string | undefined;

  for (const [name, value] of Object.entries(request.headers)) {
    if (!TOKEN.test(name)) {
      throw new RequestSerializationError(`invalid header name "${name}"`);
    }
    const values = headerValues(value);
    values.forEach((v) => assertValue(name, v));

    const lower = name.toLowerCase();
    if (lower === 'host') {
      host = values[0];
      continue;
    }
    if (EXCLUDED_HEADERS.has(lower)) continue;

    const canonical = canonicalHeaderName(name);
    for (const v of values) {
      fields.push([canonical, v]);
    }
  }

  if (host) {
    lines.push(`Host: ${host}`);
  }
  // Stable sort keeps repeated headers in arrival order
  fields.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  for (const [name, value] of fields) {
    lines.push(`${name}: ${value}`);
  }

  const body = request.body === undefined ? '' : typeof request.body === 'string' ? request.body : request.body.toString('utf8');

  return `${lines.join('\r\n')}\r\n\r\n${body}`;
}
