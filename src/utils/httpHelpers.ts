import http from 'node:http';
import type { Readable } from 'node:stream';

import type { HeaderMap } from '../types.js';

export async function readBody(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks);
}

/**
 * Build a header map from Node's flat [name, value, name, value] list,
 * keeping repeated headers as separate values
 */
export function headersFromRaw(rawHeaders: string[]): HeaderMap {
  const headers: HeaderMap = {};
  for (let i = 0; i + 1 < rawHeaders.length; i += 2) {
    appendHeader(headers, rawHeaders[i], rawHeaders[i + 1]);
  }
  return headers;
}

export function headersFromFetch(source: Headers): HeaderMap {
  const headers: HeaderMap = {};
  source.forEach((value, name) => {
    if (name === 'set-cookie') {
      return;
    }
    appendHeader(headers, name, value);
  });
  for (const cookie of source.getSetCookie()) {
    appendHeader(headers, 'set-cookie', cookie);
  }
  return headers;
}

export function headersFromOutgoing(
  source: http.OutgoingHttpHeaders,
): HeaderMap {
  const headers: HeaderMap = {};
  for (const [name, value] of Object.entries(source)) {
    if (value === undefined) {
      continue;
    }
    const values = Array.isArray(value) ? value : [String(value)];
    for (const item of values) {
      appendHeader(headers, name, item);
    }
  }
  return headers;
}

export function toOutgoingHeaders(headers: HeaderMap): http.OutgoingHttpHeaders {
  const outgoing: http.OutgoingHttpHeaders = {};
  for (const [name, values] of Object.entries(headers)) {
    outgoing[name] = values.length === 1 ? values[0] : [...values];
  }
  return outgoing;
}

export function toFetchHeaders(headers: HeaderMap): Headers {
  const result = new Headers();
  for (const [name, values] of Object.entries(headers)) {
    for (const value of values) {
      result.append(name, value);
    }
  }
  return result;
}

export function firstHeader(
  headers: HeaderMap,
  name: string,
): string | undefined {
  return headers[name.toLowerCase()]?.[0];
}

export function parseContentLength(headers: HeaderMap): number {
  const value = firstHeader(headers, 'content-length');
  if (value === undefined) {
    return -1;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : -1;
}

export function parseTransferEncoding(headers: HeaderMap): string[] {
  const values = headers['transfer-encoding'] ?? [];
  return values
    .flatMap((value) => value.split(','))
    .map((value) => value.trim().toLowerCase())
    .filter((value) => value.length > 0);
}

export function cloneHeaders(headers: HeaderMap): HeaderMap {
  const copy: HeaderMap = {};
  for (const [name, values] of Object.entries(headers)) {
    copy[name] = [...values];
  }
  return copy;
}

function appendHeader(headers: HeaderMap, name: string, value: string): void {
  const key = name.toLowerCase();
  const existing = headers[key];
  if (existing) {
    existing.push(value);
  } else {
    headers[key] = [value];
  }
}
