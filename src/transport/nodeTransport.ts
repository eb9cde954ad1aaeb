import http from 'node:http';
import https from 'node:https';
import { promisify } from 'node:util';
import zlib from 'node:zlib';

import type { LiveRequest } from '../LiveRequest.js';
import type { HeaderMap, RealTransport, TransportResponse } from '../types.js';
import {
  firstHeader,
  headersFromRaw,
  parseContentLength,
  parseTransferEncoding,
  readBody,
  toOutgoingHeaders,
} from '../utils/httpHelpers.js';

const decoders: Record<string, (data: Buffer) => Promise<Buffer>> = {
  gzip: promisify(zlib.gunzip),
  'x-gzip': promisify(zlib.gunzip),
  deflate: promisify(zlib.inflate),
  br: promisify(zlib.brotliDecompress),
};

async function decodeBody(
  body: Buffer,
  headers: HeaderMap,
): Promise<{ body: Buffer; decoded: boolean }> {
  const encoding = firstHeader(headers, 'content-encoding')?.trim().toLowerCase();
  const decode = encoding ? decoders[encoding] : undefined;
  if (!decode || body.length === 0) {
    return { body, decoded: false };
  }
  return { body: await decode(body), decoded: true };
}

function send(request: LiveRequest, body: Buffer): Promise<http.IncomingMessage> {
  const options: http.RequestOptions = {
    method: request.method,
    headers: toOutgoingHeaders(request.headers),
    signal: request.signal,
  };

  return new Promise((resolve, reject) => {
    const outgoing =
      request.url.protocol === 'https:'
        ? https.request(request.url, options)
        : http.request(request.url, options);
    outgoing.on('response', resolve);
    outgoing.on('error', reject);
    outgoing.end(body);
  });
}

/**
 * Default real transport: performs the request with node:http or node:https
 * and buffers the whole response. Compressed bodies are stored decoded.
 */
export const nodeTransport: RealTransport = async (request) => {
  const response = await send(request, await request.bytes());
  const raw = await readBody(response);
  const headers = headersFromRaw(response.rawHeaders);
  const { body, decoded } = await decodeBody(raw, headers);

  if (decoded) {
    delete headers['content-encoding'];
    delete headers['content-length'];
  }

  const code = response.statusCode ?? 0;
  const result: TransportResponse = {
    proto: `HTTP/${response.httpVersion}`,
    protoMajor: response.httpVersionMajor,
    protoMinor: response.httpVersionMinor,
    transferEncoding: parseTransferEncoding(headers),
    trailer: headersFromRaw(response.rawTrailers),
    contentLength: decoded ? -1 : parseContentLength(headers),
    uncompressed: decoded,
    body,
    headers,
    status: `${code} ${response.statusMessage ?? ''}`.trim(),
    code,
  };
  return result;
};
