import http from 'node:http';
import zlib from 'node:zlib';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { LiveRequest } from '../LiveRequest.js';
import { closeServer, listenLocally } from '../test/localServer.js';
import { nodeTransport } from './nodeTransport.js';

describe('nodeTransport', () => {
  let server: http.Server;
  let baseUrl: string;

  beforeEach(async () => {
    server = http.createServer((req, res) => {
      const chunks: Buffer[] = [];
      req.on('data', (chunk: Buffer) => chunks.push(chunk));
      req.on('end', () => {
        const body = Buffer.concat(chunks).toString('utf8');

        if (req.url === '/gzip') {
          const packed = zlib.gzipSync('compressed payload');
          res.writeHead(200, {
            'Content-Type': 'text/plain',
            'Content-Encoding': 'gzip',
            'Content-Length': packed.length,
          });
          res.end(packed);
          return;
        }

        if (req.url === '/slow') {
          setTimeout(() => res.end('late'), 500);
          return;
        }

        res.setHeader('Set-Cookie', ['a=1', 'b=2']);
        res.setHeader('X-Method', req.method ?? '');
        res.setHeader('X-Auth', req.headers['x-auth'] ?? '');
        res.writeHead(202, 'Accepted Later', { 'Content-Length': Buffer.byteLength(body) });
        res.end(body);
      });
    });
    baseUrl = await listenLocally(server);
  });

  afterEach(async () => {
    await closeServer(server);
  });

  it('should send method, headers and body and buffer the response', async () => {
    const response = await nodeTransport(
      new LiveRequest({
        method: 'PUT',
        url: `${baseUrl}/items/1`,
        headers: { 'x-auth': ['test-secret'] },
        body: 'payload',
      }),
    );

    expect(response.code).toBe(202);
    expect(response.status).toBe('202 Accepted Later');
    expect(response.proto).toBe('HTTP/1.1');
    expect(response.body.toString()).toBe('payload');
    expect(response.contentLength).toBe(7);
    expect(response.uncompressed).toBe(false);
    expect(response.headers['set-cookie']).toEqual(['a=1', 'b=2']);
    expect(response.headers['x-method']).toEqual(['PUT']);
    expect(response.headers['x-auth']).toEqual(['test-secret']);
  });

  it('should decode compressed bodies and drop the encoding headers', async () => {
    const response = await nodeTransport(
      new LiveRequest({ method: 'GET', url: `${baseUrl}/gzip` }),
    );

    expect(response.body.toString()).toBe('compressed payload');
    expect(response.uncompressed).toBe(true);
    expect(response.contentLength).toBe(-1);
    expect(response.headers['content-encoding']).toBeUndefined();
    expect(response.headers['content-length']).toBeUndefined();
    expect(response.headers['content-type']).toEqual(['text/plain']);
  });

  it('should abort when the request signal fires', async () => {
    const controller = new AbortController();
    const pending = nodeTransport(
      new LiveRequest({
        method: 'GET',
        url: `${baseUrl}/slow`,
        signal: controller.signal,
      }),
    );
    setTimeout(() => controller.abort(), 20);

    await expect(pending).rejects.toThrow();
  });
});
