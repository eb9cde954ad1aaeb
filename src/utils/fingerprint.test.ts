import { Readable } from 'node:stream';

import { describe, expect, it } from 'vitest';

import { LiveRequest } from '../LiveRequest.js';
import {
  createFingerprinter,
  defaultFingerprinter,
  FingerprintBuilder,
  serializeHeaders,
} from './fingerprint.js';

describe('fingerprint', () => {
  describe('serializeHeaders', () => {
    it('should sort names and values and drop ignored names', () => {
      const result = serializeHeaders(
        {
          'x-b': ['2', '1'],
          accept: ['text/plain'],
          'user-agent': ['test-agent'],
        },
        ['User-Agent'],
      );

      expect(result).toBe('accept:text/plain;x-b:1,2');
    });

    it('should return an empty string for no headers', () => {
      expect(serializeHeaders({})).toBe('');
    });
  });

  describe('FingerprintBuilder', () => {
    it('should separate parts so shifted boundaries hash differently', () => {
      const first = new FingerprintBuilder().add('ab').add('c').digest();
      const second = new FingerprintBuilder().add('a').add('bc').digest();

      expect(first).toBe(
        'c36613ea131f4fb891cce688511377bff258b61d90ca78841141aeb2743449e5',
      );
      expect(second).not.toBe(first);
    });
  });

  describe('defaultFingerprinter', () => {
    it('should hash the documented field sequence', async () => {
      const request = new LiveRequest({
        method: 'get',
        url: 'http://example.test/a?b=1',
        headers: { 'X-B': ['2', '1'], Accept: ['text/plain'] },
      });

      expect(await defaultFingerprinter(request)).toBe(
        '3ec2a789c9f1d717b2adc14487a261146416851ff918d3b35ccbb81baaec0239',
      );
    });

    it('should be deterministic and ignore header order', async () => {
      const first = new LiveRequest({
        method: 'GET',
        url: 'http://example.test/items',
        headers: { accept: ['*/*'], 'x-one': ['1'] },
      });
      const second = new LiveRequest({
        method: 'GET',
        url: 'http://example.test/items',
        headers: { 'x-one': ['1'], accept: ['*/*'] },
      });

      const hash = await defaultFingerprinter(first);
      expect(hash).toMatch(/^[\da-f]{64}$/);
      expect(await defaultFingerprinter(first)).toBe(hash);
      expect(await defaultFingerprinter(second)).toBe(hash);
    });

    it('should distinguish query strings, methods and bodies', async () => {
      const base = await defaultFingerprinter(
        new LiveRequest({ method: 'POST', url: 'http://example.test/p?x=1', body: 'a' }),
      );

      const otherQuery = await defaultFingerprinter(
        new LiveRequest({ method: 'POST', url: 'http://example.test/p?x=2', body: 'a' }),
      );
      const otherMethod = await defaultFingerprinter(
        new LiveRequest({ method: 'PUT', url: 'http://example.test/p?x=1', body: 'a' }),
      );
      const otherBody = await defaultFingerprinter(
        new LiveRequest({ method: 'POST', url: 'http://example.test/p?x=1', body: 'b' }),
      );

      expect(new Set([base, otherQuery, otherMethod, otherBody]).size).toBe(4);
    });

    it('should read a stream body without consuming it', async () => {
      const request = new LiveRequest({
        method: 'POST',
        url: 'http://example.test/upload',
        body: Readable.from([Buffer.from('hello '), Buffer.from('world')]),
        contentLength: 11,
      });
      const sameBody = new LiveRequest({
        method: 'POST',
        url: 'http://example.test/upload',
        body: 'hello world',
      });

      const hash = await defaultFingerprinter(request);

      expect(await request.text()).toBe('hello world');
      expect(hash).toBe(await defaultFingerprinter(sameBody));
    });

    it('should parse the form of url-encoded POST requests', async () => {
      const request = new LiveRequest({
        method: 'POST',
        url: 'http://example.test/form',
        headers: { 'content-type': ['application/x-www-form-urlencoded'] },
        body: 'name=alice&tag=a&tag=b',
      });

      await defaultFingerprinter(request);

      expect(request.form).toEqual({ name: ['alice'], tag: ['a', 'b'] });
    });
  });

  describe('createFingerprinter', () => {
    it('should ignore configured headers case-insensitively', async () => {
      const fingerprinter = createFingerprinter({ ignoreHeaders: ['User-Agent'] });
      const first = new LiveRequest({
        method: 'GET',
        url: 'http://example.test/',
        headers: { 'user-agent': ['agent-one'] },
      });
      const second = new LiveRequest({
        method: 'GET',
        url: 'http://example.test/',
        headers: { 'User-Agent': ['agent-two'] },
      });

      expect(await fingerprinter(first)).toBe(await fingerprinter(second));
      expect(await defaultFingerprinter(first)).not.toBe(
        await defaultFingerprinter(second),
      );
    });
  });
});
