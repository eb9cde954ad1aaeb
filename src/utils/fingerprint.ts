import crypto from 'node:crypto';

import { FINGERPRINT_DELIMITER, FORM_METHODS } from '../constants.js';
import type { LiveRequest } from '../LiveRequest.js';
import type { Fingerprinter, HeaderMap } from '../types.js';

export interface FingerprintOptions {
  /**
   * Header names left out of the digest (case-insensitive), e.g. volatile
   * `user-agent` or `authorization` values
   */
  ignoreHeaders?: string[];
}

/**
 * Accumulates request parts into a SHA-256 digest, with a delimiter between
 * parts so that ("ab", "c") and ("a", "bc") hash differently
 */
export class FingerprintBuilder {
  private readonly hash = crypto.createHash('sha256');
  private first = true;

  add(part: string | Buffer): this {
    if (!this.first) {
      this.hash.update(FINGERPRINT_DELIMITER);
    }
    this.first = false;
    this.hash.update(part);
    return this;
  }

  addInt(value: number): this {
    return this.add(String(Math.trunc(value)));
  }

  digest(): string {
    return this.hash.digest('hex');
  }
}

export function serializeHeaders(
  headers: HeaderMap,
  ignore: readonly string[] = [],
): string {
  const ignored = new Set(ignore.map((name) => name.toLowerCase()));
  const names = Object.keys(headers)
    .filter((name) => !ignored.has(name.toLowerCase()))
    .sort();

  return names
    .map((name) => `${name}:${[...headers[name]].sort().join(',')}`)
    .join(';');
}

export function serializeTransferEncoding(transferEncoding: string[]): string {
  return [...transferEncoding].sort().join(',');
}

export function createFingerprinter(
  options: FingerprintOptions = {},
): Fingerprinter {
  const ignoreHeaders = [...(options.ignoreHeaders ?? [])];

  return async (request: LiveRequest): Promise<string> => {
    const body = await request.bytes();

    if (FORM_METHODS.has(request.method)) {
      await request.parseForm();
    }

    return new FingerprintBuilder()
      .add(request.method)
      .add(request.host)
      .add(request.url.href)
      .add(request.proto)
      .addInt(request.protoMajor)
      .addInt(request.protoMinor)
      .add(serializeHeaders(request.headers, ignoreHeaders))
      .add(body)
      .addInt(request.contentLength)
      .add(serializeHeaders(request.trailer))
      .add(serializeTransferEncoding(request.transferEncoding))
      .add(request.remoteAddr)
      .add(request.requestUri)
      .digest();
  };
}

export const defaultFingerprinter: Fingerprinter = createFingerprinter();
