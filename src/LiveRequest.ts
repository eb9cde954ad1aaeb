import http from 'node:http';
import type { Readable } from 'node:stream';

import { FORM_CONTENT_TYPE, FORM_METHODS } from './constants.js';
import type { FormValues, HeaderMap, RecordedRequest } from './types.js';
import {
  cloneHeaders,
  firstHeader,
  headersFromFetch,
  headersFromRaw,
  parseContentLength,
  parseTransferEncoding,
  readBody,
} from './utils/httpHelpers.js';

export type RequestBody = string | Buffer | Readable | null;

export interface LiveRequestInit {
  method: string;
  url: string | URL;
  proto?: string;
  protoMajor?: number;
  protoMinor?: number;
  headers?: HeaderMap;
  trailer?: HeaderMap;
  transferEncoding?: string[];
  /** Defaults to the body length for in-memory bodies, -1 for streams */
  contentLength?: number;
  /** Defaults to the URL host */
  host?: string;
  remoteAddr?: string;
  requestUri?: string;
  body?: RequestBody;
  signal?: AbortSignal;
}

/**
 * An in-flight HTTP request as seen by the recorder.
 *
 * The body may start out as a stream; the first call to `bytes()` buffers it
 * and keeps the buffer, so fingerprinting, capture and the real transport can
 * all read the full body.
 */
export class LiveRequest {
  readonly method: string;
  readonly url: URL;
  readonly proto: string;
  readonly protoMajor: number;
  readonly protoMinor: number;
  readonly headers: HeaderMap;
  readonly trailer: HeaderMap;
  readonly transferEncoding: string[];
  readonly contentLength: number;
  readonly host: string;
  readonly remoteAddr: string;
  readonly requestUri: string;
  readonly signal: AbortSignal | undefined;
  private body: Buffer | Readable | null;
  private postForm: FormValues | null = null;

  constructor(init: LiveRequestInit) {
    this.method = init.method.toUpperCase();
    this.url = new URL(init.url);
    this.proto = init.proto ?? 'HTTP/1.1';
    this.protoMajor = init.protoMajor ?? 1;
    this.protoMinor = init.protoMinor ?? 1;
    this.headers = lowerCaseNames(init.headers ?? {});
    this.trailer = lowerCaseNames(init.trailer ?? {});
    this.transferEncoding = [...(init.transferEncoding ?? [])];
    this.host = init.host ?? this.url.host;
    this.remoteAddr = init.remoteAddr ?? '';
    this.requestUri = init.requestUri ?? '';
    this.signal = init.signal;
    this.body =
      typeof init.body === 'string'
        ? Buffer.from(init.body, 'utf8')
        : (init.body ?? null);
    this.contentLength = init.contentLength ?? defaultContentLength(this.body);
  }

  /**
   * Read the whole body, replacing a stream body with the buffered bytes
   */
  async bytes(): Promise<Buffer> {
    if (this.body === null) {
      return Buffer.alloc(0);
    }
    if (Buffer.isBuffer(this.body)) {
      return this.body;
    }
    const buffered = await readBody(this.body);
    this.body = buffered;
    return buffered;
  }

  async text(): Promise<string> {
    const body = await this.bytes();
    return body.toString('utf8');
  }

  /**
   * Parse url-encoded form fields from the body. Only POST, PUT and PATCH
   * requests with a form content type have any.
   */
  async parseForm(): Promise<FormValues> {
    if (this.postForm) {
      return this.postForm;
    }
    const form: FormValues = {};
    const contentType = firstHeader(this.headers, 'content-type') ?? '';
    if (
      FORM_METHODS.has(this.method) &&
      contentType.toLowerCase().startsWith(FORM_CONTENT_TYPE)
    ) {
      const params = new URLSearchParams(await this.text());
      for (const [key, value] of params) {
        (form[key] ??= []).push(value);
      }
    }
    this.postForm = form;
    return form;
  }

  /**
   * Form fields parsed so far, or null when parseForm() has not run yet
   */
  get form(): FormValues | null {
    return this.postForm;
  }

  async snapshot(): Promise<RecordedRequest> {
    return {
      proto: this.proto,
      protoMajor: this.protoMajor,
      protoMinor: this.protoMinor,
      contentLength: this.contentLength,
      transferEncoding: [...this.transferEncoding],
      trailer: cloneHeaders(this.trailer),
      host: this.host,
      remoteAddr: this.remoteAddr,
      requestUri: this.requestUri,
      body: Buffer.from(await this.bytes()),
      form: { ...(await this.parseForm()) },
      headers: cloneHeaders(this.headers),
      url: this.url.href,
      method: this.method,
    };
  }

  static fromRecorded(request: RecordedRequest): LiveRequest {
    return new LiveRequest({
      method: request.method,
      url: request.url,
      proto: request.proto,
      protoMajor: request.protoMajor,
      protoMinor: request.protoMinor,
      headers: request.headers,
      trailer: request.trailer,
      transferEncoding: request.transferEncoding,
      contentLength: request.contentLength,
      host: request.host,
      remoteAddr: request.remoteAddr,
      requestUri: request.requestUri,
      body: request.body,
    });
  }

  static async fromFetchRequest(request: Request): Promise<LiveRequest> {
    const body = Buffer.from(await request.arrayBuffer());
    return new LiveRequest({
      method: request.method,
      url: request.url,
      headers: headersFromFetch(request.headers),
      body,
      signal: request.signal,
    });
  }

  /**
   * Build a request from a server-side message whose body was already read
   */
  static fromIncomingMessage(
    req: http.IncomingMessage,
    body: Buffer,
  ): LiveRequest {
    const headers = headersFromRaw(req.rawHeaders);
    const requestUri = req.url ?? '/';
    const host = firstHeader(headers, 'host') ?? 'localhost';
    const { remoteAddress, remotePort } = req.socket;

    return new LiveRequest({
      method: req.method ?? 'GET',
      url: new URL(requestUri, `http://${host}`),
      proto: `HTTP/${req.httpVersion}`,
      protoMajor: req.httpVersionMajor,
      protoMinor: req.httpVersionMinor,
      headers,
      trailer: headersFromRaw(req.rawTrailers),
      transferEncoding: parseTransferEncoding(headers),
      contentLength: parseContentLength(headers),
      host,
      remoteAddr: remoteAddress ? `${remoteAddress}:${remotePort ?? 0}` : '',
      requestUri,
      body,
    });
  }
}

function defaultContentLength(body: Buffer | Readable | null): number {
  if (body === null) {
    return 0;
  }
  return Buffer.isBuffer(body) ? body.length : -1;
}

function lowerCaseNames(headers: HeaderMap): HeaderMap {
  const result: HeaderMap = {};
  for (const [name, values] of Object.entries(headers)) {
    (result[name.toLowerCase()] ??= []).push(...values);
  }
  return result;
}
