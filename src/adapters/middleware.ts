import http from 'node:http';

import { LiveRequest } from '../LiveRequest.js';
import type { TransportResponse } from '../types.js';
import {
  headersFromOutgoing,
  parseContentLength,
  parseTransferEncoding,
} from '../utils/httpHelpers.js';

export interface CapturedExchange {
  request: LiveRequest;
  response: TransportResponse;
  /** Milliseconds from the request reaching the middleware to the response finishing */
  duration: number;
}

function toBuffer(chunk: unknown, encoding: unknown): Buffer | null {
  if (Buffer.isBuffer(chunk)) {
    return chunk;
  }
  if (chunk instanceof Uint8Array) {
    return Buffer.from(chunk);
  }
  if (typeof chunk === 'string') {
    return Buffer.from(
      chunk,
      typeof encoding === 'string' && Buffer.isEncoding(encoding)
        ? encoding
        : 'utf8',
    );
  }
  return null;
}

function tapWrites(res: http.ServerResponse, chunks: Buffer[]): void {
  const collect = (args: unknown[]): void => {
    const chunk = toBuffer(args[0], args[1]);
    if (chunk) {
      chunks.push(chunk);
    }
  };

  res.write = new Proxy(res.write, {
    apply(target, thisArg, args: unknown[]) {
      collect(args);
      return Reflect.apply(target, thisArg, args);
    },
  });
  res.end = new Proxy(res.end, {
    apply(target, thisArg, args: unknown[]) {
      collect(args);
      return Reflect.apply(target, thisArg, args);
    },
  });
}

// Collects body chunks as they enter the stream's buffer, whenever the
// handler gets round to reading them
function tapPushes(req: http.IncomingMessage, chunks: Buffer[]): void {
  req.push = new Proxy(req.push, {
    apply(target, thisArg, args: unknown[]) {
      const chunk = toBuffer(args[0], args[1]);
      if (chunk) {
        chunks.push(chunk);
      }
      return Reflect.apply(target, thisArg, args);
    },
  });
}

function onceFinished(emitter: NodeJS.EventEmitter, events: string[]): Promise<void> {
  return new Promise((resolve) => {
    const done = (): void => {
      for (const event of events) {
        emitter.off(event, done);
      }
      resolve();
    };
    for (const event of events) {
      emitter.on(event, done);
    }
  });
}

/**
 * Wrap a request listener so every exchange it serves is captured. The
 * handler sees the request and response unchanged; the capture is handed to
 * `onCapture` as a promise that settles once the response has finished.
 *
 * The request body is tapped where it enters the stream, so the handler may
 * start reading it at any time, or never.
 */
export function createCaptureMiddleware(
  handler: http.RequestListener,
  onCapture: (exchange: Promise<CapturedExchange>) => void,
): http.RequestListener {
  return (req, res) => {
    const started = performance.now();
    const requestChunks: Buffer[] = [];
    const responseChunks: Buffer[] = [];

    tapPushes(req, requestChunks);
    tapWrites(res, responseChunks);

    const requestDone = req.complete
      ? Promise.resolve()
      : onceFinished(req, ['end', 'close']);
    const responseDone = onceFinished(res, ['finish', 'close']);

    onCapture(
      Promise.all([requestDone, responseDone]).then(() => {
        const headers = headersFromOutgoing(res.getHeaders());
        const response: TransportResponse = {
          proto: `HTTP/${req.httpVersion}`,
          protoMajor: req.httpVersionMajor,
          protoMinor: req.httpVersionMinor,
          transferEncoding: parseTransferEncoding(headers),
          trailer: {},
          contentLength: parseContentLength(headers),
          uncompressed: false,
          body: Buffer.concat(responseChunks),
          headers,
          status: `${res.statusCode} ${res.statusMessage}`.trim(),
          code: res.statusCode,
        };
        return {
          request: LiveRequest.fromIncomingMessage(req, Buffer.concat(requestChunks)),
          response,
          duration: performance.now() - started,
        };
      }),
    );

    handler(req, res);
  };
}
