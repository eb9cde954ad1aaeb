import http from 'node:http';
import type { AddressInfo } from 'node:net';

import { Cassette, type CassetteOptions } from '../Cassette.js';
import type { HeaderMap, Interaction } from '../types.js';
import {
  headersFromRaw,
  readBody,
  toOutgoingHeaders,
} from '../utils/httpHelpers.js';

// Set per connection by the client, never part of what the handler decides
const HOP_BY_HOP_HEADERS = new Set([
  'host',
  'connection',
  'content-length',
  'transfer-encoding',
  'keep-alive',
]);

// Response headers whose value legitimately changes between runs
const DEFAULT_IGNORED_RESPONSE_HEADERS = ['date'];

export interface ReplayMismatch {
  id: number;
  method: string;
  url: string;
  field: 'code' | 'body' | `header:${string}`;
  expected: string;
  actual: string;
}

export interface VerifyOptions extends CassetteOptions {
  /** Response header names left out of the comparison, in addition to `date` */
  ignoreResponseHeaders?: string[];
}

interface ServedResponse {
  code: number;
  body: Buffer;
  headers: HeaderMap;
}

function listen(server: http.Server): Promise<AddressInfo> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('server did not bind to a TCP port'));
        return;
      }
      resolve(address);
    });
  });
}

function close(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

function requestPath(interaction: Interaction): string {
  if (interaction.request.requestUri !== '') {
    return interaction.request.requestUri;
  }
  const url = new URL(interaction.request.url);
  return `${url.pathname}${url.search}`;
}

function forwardedHeaders(headers: HeaderMap): HeaderMap {
  const result: HeaderMap = {};
  for (const [name, values] of Object.entries(headers)) {
    if (!HOP_BY_HOP_HEADERS.has(name)) {
      result[name] = values;
    }
  }
  return result;
}

function sendRecorded(
  address: AddressInfo,
  interaction: Interaction,
): Promise<ServedResponse> {
  return new Promise((resolve, reject) => {
    const request = http.request(
      {
        host: address.address,
        port: address.port,
        method: interaction.request.method,
        path: requestPath(interaction),
        headers: toOutgoingHeaders(forwardedHeaders(interaction.request.headers)),
      },
      (response) => {
        readBody(response).then(
          (body) =>
            resolve({
              code: response.statusCode ?? 0,
              body,
              headers: headersFromRaw(response.rawHeaders),
            }),
          reject,
        );
      },
    );
    request.on('error', reject);
    request.end(interaction.request.body);
  });
}

function compare(
  interaction: Interaction,
  actual: ServedResponse,
  ignored: ReadonlySet<string>,
): ReplayMismatch[] {
  const mismatches: ReplayMismatch[] = [];
  const base = {
    id: interaction.id,
    method: interaction.request.method,
    url: interaction.request.url,
  };
  const expected = interaction.response;

  if (expected.code !== actual.code) {
    mismatches.push({
      ...base,
      field: 'code',
      expected: String(expected.code),
      actual: String(actual.code),
    });
  }
  if (!expected.body.equals(actual.body)) {
    mismatches.push({
      ...base,
      field: 'body',
      expected: expected.body.toString('utf8'),
      actual: actual.body.toString('utf8'),
    });
  }

  for (const [name, values] of Object.entries(expected.headers)) {
    if (ignored.has(name) || HOP_BY_HOP_HEADERS.has(name)) {
      continue;
    }
    const expectedValue = values.join(', ');
    const actualValue = (actual.headers[name] ?? []).join(', ');
    if (expectedValue !== actualValue) {
      mismatches.push({
        ...base,
        field: `header:${name}`,
        expected: expectedValue,
        actual: actualValue,
      });
    }
  }

  return mismatches;
}

/**
 * Serve `handler` on an ephemeral local port, send it every request recorded
 * in a cassette and report where its responses differ from the recorded ones
 * @returns An empty list when every response matches
 */
export async function verifyHandlerAgainstCassette(
  cassetteName: string,
  handler: http.RequestListener,
  options: VerifyOptions = {},
): Promise<ReplayMismatch[]> {
  const cassette = await Cassette.load(cassetteName, options);
  const ignored = new Set(
    [...DEFAULT_IGNORED_RESPONSE_HEADERS, ...(options.ignoreResponseHeaders ?? [])].map(
      (name) => name.toLowerCase(),
    ),
  );

  const server = http.createServer(handler);
  const address = await listen(server);
  const mismatches: ReplayMismatch[] = [];

  try {
    for (const interaction of cassette.interactions) {
      const actual = await sendRecorded(address, interaction);
      mismatches.push(...compare(interaction, actual, ignored));
    }
  } finally {
    await close(server);
  }

  return mismatches;
}
