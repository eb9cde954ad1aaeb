import { isUtf8 } from 'node:buffer';

import { parse, stringify } from 'yaml';
import { z } from 'zod';

import { CASSETTE_FORMAT_VERSION } from '../constants.js';
import { UnsupportedFormatError } from '../errors.js';
import type {
  Interaction,
  RecordedRequest,
  RecordedResponse,
} from '../types.js';

const headerMapSchema = z.record(z.array(z.string()));

// Text bodies are plain strings; anything else is a `!!binary` scalar
const bodySchema = z
  .union([z.string(), z.instanceof(Uint8Array)])
  .transform((value) =>
    typeof value === 'string' ? Buffer.from(value, 'utf8') : Buffer.from(value),
  );

function encodeBody(body: Buffer): string | Buffer {
  return isUtf8(body) ? body.toString('utf8') : body;
}

const requestSchema = z.object({
  proto: z.string(),
  proto_major: z.number().int(),
  proto_minor: z.number().int(),
  content_length: z.number().int(),
  transfer_encoding: z.array(z.string()).default([]),
  trailer: headerMapSchema.default({}),
  host: z.string(),
  remote_addr: z.string().default(''),
  request_uri: z.string().default(''),
  body: bodySchema.default(''),
  form: headerMapSchema.default({}),
  headers: headerMapSchema.default({}),
  url: z.string(),
  method: z.string(),
});

const responseSchema = z.object({
  proto: z.string(),
  proto_major: z.number().int(),
  proto_minor: z.number().int(),
  transfer_encoding: z.array(z.string()).default([]),
  trailer: headerMapSchema.default({}),
  content_length: z.number().int(),
  uncompressed: z.boolean().default(false),
  body: bodySchema,
  headers: headerMapSchema.default({}),
  status: z.string(),
  code: z.number().int(),
  duration: z.number().default(0),
});

const interactionSchema = z.object({
  id: z.number().int().nonnegative(),
  // Legacy cassettes carry no precomputed fingerprint
  hash: z.string().default(''),
  request: requestSchema,
  response: responseSchema,
});

const cassetteDocumentSchema = z.object({
  version: z.literal(CASSETTE_FORMAT_VERSION),
  compression_enabled: z.boolean().default(false),
  interactions: z.array(interactionSchema).nullable().default([]),
});

type RequestDocument = z.input<typeof requestSchema>;
type ResponseDocument = z.input<typeof responseSchema>;
type InteractionDocument = z.input<typeof interactionSchema>;

export interface CassetteDocument {
  compressionEnabled: boolean;
  interactions: Interaction[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Decode the text of a cassette file. The version is checked before
 * anything else so that other formats fail as unsupported rather than as
 * malformed.
 */
export function parseCassette(text: string, file: string): CassetteDocument {
  let raw: unknown;
  try {
    raw = parse(text, { customTags: ['binary'] });
  } catch (error) {
    throw new Error(`failed to parse cassette file ${file}`, { cause: error });
  }

  const version = isRecord(raw) ? raw.version : undefined;
  if (version !== CASSETTE_FORMAT_VERSION) {
    throw new UnsupportedFormatError(file, version);
  }

  const result = cassetteDocumentSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`failed to decode cassette file ${file}`, {
      cause: result.error,
    });
  }

  return {
    compressionEnabled: result.data.compression_enabled,
    interactions: (result.data.interactions ?? []).map((item) => ({
      id: item.id,
      hash: item.hash,
      request: {
        proto: item.request.proto,
        protoMajor: item.request.proto_major,
        protoMinor: item.request.proto_minor,
        contentLength: item.request.content_length,
        transferEncoding: item.request.transfer_encoding,
        trailer: item.request.trailer,
        host: item.request.host,
        remoteAddr: item.request.remote_addr,
        requestUri: item.request.request_uri,
        body: item.request.body,
        form: item.request.form,
        headers: item.request.headers,
        url: item.request.url,
        method: item.request.method,
      },
      response: {
        proto: item.response.proto,
        protoMajor: item.response.proto_major,
        protoMinor: item.response.proto_minor,
        transferEncoding: item.response.transfer_encoding,
        trailer: item.response.trailer,
        contentLength: item.response.content_length,
        uncompressed: item.response.uncompressed,
        body: item.response.body,
        headers: item.response.headers,
        status: item.response.status,
        code: item.response.code,
        duration: item.response.duration,
      },
      discardOnSave: false,
      replayed: false,
    })),
  };
}

function encodeRequest(request: RecordedRequest): RequestDocument {
  return {
    proto: request.proto,
    proto_major: request.protoMajor,
    proto_minor: request.protoMinor,
    content_length: request.contentLength,
    ...(request.transferEncoding.length > 0 && {
      transfer_encoding: request.transferEncoding,
    }),
    ...(Object.keys(request.trailer).length > 0 && { trailer: request.trailer }),
    host: request.host,
    ...(request.remoteAddr !== '' && { remote_addr: request.remoteAddr }),
    ...(request.requestUri !== '' && { request_uri: request.requestUri }),
    ...(request.body.length > 0 && { body: encodeBody(request.body) }),
    ...(Object.keys(request.form).length > 0 && { form: request.form }),
    ...(Object.keys(request.headers).length > 0 && {
      headers: request.headers,
    }),
    url: request.url,
    method: request.method,
  };
}

function encodeResponse(response: RecordedResponse): ResponseDocument {
  return {
    proto: response.proto,
    proto_major: response.protoMajor,
    proto_minor: response.protoMinor,
    ...(response.transferEncoding.length > 0 && {
      transfer_encoding: response.transferEncoding,
    }),
    ...(Object.keys(response.trailer).length > 0 && {
      trailer: response.trailer,
    }),
    content_length: response.contentLength,
    ...(response.uncompressed && { uncompressed: true }),
    body: encodeBody(response.body),
    headers: response.headers,
    status: response.status,
    code: response.code,
    duration: response.duration,
  };
}

/**
 * Encode a cassette as a YAML document (without the leading "---" marker)
 */
export function stringifyCassette(
  compressionEnabled: boolean,
  interactions: readonly Interaction[],
): string {
  const document = {
    version: CASSETTE_FORMAT_VERSION,
    compression_enabled: compressionEnabled,
    interactions: interactions.map(
      (interaction): InteractionDocument => ({
        id: interaction.id,
        hash: interaction.hash,
        request: encodeRequest(interaction.request),
        response: encodeResponse(interaction.response),
      }),
    ),
  };

  return stringify(document, {
    lineWidth: 0,
    aliasDuplicateObjects: false,
    customTags: ['binary'],
  });
}
