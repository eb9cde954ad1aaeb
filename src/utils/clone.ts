import type {
  Interaction,
  RecordedRequest,
  TransportResponse,
} from '../types.js';
import { cloneHeaders } from './httpHelpers.js';

// structuredClone would turn Buffer bodies into plain Uint8Arrays

export function cloneRequest(request: RecordedRequest): RecordedRequest {
  return {
    ...request,
    transferEncoding: [...request.transferEncoding],
    trailer: cloneHeaders(request.trailer),
    body: Buffer.from(request.body),
    form: cloneHeaders(request.form),
    headers: cloneHeaders(request.headers),
  };
}

export function cloneResponse<T extends TransportResponse>(response: T): T {
  return {
    ...response,
    transferEncoding: [...response.transferEncoding],
    trailer: cloneHeaders(response.trailer),
    body: Buffer.from(response.body),
    headers: cloneHeaders(response.headers),
  };
}

export function cloneInteraction(interaction: Interaction): Interaction {
  return {
    ...interaction,
    request: cloneRequest(interaction.request),
    response: cloneResponse(interaction.response),
  };
}
