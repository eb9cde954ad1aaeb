import { NULL_BODY_STATUSES } from '../constants.js';
import { LiveRequest } from '../LiveRequest.js';
import type { RoundTripper, TransportResponse } from '../types.js';
import { toFetchHeaders } from '../utils/httpHelpers.js';

export type RecorderFetch = (
  input: string | URL | Request,
  init?: RequestInit,
) => Promise<Response>;

function statusText(response: TransportResponse): string {
  const prefix = `${response.code} `;
  return response.status.startsWith(prefix)
    ? response.status.slice(prefix.length)
    : '';
}

export function toFetchResponse(response: TransportResponse): Response {
  const nullBody = NULL_BODY_STATUSES.has(response.code);
  return new Response(nullBody ? null : response.body, {
    status: response.code,
    statusText: statusText(response),
    headers: toFetchHeaders(response.headers),
  });
}

/**
 * Wrap a round tripper (usually a Recorder) in a `fetch`-compatible function
 * @example
 * const recorder = await Recorder.create({ cassetteName: 'fixtures/users' });
 * const res = await recorder.fetch('https://api.example.test/users');
 */
export function createRecorderFetch(roundTripper: RoundTripper): RecorderFetch {
  return async (input, init) => {
    const request = await LiveRequest.fromFetchRequest(new Request(input, init));
    const response = await roundTripper.roundTrip(request);
    return toFetchResponse(response);
  };
}
