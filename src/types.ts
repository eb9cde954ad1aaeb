import type { LiveRequest } from './LiveRequest.js';

export const Modes = {
  recordOnce: 'record-once',
  recordOnly: 'record-only',
  replayOnly: 'replay-only',
  replayWithNewEpisodes: 'replay-with-new-episodes',
  passthrough: 'passthrough',
} as const;

export type Mode = (typeof Modes)[keyof typeof Modes];

export const HookKinds = {
  afterCapture: 'after-capture',
  beforeSave: 'before-save',
  beforeResponseReplay: 'before-response-replay',
  onRecorderStop: 'on-recorder-stop',
} as const;

export type HookKind = (typeof HookKinds)[keyof typeof HookKinds];

/** Multi-valued header map, names lower-cased */
export type HeaderMap = Record<string, string[]>;

export type FormValues = Record<string, string[]>;

export interface RecordedRequest {
  proto: string;
  protoMajor: number;
  protoMinor: number;
  contentLength: number;
  transferEncoding: string[];
  trailer: HeaderMap;
  host: string;
  remoteAddr: string;
  requestUri: string;
  body: Buffer;
  form: FormValues;
  headers: HeaderMap;
  url: string;
  method: string;
}

export interface RecordedResponse {
  proto: string;
  protoMajor: number;
  protoMinor: number;
  transferEncoding: string[];
  trailer: HeaderMap;
  contentLength: number;
  /** Body was decoded from its wire content-encoding before it was stored */
  uncompressed: boolean;
  /** Raw bytes; saved as text when valid UTF-8, as `!!binary` otherwise */
  body: Buffer;
  headers: HeaderMap;
  /** Status line, e.g. "200 OK" */
  status: string;
  code: number;
  /** Duration of the original exchange in milliseconds */
  duration: number;
}

export type TransportResponse = Omit<RecordedResponse, 'duration'>;

export interface Interaction {
  id: number;
  hash: string;
  request: RecordedRequest;
  response: RecordedResponse;
  /** Dropped by the next save, still visible in memory until then */
  discardOnSave: boolean;
  replayed: boolean;
}

export type Fingerprinter = (request: LiveRequest) => Promise<string>;

export type RealTransport = (request: LiveRequest) => Promise<TransportResponse>;

export type PassthroughFunc = (request: LiveRequest) => boolean | Promise<boolean>;

export type HookFunc = (interaction: Interaction) => void | Promise<void>;

export interface Hook {
  kind: HookKind;
  fn: HookFunc;
}

export interface RoundTripper {
  roundTrip(request: LiveRequest): Promise<TransportResponse>;
}
