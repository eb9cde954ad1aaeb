export { Cassette } from './Cassette.js';
export type { CassetteOptions } from './Cassette.js';
export { Recorder } from './Recorder.js';
export type { RecorderOptions } from './Recorder.js';
export { LiveRequest } from './LiveRequest.js';
export type { LiveRequestInit, RequestBody } from './LiveRequest.js';
export { resolveMode } from './config.js';
export {
  CassetteNotFoundError,
  InteractionNotFoundError,
  InvalidModeError,
  UnsafeMethodError,
  UnsupportedFormatError,
} from './errors.js';
export { HookKinds, Modes } from './types.js';
export type {
  FormValues,
  HeaderMap,
  Hook,
  HookFunc,
  HookKind,
  Fingerprinter,
  Interaction,
  Mode,
  PassthroughFunc,
  RealTransport,
  RecordedRequest,
  RecordedResponse,
  RoundTripper,
  TransportResponse,
} from './types.js';
export {
  createFingerprinter,
  defaultFingerprinter,
} from './utils/fingerprint.js';
export type { FingerprintOptions } from './utils/fingerprint.js';

// Adapters
export { createRecorderFetch } from './adapters/fetch.js';
export type { RecorderFetch } from './adapters/fetch.js';
export { createCaptureMiddleware } from './adapters/middleware.js';
export type { CapturedExchange } from './adapters/middleware.js';
export { nodeTransport } from './transport/nodeTransport.js';

// Testing helpers
export { verifyHandlerAgainstCassette } from './testing/serverReplay.js';
export type { ReplayMismatch, VerifyOptions } from './testing/serverReplay.js';
