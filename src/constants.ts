export const CASSETTE_FORMAT_VERSION = 2;
export const CASSETTE_EXTENSION = '.yaml';
export const COMPRESSED_EXTENSION = '.gz';
export const FINGERPRINT_DELIMITER = '::';
export const SAFE_METHODS: ReadonlySet<string> = new Set([
  'GET',
  'HEAD',
  'OPTIONS',
  'TRACE',
]);
export const FORM_METHODS: ReadonlySet<string> = new Set([
  'POST',
  'PUT',
  'PATCH',
]);
export const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded';
export const MODE_ENV_VAR = 'HTTP_CASSETTE_MODE';
// Statuses a fetch Response must be constructed with a null body
export const NULL_BODY_STATUSES: ReadonlySet<number> = new Set([
  101, 103, 204, 205, 304,
]);
