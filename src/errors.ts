import { CASSETTE_FORMAT_VERSION } from './constants.js';

export class CassetteNotFoundError extends Error {
  override name = 'CassetteNotFoundError';

  constructor(
    readonly file: string,
    options?: ErrorOptions,
  ) {
    super(`requested cassette not found: ${file}`, options);
  }
}

export class UnsupportedFormatError extends Error {
  override name = 'UnsupportedFormatError';

  constructor(
    readonly file: string,
    readonly foundVersion: unknown,
  ) {
    super(
      `unsupported cassette version format in ${file}: found version ${String(foundVersion)}, but reader supports version ${CASSETTE_FORMAT_VERSION}`,
    );
  }
}

export class InteractionNotFoundError extends Error {
  override name = 'InteractionNotFoundError';

  constructor(readonly fingerprint: string) {
    super(`requested interaction not found (fingerprint: ${fingerprint})`);
  }
}

export class InvalidModeError extends Error {
  override name = 'InvalidModeError';

  constructor(readonly mode: unknown) {
    super(`invalid recorder mode: ${String(mode)}`);
  }
}

export class UnsafeMethodError extends Error {
  override name = 'UnsafeMethodError';

  constructor(readonly method: string) {
    super(`request method ${method} is not safe to send over the real transport`);
  }
}

/**
 * Check whether an error is a filesystem "no such file" error
 */
export function isFileNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
