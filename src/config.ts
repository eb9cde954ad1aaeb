import { MODE_ENV_VAR } from './constants.js';
import { InvalidModeError } from './errors.js';
import { type Mode, Modes } from './types.js';

export function isMode(value: unknown): value is Mode {
  return typeof value === 'string' && Object.values<string>(Modes).includes(value);
}

/**
 * Pick the recorder mode: an explicit option wins, then the
 * HTTP_CASSETTE_MODE environment variable, then record-once
 */
export function resolveMode(
  explicit: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
): Mode {
  const value = explicit ?? env[MODE_ENV_VAR];
  if (value === undefined || value === '') {
    return Modes.recordOnce;
  }
  if (!isMode(value)) {
    throw new InvalidModeError(value);
  }
  return value;
}
