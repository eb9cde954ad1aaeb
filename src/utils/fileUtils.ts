import fs from 'node:fs/promises';
import path from 'node:path';
import { promisify } from 'node:util';
import zlib from 'node:zlib';

import filenamify from 'filenamify';

import { CASSETTE_EXTENSION, COMPRESSED_EXTENSION } from '../constants.js';
import { CassetteNotFoundError, isFileNotFound } from '../errors.js';

const gzip = promisify(zlib.gzip);
const gunzip = promisify(zlib.gunzip);

// YAML document start marker, written ahead of every cassette
const DOCUMENT_START = '---\n';

/**
 * Map a cassette name to its file. The directory part is kept as given; the
 * base name is sanitised so it is always a valid file name.
 * @param name Cassette name, e.g. "testdata/github-user"
 * @param compressed Whether the file is gzip-compressed
 */
export function getCassettePath(name: string, compressed: boolean): string {
  const dir = path.dirname(name);
  const base = filenamify(path.basename(name), {
    replacement: '_',
    maxLength: 255,
  });
  const file = path.join(dir, `${base}${CASSETTE_EXTENSION}`);

  return compressed ? `${file}${COMPRESSED_EXTENSION}` : file;
}

export async function readCassetteFile(
  file: string,
  compressed: boolean,
): Promise<string> {
  let data: Buffer;
  try {
    data = await fs.readFile(file);
  } catch (error) {
    if (isFileNotFound(error)) {
      throw new CassetteNotFoundError(file, { cause: error });
    }
    throw new Error(`failed to read cassette file ${file}`, { cause: error });
  }

  if (!compressed) {
    return data.toString('utf8');
  }

  try {
    const inflated = await gunzip(data);
    return inflated.toString('utf8');
  } catch (error) {
    throw new Error(`failed to decompress cassette file ${file}`, {
      cause: error,
    });
  }
}

export async function writeCassetteFile(
  file: string,
  document: string,
  compressed: boolean,
): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });

  const data = Buffer.from(`${DOCUMENT_START}${document}`, 'utf8');
  await fs.writeFile(file, compressed ? await gzip(data) : data);
}
