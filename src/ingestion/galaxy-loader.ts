/**
 * Reads a MISP galaxy cluster file from disk.
 */

import { readFile } from 'node:fs/promises';

import { InputFormatError, InputParseError, InputReadError } from '../errors.js';
import type { MispGalaxyDocument } from '../types/misp.js';
import { createLogger, describeError } from '../utils/logger.js';
import { MispGalaxyDocumentSchema } from './galaxy-schema.js';

const logger = createLogger('loader');

/**
 * Validate an already-parsed JSON value as a galaxy document.
 * Throws `InputFormatError` when it is not an object with a `values` list.
 */
export function parseGalaxyDocument(data: unknown, sourcePath = '<memory>'): MispGalaxyDocument {
  const result = MispGalaxyDocumentSchema.safeParse(data);
  if (!result.success) {
    const detail = result.error.issues.map((issue) => issue.message).join('; ');
    throw new InputFormatError(`Invalid MISP JSON format: ${detail}`, sourcePath);
  }
  return result.data;
}

/**
 * Load and validate a galaxy file.
 *
 * @throws InputReadError   when the file cannot be read
 * @throws InputParseError  when the file is not valid JSON
 * @throws InputFormatError when the JSON has no `values` list
 */
export async function loadGalaxyDocument(path: string): Promise<MispGalaxyDocument> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (err) {
    throw new InputReadError(`File Read Error: ${describeError(err)}`, path, { cause: err });
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new InputParseError(`JSON Decode Error: ${describeError(err)}`, path, { cause: err });
  }

  const document = parseGalaxyDocument(data, path);

  const label = document.name ? `galaxy "${document.name}"` : path;
  const version = document.version !== undefined ? ` v${document.version}` : '';
  logger.info(`Loaded ${label}${version} with ${document.values.length} cluster(s)`);

  return document;
}
