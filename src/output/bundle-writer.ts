/**
 * Writes a STIX bundle to disk as pretty-printed JSON.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { OutputWriteError } from '../errors.js';
import type { StixBundle } from '../types/stix.js';
import { describeError } from '../utils/logger.js';

export const DEFAULT_INDENT = 4;

export function formatBundle(bundle: StixBundle, indent = DEFAULT_INDENT): string {
  return JSON.stringify(bundle, null, indent);
}

/**
 * Write the bundle, creating parent directories as needed.
 * Throws `OutputWriteError` if the file cannot be written.
 */
export async function writeBundle(
  bundle: StixBundle,
  outputPath: string,
  indent = DEFAULT_INDENT,
): Promise<void> {
  try {
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, formatBundle(bundle, indent), 'utf-8');
  } catch (err) {
    throw new OutputWriteError(`File Write Error: ${describeError(err)}`, outputPath, { cause: err });
  }
}
