/**
 * Unit tests for the galaxy loader.
 *
 * Tests: loadGalaxyDocument, parseGalaxyDocument
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { fileURLToPath } from 'node:url';
import { join } from 'node:path';
import { loadGalaxyDocument, parseGalaxyDocument } from '@/ingestion/galaxy-loader.js';
import { InputFormatError, InputParseError, InputReadError } from '@/errors.js';

const FIXTURE_DIR = fileURLToPath(new URL('../../fixtures/galaxies/', import.meta.url));

beforeEach(() => {
  vi.restoreAllMocks();
  vi.spyOn(console, 'info').mockImplementation(() => {});
});

describe('parseGalaxyDocument', () => {
  it('accepts an object with a values list', () => {
    const doc = parseGalaxyDocument({ values: [{ uuid: 'a' }, 'junk'] });
    expect(doc.values).toEqual([{ uuid: 'a' }, 'junk']);
  });

  it('keeps header fields of the right type', () => {
    const doc = parseGalaxyDocument({ name: 'Threat Actor', version: 3, values: [] });
    expect(doc.name).toBe('Threat Actor');
    expect(doc.version).toBe(3);
  });

  it('drops header fields of the wrong type instead of failing', () => {
    const doc = parseGalaxyDocument({ name: 42, authors: 'someone', values: [] });
    expect(doc.name).toBeUndefined();
    expect(doc.authors).toBeUndefined();
  });

  it('rejects a document without values', () => {
    expect(() => parseGalaxyDocument({ clusters: [] }, 'galaxy.json')).toThrow(
      "Invalid MISP JSON format: Missing 'values' key",
    );
  });

  it('rejects values that are not a list', () => {
    expect(() => parseGalaxyDocument({ values: { a: 1 } })).toThrow("'values' must be a list");
  });

  it('rejects a top-level array', () => {
    expect(() => parseGalaxyDocument([{ values: [] }])).toThrow(InputFormatError);
  });
});

describe('loadGalaxyDocument', () => {
  it('loads a galaxy file', async () => {
    const doc = await loadGalaxyDocument(join(FIXTURE_DIR, 'threat-actors.json'));
    expect(doc.name).toBe('Threat Actor');
    expect(doc.values).toHaveLength(3);
  });

  it('fails with InputReadError for a missing file', async () => {
    await expect(loadGalaxyDocument(join(FIXTURE_DIR, 'does-not-exist.json'))).rejects.toBeInstanceOf(
      InputReadError,
    );
  });

  it('fails with InputParseError for invalid JSON', async () => {
    await expect(loadGalaxyDocument(join(FIXTURE_DIR, 'truncated.json'))).rejects.toBeInstanceOf(InputParseError);
  });

  it('fails with InputFormatError when values is missing', async () => {
    const path = join(FIXTURE_DIR, 'no-values.json');
    await expect(loadGalaxyDocument(path)).rejects.toMatchObject({
      name: 'InputFormatError',
      path,
    });
  });
});
