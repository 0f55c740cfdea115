/**
 * Unit tests for bundle assembly.
 *
 * Tests: collectStixObjects, createBundle, assembleBundle
 */

import { describe, it, expect, vi } from 'vitest';
import {
  assembleBundle,
  collectStixObjects,
  createBundle,
} from '@/conversion/bundle-assembler.js';
import { EmptyBundleError } from '@/errors.js';
import type { IdGenerator } from '@/utils/identifiers.js';
import type { Logger } from '@/utils/logger.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger;
}

function sequentialIds(): IdGenerator {
  let next = 0;
  return () => `id-${++next}`;
}

const APT_X = {
  uuid: 'a1',
  value: 'APT-X',
  meta: { synonyms: ['Foo'], country: 'RU' },
  related: [{ 'dest-uuid': 'b2', type: 'uses' }],
};

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('assembleBundle', () => {
  it('converts the APT-X example into one actor and one relationship', () => {
    const { bundle, summary } = assembleBundle([APT_X], {
      generateId: sequentialIds(),
      logger: makeLogger(),
    });

    expect(bundle).toEqual({
      type: 'bundle',
      id: 'bundle--id-2',
      spec_version: '2.0',
      objects: [
        {
          type: 'threat-actor',
          id: 'threat-actor--a1',
          name: 'APT-X',
          description: 'No description available.',
          aliases: ['Foo'],
          labels: ['Country: RU'],
          confidence: 50,
        },
        {
          type: 'relationship',
          id: 'relationship--id-1',
          relationship_type: 'related-to',
          source_ref: 'threat-actor--a1',
          target_ref: 'threat-actor--b2',
          description: 'Relationship type: uses',
          confidence: 80,
        },
      ],
    });
    expect(summary).toEqual({
      recordsSeen: 1,
      actorsBuilt: 1,
      recordsSkipped: 0,
      relationshipsBuilt: 1,
      relationshipsSkipped: 0,
    });
  });

  it('drops a record without value together with its relations', () => {
    const records = [
      { uuid: 'r1', value: 'First' },
      { uuid: 'r2', related: [{ 'dest-uuid': 'r1', type: 'uses' }] },
      { uuid: 'r3', value: 'Third', related: [{ 'dest-uuid': 'r1', type: 'similar' }] },
    ];

    const { bundle, summary } = assembleBundle(records, { generateId: sequentialIds(), logger: makeLogger() });

    expect(bundle.objects.map((o) => o.id)).toEqual([
      'threat-actor--r1',
      'threat-actor--r3',
      'relationship--id-1',
    ]);
    expect(summary.recordsSkipped).toBe(1);
  });

  it('throws EmptyBundleError for an empty record list', () => {
    expect(() => assembleBundle([], { logger: makeLogger() })).toThrow(EmptyBundleError);
  });

  it('throws EmptyBundleError when every record is invalid', () => {
    expect(() => assembleBundle([{ value: 'x' }, 'junk'], { logger: makeLogger() })).toThrow(
      'No valid STIX objects created from 2 record(s)',
    );
  });
});

describe('collectStixObjects', () => {
  it('keeps each actor directly before its own relationships', () => {
    const { objects } = collectStixObjects(
      [
        { uuid: 'a', value: 'A', related: [{ 'dest-uuid': 'b', type: 'uses' }, { 'dest-uuid': 'c', type: 'uses' }] },
        { uuid: 'b', value: 'B', related: [{ 'dest-uuid': 'a', type: 'similar' }] },
      ],
      { generateId: sequentialIds(), logger: makeLogger() },
    );

    expect(objects.map((o) => o.id)).toEqual([
      'threat-actor--a',
      'relationship--id-1',
      'relationship--id-2',
      'threat-actor--b',
      'relationship--id-3',
    ]);
  });

  it('logs info for built units and warnings for skipped ones', () => {
    const logger = makeLogger();

    const { summary } = collectStixObjects(
      [
        { uuid: 'a', value: 'A', related: [{ 'dest-uuid': 'b', type: 'uses' }, { type: 'uses' }] },
        { value: 'No uuid' },
      ],
      { generateId: sequentialIds(), logger },
    );

    expect(logger.info).toHaveBeenCalledWith('Created Threat Actor: A');
    expect(logger.info).toHaveBeenCalledWith('Created Relationship: threat-actor--a -> threat-actor--b');
    expect(logger.warn).toHaveBeenCalledWith('Skipping invalid relationship: {"type":"uses"}');
    expect(logger.warn).toHaveBeenCalledWith('Skipping invalid item: {"value":"No uuid"}');
    expect(logger.error).not.toHaveBeenCalled();
    expect(summary).toEqual({
      recordsSeen: 2,
      actorsBuilt: 1,
      recordsSkipped: 1,
      relationshipsBuilt: 1,
      relationshipsSkipped: 1,
    });
  });

  it('logs errors for records that fail during construction', () => {
    const logger = makeLogger();

    collectStixObjects([{ uuid: 'bad', value: 'Bad', meta: 'not-a-map' }], { logger });

    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith(
      'Error creating Threat Actor Bad: Malformed metadata field "meta": expected string or list, got string',
    );
  });

  it('ignores a related field that is not a list', () => {
    const logger = makeLogger();

    const { objects } = collectStixObjects([{ uuid: 'a', value: 'A', related: { 'dest-uuid': 'b' } }], { logger });

    expect(objects).toHaveLength(1);
    expect(logger.warn).toHaveBeenCalledWith('Ignoring non-list "related" field on A');
  });

  it('skips a later cluster that repeats an earlier uuid, with its relations', () => {
    const logger = makeLogger();

    const { objects, summary } = collectStixObjects(
      [
        { uuid: 'dup', value: 'One' },
        { uuid: 'dup', value: 'Two', related: [{ 'dest-uuid': 'x', type: 'uses' }] },
      ],
      { generateId: sequentialIds(), logger },
    );

    const ids = objects.map((o) => o.id);
    expect(ids).toEqual(['threat-actor--dup']);
    expect(new Set(ids).size).toBe(ids.length);
    expect(logger.warn).toHaveBeenCalledWith('Skipping duplicate cluster uuid: threat-actor--dup (Two)');
    expect(summary).toEqual({
      recordsSeen: 2,
      actorsBuilt: 1,
      recordsSkipped: 1,
      relationshipsBuilt: 0,
      relationshipsSkipped: 0,
    });
  });

  it('treats an empty related list as no relationships', () => {
    const { objects } = collectStixObjects([{ uuid: 'a', value: 'A', related: [] }], { logger: makeLogger() });
    expect(objects).toHaveLength(1);
  });
});

describe('createBundle', () => {
  it('omits empty lists from canonical objects', () => {
    const bundle = createBundle(
      [
        {
          type: 'threat-actor',
          id: 'threat-actor--z',
          name: 'Z',
          description: 'No description available.',
          aliases: [],
          labels: [],
          external_references: [],
          confidence: 50,
        },
      ],
      1,
      () => 'fixed',
    );

    expect(bundle.id).toBe('bundle--fixed');
    expect(bundle.objects).toEqual([
      {
        type: 'threat-actor',
        id: 'threat-actor--z',
        name: 'Z',
        description: 'No description available.',
        confidence: 50,
      },
    ]);
  });

  it('throws EmptyBundleError with the record count', () => {
    try {
      createBundle([], 4);
      expect.unreachable('createBundle should throw');
    } catch (err) {
      expect(err).toBeInstanceOf(EmptyBundleError);
      if (err instanceof EmptyBundleError) {
        expect(err.recordCount).toBe(4);
      }
    }
  });
});
