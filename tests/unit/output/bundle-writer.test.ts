/**
 * Unit tests for the bundle writer.
 *
 * Tests: formatBundle, writeBundle
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { formatBundle, writeBundle } from '@/output/bundle-writer.js';
import { OutputWriteError } from '@/errors.js';
import type { StixBundle } from '@/types/stix.js';

const BUNDLE: StixBundle = {
  type: 'bundle',
  id: 'bundle--b1',
  spec_version: '2.0',
  objects: [{ type: 'threat-actor', id: 'threat-actor--a1', name: 'APT-X', confidence: 50 }],
};

let workDir: string;

beforeEach(async () => {
  workDir = await mkdtemp(join(tmpdir(), 'bundle-writer-'));
});

afterEach(async () => {
  await rm(workDir, { recursive: true, force: true });
});

describe('formatBundle', () => {
  it('indents with four spaces by default', () => {
    const lines = formatBundle(BUNDLE).split('\n');
    expect(lines[0]).toBe('{');
    expect(lines[1]).toBe('    "type": "bundle",');
    expect(lines[5]).toBe('        {');
    expect(lines[6]).toBe('            "type": "threat-actor",');
  });

  it('honors a custom indent', () => {
    expect(formatBundle(BUNDLE, 2).split('\n')[1]).toBe('  "type": "bundle",');
  });
});

describe('writeBundle', () => {
  it('writes the bundle and creates parent directories', async () => {
    const outputPath = join(workDir, 'nested', 'out', 'bundle.json');

    await writeBundle(BUNDLE, outputPath);

    const written = await readFile(outputPath, 'utf-8');
    expect(JSON.parse(written)).toEqual(BUNDLE);
    expect(written).toBe(formatBundle(BUNDLE));
  });

  it('fails with OutputWriteError when the parent is a file', async () => {
    const blocker = join(workDir, 'blocker');
    await writeFile(blocker, 'x', 'utf-8');

    await expect(writeBundle(BUNDLE, join(blocker, 'bundle.json'))).rejects.toBeInstanceOf(OutputWriteError);
  });
});
