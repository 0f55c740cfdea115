/**
 * Field normalization for loosely typed galaxy metadata.
 *
 * MISP galaxies are hand-maintained, so the same field shows up as a
 * string in one cluster, a list in the next, and not at all in a third.
 * Everything here turns those shapes into plain typed values; the only
 * failure is a shape that cannot be read as any of them.
 */

import type { ClusterMeta, LooseValue } from '../types/misp.js';
import type { StixExternalReference } from '../types/stix.js';

export const DEFAULT_CONFIDENCE = 50;
export const EXTERNAL_REFERENCE_SOURCE = 'MISP';

export class MalformedFieldError extends Error {
  constructor(
    public readonly field: string,
    received: unknown,
  ) {
    super(`Malformed metadata field "${field}": expected string or list, got ${describeShape(received)}`);
    this.name = 'MalformedFieldError';
  }
}

function describeShape(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ---------------------------------------------------------------------------
// Scalar-or-list values
// ---------------------------------------------------------------------------

/**
 * Classify a raw metadata value. Throws `MalformedFieldError` for anything
 * that is neither absent, a string, nor an array.
 */
export function classifyLooseValue(value: unknown, field = 'value'): LooseValue {
  if (value === undefined || value === null) {
    return { kind: 'absent' };
  }
  if (typeof value === 'string') {
    return { kind: 'scalar', value };
  }
  if (Array.isArray(value)) {
    return { kind: 'sequence', values: value };
  }
  throw new MalformedFieldError(field, value);
}

/**
 * Flatten a loose value into a list of strings. Non-string entries of a
 * sequence are dropped.
 *
 * @example normalizeToStringList({ kind: 'scalar', value: 'Fancy Bear' }) => ['Fancy Bear']
 */
export function normalizeToStringList(value: LooseValue): string[] {
  switch (value.kind) {
    case 'absent':
      return [];
    case 'scalar':
      return [value.value];
    case 'sequence':
      return value.values.filter((entry): entry is string => typeof entry === 'string');
    default: {
      const unreachable: never = value;
      return unreachable;
    }
  }
}

// ---------------------------------------------------------------------------
// Cluster metadata
// ---------------------------------------------------------------------------

/**
 * Read a free-text metadata field. Lists are comma-joined, numbers are
 * printed, blank values and zero count as absent.
 */
function readTextField(value: unknown, field: string): string | undefined {
  if (value === undefined || value === null || value === 0) return undefined;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);

  const text = normalizeToStringList(classifyLooseValue(value, field)).join(', ');
  return text.trim() === '' ? undefined : text;
}

/**
 * Turn the raw `meta` map of a cluster into a `ClusterMeta`. A missing
 * `meta` yields empty metadata; a non-object `meta` is malformed.
 */
export function readClusterMeta(raw: unknown): ClusterMeta {
  if (raw === undefined || raw === null) {
    return { synonyms: { kind: 'absent' }, refs: { kind: 'absent' } };
  }
  if (!isRecord(raw)) {
    throw new MalformedFieldError('meta', raw);
  }

  return {
    synonyms: classifyLooseValue(raw['synonyms'], 'synonyms'),
    refs: classifyLooseValue(raw['refs'], 'refs'),
    country: readTextField(raw['country'], 'country'),
    targetedSector: readTextField(raw['targeted-sector'], 'targeted-sector'),
    attributionConfidence: raw['attribution-confidence'],
  };
}

// ---------------------------------------------------------------------------
// Derived sub-structures
// ---------------------------------------------------------------------------

/** Country label first, then targeted sector. */
export function buildLabels(meta: ClusterMeta): string[] {
  const labels: string[] = [];
  if (meta.country) {
    labels.push(`Country: ${meta.country}`);
  }
  if (meta.targetedSector) {
    labels.push(`Targeted Sector: ${meta.targetedSector}`);
  }
  return labels;
}

export function buildExternalReferences(refs: LooseValue): StixExternalReference[] {
  return normalizeToStringList(refs).map((url) => ({
    source_name: EXTERNAL_REFERENCE_SOURCE,
    url,
  }));
}

/**
 * Parse an attribution-confidence value into an integer score.
 *
 * Numbers are truncated toward zero; integer strings are parsed. Anything
 * else, including absent values and text like "high", is the default.
 * Range is not checked here.
 */
export function parseConfidence(raw: unknown): number {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? Math.trunc(raw) : DEFAULT_CONFIDENCE;
  }
  if (typeof raw === 'string' && /^\s*[+-]?\d+\s*$/.test(raw)) {
    return Number.parseInt(raw.trim(), 10);
  }
  return DEFAULT_CONFIDENCE;
}
