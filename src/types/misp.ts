/**
 * Types for MISP galaxy input documents.
 *
 * Galaxy clusters arrive as loosely typed JSON and stay `unknown` until
 * the field normalizer has looked at them; `ClusterMeta` is the strict
 * form the actor builder works from.
 */

// --- Raw input ---

export interface MispGalaxyDocument {
  name?: string;
  type?: string;
  uuid?: string;
  version?: number;
  source?: string;
  authors?: string[];
  description?: string;
  values: unknown[];
}

// --- Loose metadata values ---

/**
 * A metadata field that may hold nothing, one string, or a list.
 * Sequence entries are kept as found; consumers filter what they need.
 */
export type LooseValue =
  | { kind: 'absent' }
  | { kind: 'scalar'; value: string }
  | { kind: 'sequence'; values: unknown[] };

// --- Normalized metadata ---

export interface ClusterMeta {
  synonyms: LooseValue;
  refs: LooseValue;
  country?: string;
  targetedSector?: string;
  attributionConfidence?: unknown;
}
