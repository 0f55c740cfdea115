/**
 * Canonical serialization of STIX objects.
 *
 * Canonical form: `type` and `id` first, then the remaining properties in
 * a fixed order per object type, with absent values and empty lists
 * omitted.
 */

import type { StixObject, StixRelationship, StixThreatActor } from '../types/stix.js';
import { StixObjectSchema } from './schema.js';

export class StixValidationError extends Error {
  constructor(
    public readonly objectId: string,
    public readonly issues: string[],
  ) {
    super(`Invalid STIX object ${objectId}: ${issues.join('; ')}`);
    this.name = 'StixValidationError';
  }
}

/**
 * Check an object against its schema. Returns it unchanged when valid,
 * throws `StixValidationError` otherwise.
 */
export function validateStixObject<T extends StixObject>(obj: T): T {
  const result = StixObjectSchema.safeParse(obj);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
    );
    throw new StixValidationError(obj.id, issues);
  }
  return obj;
}

function canonicalThreatActor(actor: StixThreatActor): StixThreatActor {
  const out: StixThreatActor = { type: actor.type, id: actor.id, name: actor.name };
  if (actor.description !== undefined) out.description = actor.description;
  if (actor.aliases && actor.aliases.length > 0) out.aliases = [...actor.aliases];
  if (actor.labels && actor.labels.length > 0) out.labels = [...actor.labels];
  if (actor.external_references && actor.external_references.length > 0) {
    out.external_references = actor.external_references.map((ref) => ({
      source_name: ref.source_name,
      url: ref.url,
    }));
  }
  if (actor.confidence !== undefined) out.confidence = actor.confidence;
  return out;
}

function canonicalRelationship(rel: StixRelationship): StixRelationship {
  const out: StixRelationship = {
    type: rel.type,
    id: rel.id,
    relationship_type: rel.relationship_type,
    source_ref: rel.source_ref,
    target_ref: rel.target_ref,
  };
  if (rel.description !== undefined) out.description = rel.description;
  if (rel.confidence !== undefined) out.confidence = rel.confidence;
  return out;
}

/** Validate an object and return a fresh copy in canonical form. */
export function canonicalizeStixObject(obj: StixObject): StixObject {
  validateStixObject(obj);
  switch (obj.type) {
    case 'threat-actor':
      return canonicalThreatActor(obj);
    case 'relationship':
      return canonicalRelationship(obj);
    default: {
      const unreachable: never = obj;
      return unreachable;
    }
  }
}

/** Canonical JSON text of one object. */
export function serializeStixObject(obj: StixObject): string {
  return JSON.stringify(canonicalizeStixObject(obj));
}
