/**
 * Maps a cluster's `related` entries to STIX relationships.
 *
 * Every entry becomes a generic `related-to` edge; the MISP relation kind
 * ("uses", "similar", ...) is kept in the description. Targets may point
 * at clusters that are not in the same bundle.
 */

import type { StixRelationship } from '../types/stix.js';
import { validateStixObject } from '../stix/serializer.js';
import { randomIdGenerator, stixId, type IdGenerator } from '../utils/identifiers.js';
import { describeError } from '../utils/logger.js';
import { threatActorId, previewRecord } from './actor-builder.js';
import { built, skipped, type BuildResult } from './build-result.js';
import { isRecord } from './field-normalizer.js';

export const RELATIONSHIP_TYPE = 'related-to';
export const RELATIONSHIP_CONFIDENCE = 80;

/**
 * Build one result per entry, in input order. A bad entry only skips
 * itself.
 */
export function buildRelationships(
  sourceActorId: string,
  relatedEntries: readonly unknown[],
  generateId: IdGenerator = randomIdGenerator,
): BuildResult<StixRelationship>[] {
  return relatedEntries.map((entry) => buildRelationship(sourceActorId, entry, generateId));
}

export function buildRelationship(
  sourceActorId: string,
  entry: unknown,
  generateId: IdGenerator = randomIdGenerator,
): BuildResult<StixRelationship> {
  if (!isRecord(entry)) {
    return skipped(`Skipping invalid relationship: ${previewRecord(entry)}`);
  }

  const destUuid = entry['dest-uuid'];
  const relationKind = entry.type;
  if (typeof destUuid !== 'string' || typeof relationKind !== 'string') {
    return skipped(`Skipping invalid relationship: ${previewRecord(entry)}`);
  }

  try {
    const relationship: StixRelationship = {
      type: 'relationship',
      id: stixId('relationship', generateId()),
      relationship_type: RELATIONSHIP_TYPE,
      source_ref: sourceActorId,
      target_ref: threatActorId(destUuid),
      description: `Relationship type: ${relationKind}`,
      confidence: RELATIONSHIP_CONFIDENCE,
    };
    return built(validateStixObject(relationship));
  } catch (err) {
    return skipped(`Error creating relationship to ${destUuid || 'Unknown'}: ${describeError(err)}`, 'error');
  }
}
