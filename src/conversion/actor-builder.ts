/**
 * Maps one galaxy cluster to a STIX threat-actor.
 */

import type { StixThreatActor } from '../types/stix.js';
import { validateStixObject } from '../stix/serializer.js';
import { stixId } from '../utils/identifiers.js';
import { describeError } from '../utils/logger.js';
import { built, skipped, type BuildResult } from './build-result.js';
import {
  buildExternalReferences,
  buildLabels,
  isRecord,
  normalizeToStringList,
  parseConfidence,
  readClusterMeta,
} from './field-normalizer.js';

export const DEFAULT_DESCRIPTION = 'No description available.';

const PREVIEW_LENGTH = 200;

/** Actor ids depend on the cluster uuid alone, so re-runs agree. */
export function threatActorId(clusterUuid: string): string {
  return stixId('threat-actor', clusterUuid);
}

export function previewRecord(record: unknown): string {
  const text = JSON.stringify(record) ?? String(record);
  return text.length > PREVIEW_LENGTH ? `${text.slice(0, PREVIEW_LENGTH)}...` : text;
}

/**
 * Build a threat-actor from a raw cluster.
 *
 * Clusters without a string `uuid` and `value` are skipped with a warning.
 * Any other failure (malformed metadata, an out-of-range confidence) skips
 * the cluster at error severity. Never throws.
 */
export function buildThreatActor(record: unknown): BuildResult<StixThreatActor> {
  if (!isRecord(record)) {
    return skipped(`Skipping invalid item: ${previewRecord(record)}`);
  }

  const uuid = record.uuid;
  const value = record.value;
  if (typeof uuid !== 'string' || typeof value !== 'string') {
    return skipped(`Skipping invalid item: ${previewRecord(record)}`);
  }

  try {
    const meta = readClusterMeta(record.meta);

    const actor: StixThreatActor = {
      type: 'threat-actor',
      id: threatActorId(uuid),
      name: value,
      description: typeof record.description === 'string' ? record.description : DEFAULT_DESCRIPTION,
      aliases: normalizeToStringList(meta.synonyms),
      labels: buildLabels(meta),
      external_references: buildExternalReferences(meta.refs),
      confidence: parseConfidence(meta.attributionConfidence),
    };

    return built(validateStixObject(actor));
  } catch (err) {
    return skipped(`Error creating Threat Actor ${value || 'Unknown'}: ${describeError(err)}`, 'error');
  }
}
