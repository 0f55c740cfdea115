/**
 * Bundle assembly: runs the builders over every cluster and wraps the
 * results in a STIX bundle.
 *
 * Objects keep the order they were built in: each actor is followed
 * directly by its own relationships.
 */

import { EmptyBundleError } from '../errors.js';
import { canonicalizeStixObject } from '../stix/serializer.js';
import {
  STIX_BUNDLE_SPEC_VERSION,
  type StixBundle,
  type StixObject,
} from '../types/stix.js';
import { randomIdGenerator, stixId, type IdGenerator } from '../utils/identifiers.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { buildThreatActor } from './actor-builder.js';
import type { Skipped } from './build-result.js';
import { isRecord } from './field-normalizer.js';
import { buildRelationships } from './relationship-builder.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ConversionSummary {
  recordsSeen: number;
  actorsBuilt: number;
  recordsSkipped: number;
  relationshipsBuilt: number;
  relationshipsSkipped: number;
}

export interface AssembleOptions {
  /** Source of relationship and bundle ids. */
  generateId?: IdGenerator;
  logger?: Logger;
}

export interface CollectedObjects {
  objects: StixObject[];
  summary: ConversionSummary;
}

export interface AssembledBundle {
  bundle: StixBundle;
  summary: ConversionSummary;
}

const defaultLogger = createLogger('assembler');

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Build actors and relationships for every record, in order. Skipped
 * units are logged and counted; nothing here throws for bad records.
 *
 * Actor ids are unique within the result: a later cluster repeating an
 * earlier uuid is skipped along with its relations.
 */
export function collectStixObjects(
  records: readonly unknown[],
  options: AssembleOptions = {},
): CollectedObjects {
  const generateId = options.generateId ?? randomIdGenerator;
  const logger = options.logger ?? defaultLogger;

  const objects: StixObject[] = [];
  const summary: ConversionSummary = {
    recordsSeen: 0,
    actorsBuilt: 0,
    recordsSkipped: 0,
    relationshipsBuilt: 0,
    relationshipsSkipped: 0,
  };

  const actorIds = new Set<string>();

  for (const record of records) {
    summary.recordsSeen++;

    const actorResult = buildThreatActor(record);
    if (actorResult.status === 'skipped') {
      reportSkip(logger, actorResult);
      summary.recordsSkipped++;
      continue;
    }

    const actor = actorResult.value;
    if (actorIds.has(actor.id)) {
      logger.warn(`Skipping duplicate cluster uuid: ${actor.id} (${actor.name})`);
      summary.recordsSkipped++;
      continue;
    }
    actorIds.add(actor.id);

    objects.push(actor);
    summary.actorsBuilt++;
    logger.info(`Created Threat Actor: ${actor.name}`);

    const related = isRecord(record) ? record.related : undefined;
    if (related === undefined || related === null) continue;
    if (!Array.isArray(related)) {
      logger.warn(`Ignoring non-list "related" field on ${actor.name}`);
      continue;
    }

    for (const result of buildRelationships(actor.id, related, generateId)) {
      if (result.status === 'skipped') {
        reportSkip(logger, result);
        summary.relationshipsSkipped++;
        continue;
      }
      objects.push(result.value);
      summary.relationshipsBuilt++;
      logger.info(`Created Relationship: ${result.value.source_ref} -> ${result.value.target_ref}`);
    }
  }

  return { objects, summary };
}

/**
 * Wrap built objects in a bundle. Each object is put in canonical form.
 * Throws `EmptyBundleError` when there is nothing to wrap.
 */
export function createBundle(
  objects: readonly StixObject[],
  recordCount: number,
  generateId: IdGenerator = randomIdGenerator,
): StixBundle {
  if (objects.length === 0) {
    throw new EmptyBundleError(recordCount);
  }

  return {
    type: 'bundle',
    id: stixId('bundle', generateId()),
    spec_version: STIX_BUNDLE_SPEC_VERSION,
    objects: objects.map(canonicalizeStixObject),
  };
}

/** `collectStixObjects` followed by `createBundle`. */
export function assembleBundle(
  records: readonly unknown[],
  options: AssembleOptions = {},
): AssembledBundle {
  const { objects, summary } = collectStixObjects(records, options);
  const bundle = createBundle(objects, summary.recordsSeen, options.generateId);
  return { bundle, summary };
}

// ---------------------------------------------------------------------------
// Internal Helpers
// ---------------------------------------------------------------------------

function reportSkip(logger: Logger, result: Skipped): void {
  if (result.severity === 'error') {
    logger.error(result.reason);
  } else {
    logger.warn(result.reason);
  }
}
