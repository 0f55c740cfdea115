/**
 * Zod schemas for the STIX objects this tool emits.
 *
 * These cover the constraints the converter is responsible for (id
 * prefixes, required names, confidence range). They are not a full STIX
 * validator.
 */

import { z } from 'zod';

function stixIdentifier(type: string) {
  return z.string().regex(new RegExp(`^${type}--\\S+$`), `Identifier must have the form "${type}--<id>"`);
}

const anyStixIdentifier = z
  .string()
  .regex(/^[a-z][a-z0-9-]*--\S+$/, 'Reference must be a STIX identifier');

const confidence = z.number().int().min(0).max(100);

export const ExternalReferenceSchema = z
  .object({
    source_name: z.string().min(1),
    url: z.string(),
  })
  .strict();

export const ThreatActorSchema = z
  .object({
    type: z.literal('threat-actor'),
    id: stixIdentifier('threat-actor'),
    name: z.string().min(1, 'Threat actor name must not be empty'),
    description: z.string().optional(),
    aliases: z.array(z.string()).optional(),
    labels: z.array(z.string()).optional(),
    external_references: z.array(ExternalReferenceSchema).optional(),
    confidence: confidence.optional(),
  })
  .strict();

export const RelationshipSchema = z
  .object({
    type: z.literal('relationship'),
    id: stixIdentifier('relationship'),
    relationship_type: z.string().regex(/^[a-z0-9-]+$/, 'Relationship type must be lowercase kebab-case'),
    source_ref: anyStixIdentifier,
    target_ref: anyStixIdentifier,
    description: z.string().optional(),
    confidence: confidence.optional(),
  })
  .strict();

export const StixObjectSchema = z.discriminatedUnion('type', [ThreatActorSchema, RelationshipSchema]);
