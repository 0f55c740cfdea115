/**
 * Types for the STIX objects and bundle this tool emits.
 */

export const STIX_BUNDLE_SPEC_VERSION = '2.0';

export interface StixExternalReference {
  source_name: string;
  url: string;
}

// --- Domain objects ---

export interface StixThreatActor {
  type: 'threat-actor';
  id: string;                    // threat-actor--<cluster uuid>
  name: string;
  description?: string;
  aliases?: string[];
  labels?: string[];
  external_references?: StixExternalReference[];
  confidence?: number;           // 0-100
}

// --- Relationship objects ---

export interface StixRelationship {
  type: 'relationship';
  id: string;                    // relationship--<random uuid>
  relationship_type: string;
  source_ref: string;
  target_ref: string;
  description?: string;
  confidence?: number;
}

export type StixObject = StixThreatActor | StixRelationship;

// --- Bundle ---

export interface StixBundle {
  type: 'bundle';
  id: string;                    // bundle--<random uuid>
  spec_version: typeof STIX_BUNDLE_SPEC_VERSION;
  objects: StixObject[];
}
