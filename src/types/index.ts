export type {
  MispGalaxyDocument,
  LooseValue,
  ClusterMeta,
} from './misp.js';
export type {
  StixExternalReference,
  StixThreatActor,
  StixRelationship,
  StixObject,
  StixBundle,
} from './stix.js';
export { STIX_BUNDLE_SPEC_VERSION } from './stix.js';
export type { LogLevel, ConverterConfig, ConverterConfigOverrides } from './config.js';
