export { convert } from './converter.js';
export type { ConvertOptions, ConvertDependencies, ConversionResult } from './converter.js';
export { assembleBundle, collectStixObjects, createBundle } from './bundle-assembler.js';
export type {
  AssembleOptions,
  AssembledBundle,
  CollectedObjects,
  ConversionSummary,
} from './bundle-assembler.js';
export { buildThreatActor, threatActorId, DEFAULT_DESCRIPTION } from './actor-builder.js';
export {
  buildRelationships,
  buildRelationship,
  RELATIONSHIP_TYPE,
  RELATIONSHIP_CONFIDENCE,
} from './relationship-builder.js';
export {
  classifyLooseValue,
  normalizeToStringList,
  readClusterMeta,
  buildLabels,
  buildExternalReferences,
  parseConfidence,
  MalformedFieldError,
  DEFAULT_CONFIDENCE,
  EXTERNAL_REFERENCE_SOURCE,
} from './field-normalizer.js';
export { built, skipped } from './build-result.js';
export type { BuildResult, Built, Skipped, SkipSeverity } from './build-result.js';
