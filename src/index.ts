/**
 * Library entry point.
 */

export * from './conversion/index.js';
export * from './stix/index.js';
export type {
  MispGalaxyDocument,
  ClusterMeta,
  LooseValue,
  StixBundle,
  StixObject,
  StixThreatActor,
  StixRelationship,
  StixExternalReference,
  ConverterConfig,
  ConverterConfigOverrides,
  LogLevel,
} from './types/index.js';
export { STIX_BUNDLE_SPEC_VERSION } from './types/stix.js';
export { loadGalaxyDocument, parseGalaxyDocument } from './ingestion/galaxy-loader.js';
export { writeBundle, formatBundle, DEFAULT_INDENT } from './output/bundle-writer.js';
export { loadConverterConfig, DEFAULT_CONFIG } from './config/loader.js';
export { createLogger, setLogLevel, getLogLevel } from './utils/logger.js';
export type { Logger } from './utils/logger.js';
export { randomIdGenerator, stixId } from './utils/identifiers.js';
export type { IdGenerator } from './utils/identifiers.js';
export {
  ConversionError,
  InputReadError,
  InputParseError,
  InputFormatError,
  EmptyBundleError,
  OutputWriteError,
  ConfigError,
} from './errors.js';
export type { ConversionStage } from './errors.js';
