export {
  validateStixObject,
  canonicalizeStixObject,
  serializeStixObject,
  StixValidationError,
} from './serializer.js';
export { StixObjectSchema, ThreatActorSchema, RelationshipSchema, ExternalReferenceSchema } from './schema.js';
