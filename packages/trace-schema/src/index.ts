export {
  BUNDLED_SCHEMA_PATH,
  SchemaLoadError,
  eventSchemaFor,
  loadBundledSchema,
  loadSchema,
  parseSchema,
  requiredFieldsFor,
  typesFor,
} from "./catalog.js";
export { exampleEvents, formatExampleLines } from "./examples.js";
export { ingestTraceFile } from "./ingest.js";
export { describeConstraint, oneOf, primitive, runtimeKind, typeMatches } from "./kinds.js";
export { PRIMITIVE_KINDS } from "./types.js";
export type { EventSchema, PrimitiveKind, Schema, TypeConstraint, ValidationFailure } from "./types.js";
export { validateEvent, validateLine, validateTrace } from "./validate.js";
