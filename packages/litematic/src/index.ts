export {
  LitematicError,
  toLitematicError,
  withFieldPrefix,
  type Diagnostic,
  type DiagnosticSeverity,
  type LitematicErrorCode,
  type LitematicErrorDetails
} from "./errors.js";
export {
  OPAQUE_PAYLOAD_FIELDS,
  Region,
  type EncodedRegion,
  type OpaquePayloadField,
  type RegionDecodeOptions
} from "./region.js";
export {
  DEFAULT_DATA_VERSION,
  LITEMATIC_VERSION,
  Schematic,
  type SchematicDecodeOptions,
  type SchematicEncodeOptions,
  type SchematicInit
} from "./schematic.js";
export {
  loadLitematic,
  sniffLitematic,
  type LitematicLoadOptions,
  type LitematicLoadResult,
  type LitematicSniffResult
} from "./loader.js";
