export type {
  DefaultTemplate,
  FieldKind,
  FieldValue,
  Frame,
  PrimitiveValue,
  RectFrame,
  ReferenceTarget,
  ReferenceValue,
  ReflectedField,
  Rgba,
  SceneHost,
  SpatialFrame,
  UnsupportedValue,
  Vec2,
  Vec3,
} from "./host.js";
export { structuralEquals } from "./equality.js";
export {
  createNameAllocator,
  hasIdentifierCharacters,
  isIdentifier,
  sanitizeIdentifier,
  PLACEHOLDER_IDENTIFIER,
} from "./names.js";
export type { NameAllocator } from "./names.js";
export { SourceBuilder } from "./sourceBuilder.js";
export { formatFloat, formatInteger, formatString, formatPrimitive } from "./literals.js";
export type { FloatPrecision } from "./literals.js";
export { GLOBAL_SYMBOLS, RUNTIME_SYMBOLS, createImportTracker } from "./imports.js";
export type { ImportTracker, ImportedSymbol, RuntimeSymbol } from "./imports.js";
export {
  DEFAULT_RESERVED_PREFIXES,
  DEFAULT_SKIPPED_FIELDS,
  createDiffOptions,
  diffAgainstDefaults,
} from "./differ.js";
export type { DiffOptions, EmptyStringPolicy, FieldDifference } from "./differ.js";
export { resolveAnchorPath, collectAnchoredDescendants } from "./anchors.js";
export { classifyReference } from "./classify.js";
export type { LocalReference, ReferenceClass } from "./classify.js";
export { DEFAULT_RECT_FRAME, DEFAULT_SPATIAL_FRAME } from "./frame.js";
export { createGraphWalker, ANCHORS_PARAMETER, CREATED_OBJECTS_PARAMETER } from "./walker.js";
export type { GraphWalker, WalkerOptions } from "./walker.js";
export {
  DEFAULT_RUNTIME_MODULE,
  GENERATED_BANNER,
  formatTimestamp,
  generateAnchorContainer,
  generateCollectionFactory,
  generateRootFactory,
  outputFileName,
  outputPathFor,
  stripTimestamp,
} from "./emitFile.js";
export type { EmitOptions, GeneratedSource } from "./emitFile.js";
export { GeneratorError, describeError, isGeneratorError } from "./errors.js";
export type { GeneratorErrorCode } from "./errors.js";
