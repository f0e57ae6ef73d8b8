// src/index.ts
// Argument coercion - public API

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DESCRIPTORS
// ═══════════════════════════════════════════════════════════════════════════════

export {
  enumType,
  inputObject,
  listOf,
  nonNull,
  namedType,
  parsed,
  printType,
  rejected,
  scalarType,
  type EnumType,
  type EnumValue,
  type InputFieldDefinition,
  type InputFieldMap,
  type InputObjectType,
  type InputType,
  type ListType,
  type NamedType,
  type NonNullType,
  type NullableType,
  type ParseResult,
  type ScalarType,
} from "./schema/types";
export { BooleanType, FloatType, IDType, IntType, StringType, BUILTIN_SCALARS, defineScalar } from "./schema/scalars";
export {
  defineSchema,
  typeFromAst,
  type ArgumentDefinition,
  type ArgumentMap,
  type FieldDefinition,
  type FieldType,
  type ResolveInfo,
  type Resolver,
  type Schema,
} from "./schema/schema";

// ═══════════════════════════════════════════════════════════════════════════════
// RAW VALUES
// ═══════════════════════════════════════════════════════════════════════════════

export {
  ABSENT_RAW,
  NULL_RAW,
  external,
  printRaw,
  valueFromRaw,
  type RawValue,
  type ScalarInput,
} from "./input/raw";
export { normalize, normalizeArguments } from "./input/normalize";

// ═══════════════════════════════════════════════════════════════════════════════
// COERCION
// ═══════════════════════════════════════════════════════════════════════════════

export {
  ABSENT,
  coercionContext,
  type AbsentValue,
  type CoercionContext,
  type VariableDefinition,
} from "./coercion/context";
export { coerce, coercePosition } from "./coercion/coerce";
export { resolveVariable } from "./coercion/variables";
export { coerceArguments, type ArgumentOptions } from "./coercion/arguments";

// ═══════════════════════════════════════════════════════════════════════════════
// OUTCOMES & ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

export { isDone, isFail, type Done, type Fail, type Outcome } from "./outcome/outcome";
export { argumentMismatch, done, fail, ok, resolverFailed } from "./outcome/constructors";
export { combine, mapOutcome, match, unwrap, unwrapOr } from "./outcome/matchers";
export {
  describeFailure,
  formatPath,
  type CoercionFailure,
  type FailureKind,
  type PathSegment,
} from "./outcome/failure";
export { DIAGNOSTIC_CODES, type DiagnosticCode } from "./outcome/codes";
export type { Diagnostic } from "./outcome/diagnostic";
export {
  fieldError,
  inspectArguments,
  report,
  requestError,
  type FieldError,
  type RequestError,
  type ResponseError,
} from "./errors/aggregate";

// ═══════════════════════════════════════════════════════════════════════════════
// EXECUTION
// ═══════════════════════════════════════════════════════════════════════════════

export {
  prepareOperation,
  type FieldSelection,
  type PreparedOperation,
  type RejectedOperation,
} from "./execution/document";
export { runQuery, type ExecutionResult, type RunOptions } from "./execution/run";
export { serializeResult } from "./execution/serialize";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION & LOGGING
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./config";
export {
  createLogger,
  createMemoryLogger,
  LOG_LEVELS,
  type LogEntry,
  type LogLevel,
  type Logger,
  type MemoryLogger,
} from "./log/logger";
