import {
  ABSENT_RAW,
  NULL_RAW,
  external,
  isNullish,
  isPlainObject,
  printRaw,
  type RawValue,
  type ScalarInput,
  type VariableRef,
} from "../input/raw";
import { failure, type CoercionFailure, type PathSegment } from "../outcome/failure";
import { done, fail } from "../outcome/constructors";
import { combine, mapOutcome } from "../outcome/matchers";
import type { Outcome } from "../outcome/outcome";
import {
  printType,
  type EnumType,
  type InputFieldDefinition,
  type InputObjectType,
  type InputType,
  type ListType,
  type ParseResult,
  type ScalarType,
  rejected,
} from "../schema/types";
import { ABSENT, isSupplied, type CoercionContext } from "./context";
import { isUnsuppliedVariable, resolveVariable } from "./variables";

type Resolved = Exclude<RawValue, VariableRef>;

/**
 * Coerce a raw value against a declared input type.
 *
 * Yields `ABSENT` when nothing was supplied for a nullable position and `null` for an
 * explicit null. Failures from sibling list elements and object fields are all
 * collected; none short-circuits the others.
 */
export function coerce(
  type: InputType,
  raw: RawValue,
  ctx: CoercionContext,
  path: readonly PathSegment[] = []
): Outcome<unknown> {
  if (raw.tag === "VariableRef") {
    return resolveVariable(raw.name, type, ctx, path);
  }

  switch (type.tag) {
    case "NonNull":
      if (raw.tag === "Absent" || isNullish(raw)) {
        return fail([
          failure("C0101", path, {
            type: printType(type),
            actual: raw.tag === "Absent" ? "nothing" : "null",
          }),
        ]);
      }
      return coerce(type.of, raw, ctx, path);
    case "Scalar":
      return coerceScalar(type, raw, ctx, path);
    case "Enum":
      return coerceEnum(type, raw, path);
    case "List":
      return coerceList(type, raw, ctx, path);
    case "InputObject":
      return coerceInputObject(type, raw, ctx, path);
  }
}

/**
 * Coerce the value at a defaulted position: an argument or an input object field.
 * The default stands in only when the position is absent, never for an explicit null.
 */
export function coercePosition(
  def: InputFieldDefinition,
  raw: RawValue,
  ctx: CoercionContext,
  path: readonly PathSegment[]
): Outcome<unknown> {
  const useDefault =
    def.defaultValue !== undefined && (raw.tag === "Absent" || isUnsuppliedVariable(raw, ctx));
  return coerce(def.type, useDefault ? external(def.defaultValue) : raw, ctx, path);
}

function missing(raw: Resolved): Outcome<unknown> | undefined {
  if (raw.tag === "Absent") return done(ABSENT);
  if (isNullish(raw)) return done(null);
  return undefined;
}

function coerceScalar(
  type: ScalarType,
  raw: Resolved,
  ctx: CoercionContext,
  path: readonly PathSegment[]
): Outcome<unknown> {
  if (raw.tag === "Absent") return done(ABSENT);
  if (raw.tag === "LiteralNull" || (raw.tag === "External" && raw.value === null)) return done(null);

  const failures: CoercionFailure[] = [];
  const input = inlineVariables(raw, ctx, path, failures);
  if (failures.length > 0) return fail(failures);

  let result: ParseResult;
  try {
    result = type.parse(input);
  } catch (e) {
    result = rejected(e instanceof Error ? e.message : String(e));
  }

  if (!result.ok) {
    return fail([
      failure("C0102", path, { type: type.name, value: printRaw(input), detail: result.reason }),
    ]);
  }
  return done(result.value);
}

/**
 * Replace the variable references nested in a list or object literal with their
 * values, so a scalar parses the same input whether it was written inline or
 * supplied as a variable. Unsupplied variables drop their object field and
 * become null in a list.
 */
function inlineVariables(
  raw: ScalarInput,
  ctx: CoercionContext,
  path: readonly PathSegment[],
  failures: CoercionFailure[]
): ScalarInput {
  switch (raw.tag) {
    case "LiteralList":
      return {
        tag: "LiteralList",
        items: raw.items.map(item => {
          const value = inlineValue(item, ctx, path, failures);
          return value.tag === "Absent" ? NULL_RAW : value;
        }),
      };
    case "LiteralObject": {
      const fields: { name: string; value: RawValue }[] = [];
      for (const field of raw.fields) {
        const value = inlineValue(field.value, ctx, path, failures);
        if (value.tag !== "Absent") fields.push({ name: field.name, value });
      }
      return { tag: "LiteralObject", fields };
    }
    default:
      return raw;
  }
}

function inlineValue(
  raw: RawValue,
  ctx: CoercionContext,
  path: readonly PathSegment[],
  failures: CoercionFailure[]
): RawValue {
  if (raw.tag === "LiteralList" || raw.tag === "LiteralObject") {
    return inlineVariables(raw, ctx, path, failures);
  }
  if (raw.tag !== "VariableRef") return raw;

  const definition = ctx.definitions.get(raw.name);
  const declared = definition?.type;
  if (isSupplied(ctx, raw.name)) {
    const value = ctx.variables[raw.name];
    if (value === null && declared?.tag === "NonNull") {
      failures.push(failure("C0101", path, { type: printType(declared), actual: "null" }));
    }
    return external(value);
  }
  if (definition?.defaultValue !== undefined) {
    return inlineValue(definition.defaultValue, ctx, path, failures);
  }
  if (declared?.tag === "NonNull") {
    failures.push(failure("C0100", path, { name: raw.name, type: printType(declared) }));
  }
  return ABSENT_RAW;
}

function coerceEnum(type: EnumType, raw: Resolved, path: readonly PathSegment[]): Outcome<unknown> {
  const passThrough = missing(raw);
  if (passThrough) return passThrough;

  // Inline, only a bare symbol names an enum value; a quoted string does not.
  const name =
    raw.tag === "LiteralEnum" ? raw.name
    : raw.tag === "External" && typeof raw.value === "string" ? raw.value
    : undefined;

  const match = name === undefined ? undefined : type.values.find(v => v.name === name);
  if (match === undefined) {
    return fail([failure("C0103", path, { type: type.name, value: printRaw(raw) })]);
  }
  return done(match.value);
}

function coerceList(
  type: ListType,
  raw: Resolved,
  ctx: CoercionContext,
  path: readonly PathSegment[]
): Outcome<unknown> {
  const passThrough = missing(raw);
  if (passThrough) return passThrough;

  let items: readonly RawValue[];
  if (raw.tag === "LiteralList") {
    items = raw.items;
  } else if (raw.tag === "External" && Array.isArray(raw.value)) {
    // Array.from visits holes in sparse arrays, which then coerce as absent elements.
    items = Array.from(raw.value, (item: unknown) => external(item));
  } else {
    // No promotion of a single value to a one-element list.
    return fail([
      failure("C0104", path, { expected: "a list", type: printType(type), value: printRaw(raw) }),
    ]);
  }

  const elements = items.map((item, index) => coerce(type.of, item, ctx, [...path, index]));
  return mapOutcome(combine(elements), values => values.map(v => (v === ABSENT ? null : v)));
}

function coerceInputObject(
  type: InputObjectType,
  raw: Resolved,
  ctx: CoercionContext,
  path: readonly PathSegment[]
): Outcome<unknown> {
  const passThrough = missing(raw);
  if (passThrough) return passThrough;

  let lookup: (name: string) => RawValue;
  if (raw.tag === "LiteralObject") {
    const byName = new Map<string, RawValue>();
    for (const field of raw.fields) byName.set(field.name, field.value);
    lookup = name => byName.get(name) ?? ABSENT_RAW;
  } else if (raw.tag === "External" && isPlainObject(raw.value)) {
    const supplied = raw.value;
    lookup = name =>
      Object.prototype.hasOwnProperty.call(supplied, name) ? external(supplied[name]) : ABSENT_RAW;
  } else {
    return fail([
      failure("C0104", path, { expected: "an input object", type: type.name, value: printRaw(raw) }),
    ]);
  }

  // Keys not declared on the type are dropped.
  const out: Record<string, unknown> = {};
  const failures: CoercionFailure[] = [];
  for (const [name, field] of Object.entries(type.fields())) {
    const result = coercePosition(field, lookup(name), ctx, [...path, name]);
    if (result.tag === "Fail") {
      failures.push(...result.failures);
    } else if (result.value !== ABSENT) {
      out[name] = result.value;
    }
  }

  return failures.length > 0 ? fail(failures) : done(out);
}
