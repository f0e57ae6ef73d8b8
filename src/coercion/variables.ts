import { ABSENT_RAW, external, type RawValue } from "../input/raw";
import { failure, type PathSegment } from "../outcome/failure";
import { fail } from "../outcome/constructors";
import type { Outcome } from "../outcome/outcome";
import { printType, type InputType } from "../schema/types";
import { isSupplied, type CoercionContext } from "./context";
import { coerce } from "./coerce";

/**
 * Resolve a variable reference against the type expected where it occurs.
 *
 * A supplied value is coerced structurally. An unsupplied variable falls back to its
 * declared default; without one it fails when declared non-null and is otherwise absent.
 */
export function resolveVariable(
  name: string,
  expected: InputType,
  ctx: CoercionContext,
  path: readonly PathSegment[] = []
): Outcome<unknown> {
  const definition = ctx.definitions.get(name);
  const declared = definition?.type ?? expected;

  if (isSupplied(ctx, name)) {
    const value = ctx.variables[name];
    if (value === null && declared.tag === "NonNull") {
      return fail([failure("C0101", path, { type: printType(declared), actual: "null" })]);
    }
    return coerce(expected, external(value), ctx, path);
  }

  if (definition?.defaultValue !== undefined) {
    return coerce(expected, definition.defaultValue, ctx, path);
  }

  if (declared.tag === "NonNull") {
    return fail([failure("C0100", path, { name, type: printType(declared) })]);
  }

  return coerce(expected, ABSENT_RAW, ctx, path);
}

/**
 * True when `raw` references a variable that will resolve to nothing, so the
 * position's own default applies.
 */
export function isUnsuppliedVariable(raw: RawValue, ctx: CoercionContext): boolean {
  if (raw.tag !== "VariableRef" || isSupplied(ctx, raw.name)) return false;
  const definition = ctx.definitions.get(raw.name);
  if (definition === undefined) return true;
  return definition.defaultValue === undefined && definition.type.tag !== "NonNull";
}
