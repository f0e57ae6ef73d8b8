import type { RawValue } from "../input/raw";
import type { InputType } from "../schema/types";

/** Coerced result for a position that received no value and has no default. */
export const ABSENT: unique symbol = Symbol("absent");
export type AbsentValue = typeof ABSENT;

export interface VariableDefinition {
  readonly name: string;
  readonly type: InputType;
  /** Constant default literal from the operation's variable declaration. */
  readonly defaultValue?: RawValue;
}

/** Per-request inputs to coercion. Read-only for the duration of the request. */
export interface CoercionContext {
  readonly variables: Readonly<Record<string, unknown>>;
  readonly definitions: ReadonlyMap<string, VariableDefinition>;
}

export function coercionContext(
  variables: Readonly<Record<string, unknown>> = {},
  definitions: readonly VariableDefinition[] = []
): CoercionContext {
  return {
    variables,
    definitions: new Map(definitions.map(def => [def.name, def] as const)),
  };
}

export function isSupplied(ctx: CoercionContext, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(ctx.variables, name) && ctx.variables[name] !== undefined;
}
