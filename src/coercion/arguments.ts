import { ABSENT_RAW, type RawValue } from "../input/raw";
import type { CoercionFailure } from "../outcome/failure";
import { done, fail } from "../outcome/constructors";
import type { Outcome } from "../outcome/outcome";
import type { ArgumentDefinition, ArgumentMap } from "../schema/schema";
import { ABSENT, type CoercionContext } from "./context";
import { coercePosition } from "./coerce";

export interface ArgumentOptions {
  /**
   * When false, a non-null argument that was not written and has no default is left
   * out of the map for an upstream validation phase or the resolver to handle.
   */
  readonly enforceRequiredArguments: boolean;
}

/**
 * Coerce every declared argument of a field and assemble the map handed to its
 * resolver. Positions that end up absent are omitted, not set to null.
 */
export function coerceArguments(
  declared: Readonly<Record<string, ArgumentDefinition>>,
  supplied: ReadonlyMap<string, RawValue>,
  ctx: CoercionContext,
  options: ArgumentOptions
): Outcome<ArgumentMap> {
  const args: Record<string, unknown> = {};
  const failures: CoercionFailure[] = [];

  for (const [name, def] of Object.entries(declared)) {
    const raw = supplied.get(name) ?? ABSENT_RAW;

    if (
      !options.enforceRequiredArguments &&
      raw.tag === "Absent" &&
      def.defaultValue === undefined &&
      def.type.tag === "NonNull"
    ) {
      continue;
    }

    const result = coercePosition(def, raw, ctx, [name]);
    if (result.tag === "Fail") {
      failures.push(...result.failures);
    } else if (result.value !== ABSENT) {
      args[name] = result.value;
    }
  }

  return failures.length > 0 ? fail(failures) : done(args);
}
