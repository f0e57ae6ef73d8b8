import type { Done, Fail } from "./outcome";
import { failure, type CoercionFailure } from "./failure";

export function done<A>(value: A): Done<A> {
  return { tag: "Done", value };
}

export const ok = done;

export function fail(failures: readonly CoercionFailure[]): Fail {
  return { tag: "Fail", failures };
}

/**
 * Resolver-side failure for an arguments map that lacks what the resolver needs.
 */
export function argumentMismatch(reason: string): Fail {
  return fail([failure("R0200", [], { reason })]);
}

export function resolverFailed(reason: string): Fail {
  return fail([failure("R0201", [], { reason })]);
}
