import type { Outcome, Done, Fail } from "./outcome";
import type { CoercionFailure } from "./failure";
import { done, fail } from "./constructors";

export function match<A, R>(
  outcome: Outcome<A>,
  handlers: {
    done: (d: Done<A>) => R;
    fail: (f: Fail) => R;
  }
): R {
  switch (outcome.tag) {
    case "Done":
      return handlers.done(outcome);
    case "Fail":
      return handlers.fail(outcome);
  }
}

export function mapOutcome<A, B>(o: Outcome<A>, fn: (a: A) => B): Outcome<B> {
  return o.tag === "Done" ? done(fn(o.value)) : o;
}

/**
 * Collect every outcome: all values when each succeeded, otherwise every failure in order.
 */
export function combine<A>(outcomes: readonly Outcome<A>[]): Outcome<A[]> {
  const values: A[] = [];
  const failures: CoercionFailure[] = [];
  for (const o of outcomes) {
    if (o.tag === "Done") {
      values.push(o.value);
    } else {
      failures.push(...o.failures);
    }
  }
  return failures.length > 0 ? fail(failures) : done(values);
}

export function unwrap<A>(o: Outcome<A>): A {
  if (o.tag === "Done") {
    return o.value;
  }
  throw new Error(o.failures.map(f => f.reason).join("; "));
}

export function unwrapOr<A>(o: Outcome<A>, defaultValue: A): A {
  return o.tag === "Done" ? o.value : defaultValue;
}
