import { describe, it, expect } from "vitest";
import {
  BooleanType,
  IntType,
  NULL_RAW,
  coerceArguments,
  coercionContext,
  nonNull,
  type ArgumentDefinition,
  type RawValue,
} from "../../src";

const declared: Record<string, ArgumentDefinition> = {
  id: { type: nonNull(IntType) },
  flag: { type: BooleanType, defaultValue: false },
  limit: { type: IntType },
};

const lenient = { enforceRequiredArguments: false };
const strict = { enforceRequiredArguments: true };

function supplied(entries: Record<string, RawValue>): ReadonlyMap<string, RawValue> {
  return new Map(Object.entries(entries));
}

describe("coerceArguments", () => {
  it("builds a map of the supplied and defaulted arguments", () => {
    const result = coerceArguments(declared, supplied({ id: { tag: "LiteralInt", value: "7" } }), coercionContext(), lenient);
    expect(result).toEqual({ tag: "Done", value: { id: 7, flag: false } });
  });

  it("omits absent arguments instead of setting them to null", () => {
    const result = coerceArguments(declared, supplied({ id: { tag: "LiteralInt", value: "7" } }), coercionContext(), lenient);
    expect(result.tag === "Done" && "limit" in result.value).toBe(false);
  });

  it("keeps an explicit null", () => {
    const result = coerceArguments(
      declared,
      supplied({ id: { tag: "LiteralInt", value: "1" }, flag: NULL_RAW, limit: NULL_RAW }),
      coercionContext(),
      lenient
    );
    expect(result).toEqual({ tag: "Done", value: { id: 1, flag: null, limit: null } });
  });

  it("leaves an omitted required argument to the resolver unless enforced", () => {
    expect(coerceArguments(declared, supplied({}), coercionContext(), lenient)).toEqual({
      tag: "Done",
      value: { flag: false },
    });

    const enforced = coerceArguments(declared, supplied({}), coercionContext(), strict);
    expect(enforced.tag === "Fail" ? enforced.failures.map(f => [f.kind, f.path]) : []).toEqual([
      ["value-required", ["id"]],
    ]);
  });

  it("still rejects an explicit null for a required argument", () => {
    const result = coerceArguments(declared, supplied({ id: NULL_RAW }), coercionContext(), lenient);
    expect(result.tag === "Fail" ? result.failures.map(f => f.reason) : []).toEqual([
      "Expected a value of non-null type Int!, found null",
    ]);
  });

  it("ignores arguments the field does not declare", () => {
    const result = coerceArguments(
      declared,
      supplied({ id: { tag: "LiteralInt", value: "2" }, other: { tag: "LiteralInt", value: "3" } }),
      coercionContext(),
      lenient
    );
    expect(result).toEqual({ tag: "Done", value: { id: 2, flag: false } });
  });

  it("collects failures from every argument", () => {
    const result = coerceArguments(
      declared,
      supplied({ id: { tag: "LiteralString", value: "x" }, limit: { tag: "LiteralBoolean", value: true } }),
      coercionContext(),
      lenient
    );
    expect(result.tag === "Fail" ? result.failures.map(f => f.path) : []).toEqual([["id"], ["limit"]]);
  });

  it("applies the argument default when a referenced variable is not supplied", () => {
    const result = coerceArguments(
      declared,
      supplied({ id: { tag: "LiteralInt", value: "1" }, flag: { tag: "VariableRef", name: "flag" } }),
      coercionContext({}, [{ name: "flag", type: BooleanType }]),
      lenient
    );
    expect(result).toEqual({ tag: "Done", value: { id: 1, flag: false } });
  });
});
