import { describe, it, expect } from "vitest";
import {
  ABSENT,
  IntType,
  coercionContext,
  listOf,
  nonNull,
  resolveVariable,
  type Outcome,
  type VariableDefinition,
} from "../../src";
import { isUnsuppliedVariable } from "../../src/coercion/variables";

const limit = (overrides: Partial<VariableDefinition> = {}): VariableDefinition => ({
  name: "limit",
  type: IntType,
  ...overrides,
});

function reasons(o: Outcome<unknown>): string[] {
  return o.tag === "Fail" ? o.failures.map(f => `${f.kind}: ${f.reason}`) : [];
}

describe("resolveVariable", () => {
  it("coerces a supplied value against the expected type", () => {
    const ctx = coercionContext({ limit: 25 }, [limit()]);
    expect(resolveVariable("limit", IntType, ctx)).toEqual({ tag: "Done", value: 25 });
  });

  it("coerces supplied values structurally", () => {
    const ctx = coercionContext({ ids: [1, 2, 3] });
    expect(resolveVariable("ids", listOf(IntType), ctx)).toEqual({ tag: "Done", value: [1, 2, 3] });
  });

  it("reports a supplied value of the wrong shape", () => {
    const ctx = coercionContext({ limit: "many" }, [limit()]);
    expect(reasons(resolveVariable("limit", IntType, ctx, ["limit"]))).toEqual([
      'scalar-coercion-failed: Expected type Int, found "many": Int cannot represent non-integer value "many"',
    ]);
  });

  it("uses the declared default literal when the variable is not supplied", () => {
    const ctx = coercionContext({}, [limit({ defaultValue: { tag: "LiteralInt", value: "5" } })]);
    expect(resolveVariable("limit", IntType, ctx)).toEqual({ tag: "Done", value: 5 });
  });

  it("fails when a non-null variable is not supplied", () => {
    const ctx = coercionContext({}, [limit({ type: nonNull(IntType) })]);
    expect(reasons(resolveVariable("limit", IntType, ctx))).toEqual([
      'missing-required-variable: Variable "$limit" of required type Int! was not provided',
    ]);
  });

  it("fails when a non-null variable is supplied as null", () => {
    const ctx = coercionContext({ limit: null }, [limit({ type: nonNull(IntType) })]);
    expect(reasons(resolveVariable("limit", IntType, ctx))).toEqual([
      "value-required: Expected a value of non-null type Int!, found null",
    ]);
  });

  it("treats an undefined entry as not supplied", () => {
    const ctx = coercionContext({ limit: undefined }, [limit()]);
    expect(resolveVariable("limit", IntType, ctx)).toEqual({ tag: "Done", value: ABSENT });
  });

  it("resolves an unsupplied nullable variable to ABSENT", () => {
    const ctx = coercionContext({}, [limit()]);
    expect(resolveVariable("limit", IntType, ctx)).toEqual({ tag: "Done", value: ABSENT });
  });

  it("treats an undeclared variable at a non-null position as required", () => {
    const ctx = coercionContext();
    expect(reasons(resolveVariable("limit", nonNull(IntType), ctx))).toEqual([
      'missing-required-variable: Variable "$limit" of required type Int! was not provided',
    ]);
  });
});

describe("isUnsuppliedVariable", () => {
  it("is true only for references that resolve to nothing", () => {
    const ref = { tag: "VariableRef", name: "limit" } as const;

    expect(isUnsuppliedVariable(ref, coercionContext())).toBe(true);
    expect(isUnsuppliedVariable(ref, coercionContext({}, [limit()]))).toBe(true);
    expect(isUnsuppliedVariable(ref, coercionContext({ limit: 1 }, [limit()]))).toBe(false);
    expect(isUnsuppliedVariable(ref, coercionContext({ limit: null }, [limit()]))).toBe(false);
    expect(
      isUnsuppliedVariable(ref, coercionContext({}, [limit({ defaultValue: { tag: "LiteralInt", value: "1" } })]))
    ).toBe(false);
    expect(isUnsuppliedVariable(ref, coercionContext({}, [limit({ type: nonNull(IntType) })]))).toBe(false);
    expect(isUnsuppliedVariable({ tag: "LiteralInt", value: "1" }, coercionContext())).toBe(false);
  });
});
