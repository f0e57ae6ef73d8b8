import { describe, it, expect } from "vitest";
import { parseType } from "graphql";
import {
  IntType,
  StringType,
  defineSchema,
  done,
  enumType,
  inputObject,
  listOf,
  nonNull,
  printType,
  typeFromAst,
} from "../../src";

const Color = enumType({ name: "Color", values: ["RED", "GREEN"] });
const Filter = inputObject({
  name: "Filter",
  fields: { color: { type: Color }, limit: { type: IntType, defaultValue: 10 } },
});

const schema = defineSchema({
  query: {
    items: {
      type: listOf(StringType),
      args: { filter: { type: nonNull(Filter) } },
      resolve: () => done([]),
    },
  },
});

describe("defineSchema", () => {
  it("indexes built-in scalars and every type reachable from arguments", () => {
    expect([...schema.types.keys()]).toEqual(["Int", "Float", "String", "Boolean", "ID", "Filter", "Color"]);
  });

  it("freezes the declared fields", () => {
    const field = schema.query.get("items");
    expect(Object.isFrozen(field)).toBe(true);
    expect(Object.isFrozen(field?.args)).toBe(true);
    expect(Object.isFrozen(Filter.fields())).toBe(true);
  });

  it("rejects two different types with the same name", () => {
    const other = enumType({ name: "Color", values: ["BLUE"] });
    expect(() =>
      defineSchema({ query: { a: { type: Color, resolve: () => done("RED") } }, types: [other] })
    ).toThrow('Schema defines two different types named "Color"');
  });

  it("rejects input objects as field results", () => {
    expect(() => defineSchema({ query: { f: { type: Filter, resolve: () => done({}) } } })).toThrow(
      'Field "f" cannot return input object type "Filter"'
    );
  });
});

describe("typeFromAst", () => {
  it("builds wrapped descriptors from a type reference", () => {
    const type = typeFromAst(schema, parseType("[Filter!]!"));
    expect(type === undefined ? undefined : printType(type)).toBe("[Filter!]!");
  });

  it("returns the registered descriptor for a named type", () => {
    expect(typeFromAst(schema, parseType("Color"))).toBe(Color);
  });

  it("returns undefined for an unknown name", () => {
    expect(typeFromAst(schema, parseType("[Missing]"))).toBeUndefined();
  });
});

describe("enumType", () => {
  it("maps names to their internal values", () => {
    const Priority = enumType({ name: "Priority", values: { LOW: { value: 1 }, HIGH: {} } });
    expect(Priority.values).toEqual([
      { name: "LOW", value: 1 },
      { name: "HIGH", value: "HIGH" },
    ]);
  });
});
