import { describe, it, expect } from "vitest";
import { IntType, StringType, enumType, inputObject, listOf, nonNull, serializeResult } from "../../src";

const Priority = enumType({ name: "Priority", values: { LOW: { value: 1 }, HIGH: { value: 2 } } });

describe("serializeResult", () => {
  it("serializes scalars and lists element by element", () => {
    expect(serializeResult(listOf(IntType), [1, null, 3])).toEqual([1, null, 3]);
    expect(serializeResult(StringType, 12)).toBe("12");
  });

  it("maps enum values back to their names", () => {
    expect(serializeResult(listOf(Priority), [2, 1])).toEqual(["HIGH", "LOW"]);
    expect(() => serializeResult(Priority, 3)).toThrow("Enum Priority cannot represent value 3");
  });

  it("lets null through nullable positions only", () => {
    expect(serializeResult(IntType, undefined)).toBeNull();
    expect(() => serializeResult(nonNull(listOf(IntType)), null)).toThrow(
      "Cannot return null for non-nullable type [Int]!"
    );
  });

  it("rejects a non-list value for a list type", () => {
    expect(() => serializeResult(listOf(IntType), 4)).toThrow("Expected a list for type [Int]");
  });

  it("rejects input object types", () => {
    const Filter = inputObject({ name: "Filter", fields: {} });
    expect(() => serializeResult(Filter, {})).toThrow("Input object type Filter cannot be returned from a field");
  });
});
