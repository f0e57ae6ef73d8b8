import { describe, it, expect } from "vitest";
import { ABSENT_RAW, NULL_RAW, external, printRaw, valueFromRaw, type RawValue } from "../../src";

const contact: RawValue = {
  tag: "LiteralObject",
  fields: [
    { name: "email", value: { tag: "LiteralString", value: "a@example.com" } },
    { name: "tags", value: { tag: "LiteralList", items: [{ tag: "LiteralEnum", name: "WORK" }, NULL_RAW] } },
  ],
};

describe("external", () => {
  it("treats undefined as absent", () => {
    expect(external(undefined)).toBe(ABSENT_RAW);
  });

  it("wraps anything else, including null", () => {
    expect(external(null)).toEqual({ tag: "External", value: null });
  });
});

describe("valueFromRaw", () => {
  it("converts literals to plain values", () => {
    expect(valueFromRaw(contact)).toEqual({ email: "a@example.com", tags: ["WORK", null] });
    expect(valueFromRaw({ tag: "LiteralFloat", value: "2.5" })).toBe(2.5);
  });

  it("reads variables from the supplied map", () => {
    expect(valueFromRaw({ tag: "VariableRef", name: "n" }, { n: 3 })).toBe(3);
    expect(valueFromRaw({ tag: "VariableRef", name: "n" })).toBeUndefined();
  });

  it("returns external values unchanged", () => {
    const value = { nested: [1] };
    expect(valueFromRaw(external(value))).toBe(value);
  });
});

describe("printRaw", () => {
  it("renders literals in query syntax", () => {
    expect(printRaw(contact)).toBe('{email: "a@example.com", tags: [WORK, null]}');
    expect(printRaw({ tag: "VariableRef", name: "id" })).toBe("$id");
    expect(printRaw(ABSENT_RAW)).toBe("nothing");
  });

  it("renders external values the same way", () => {
    expect(printRaw(external({ email: "a@example.com", ids: [1, 2] }))).toBe(
      '{email: "a@example.com", ids: [1, 2]}'
    );
    expect(printRaw(external(true))).toBe("true");
  });
});
