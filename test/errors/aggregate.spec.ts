import { describe, it, expect } from "vitest";
import { argumentMismatch, fieldError, inspectArguments, report, requestError } from "../../src";
import { failure } from "../../src/outcome/failure";

describe("report", () => {
  it("merges every failure of a field into one error", () => {
    const failures = [
      failure("C0101", ["contacts", 0, "email"], { type: "String!", actual: "null" }),
      failure("C0103", ["color"], { type: "Color", value: "PINK" }),
    ];
    expect(report("contacts", failures)).toEqual({
      message:
        "Field `contacts': contacts[0].email: Expected a value of non-null type String!, found null; " +
        "color: Value PINK does not exist in enum Color",
      path: ["contacts"],
      extensions: { codes: ["C0101", "C0103"] },
    });
  });

  it("uses the response key as the error path", () => {
    expect(report("user", argumentMismatch("Got %{} instead").failures, "me")).toEqual({
      message: "Field `user': Got %{} instead",
      path: ["me"],
      extensions: { codes: ["R0200"] },
    });
  });
});

describe("fieldError and requestError", () => {
  it("builds field-scoped and request-level errors", () => {
    expect(fieldError("nope", "not defined on the query type")).toEqual({
      message: "Field `nope': not defined on the query type",
      path: ["nope"],
    });
    expect(requestError("Must provide an operation")).toEqual({ message: "Must provide an operation" });
  });
});

describe("inspectArguments", () => {
  it("renders an empty map", () => {
    expect(inspectArguments({})).toBe("%{}");
  });

  it("renders nested values", () => {
    expect(inspectArguments({ flag: true, name: "a", ids: [1, null], filter: { limit: 2 } })).toBe(
      '%{flag: true, name: "a", ids: [1, null], filter: %{limit: 2}}'
    );
  });
});
