import type { ScalarInput } from "../input/raw";
import { printRaw, valueFromRaw } from "../input/raw";
import { parsed, rejected, scalarType, type ParseResult, type ScalarType } from "./types";

const MAX_INT = 2147483647;
const MIN_INT = -2147483648;

function isInt32(n: number): boolean {
  return Number.isInteger(n) && n >= MIN_INT && n <= MAX_INT;
}

export const IntType: ScalarType = scalarType({
  name: "Int",
  description: "Signed 32-bit integer",
  parse(input) {
    if (input.tag === "LiteralInt" || (input.tag === "External" && typeof input.value === "number")) {
      const n = input.tag === "LiteralInt" ? Number(input.value) : input.value;
      if (typeof n === "number" && isInt32(n)) return parsed(n);
      if (typeof n === "number" && !Number.isInteger(n)) {
        return rejected(`Int cannot represent non-integer value ${printRaw(input)}`);
      }
      return rejected(`Int cannot represent non 32-bit signed integer value ${printRaw(input)}`);
    }
    return rejected(`Int cannot represent non-integer value ${printRaw(input)}`);
  },
  serialize(value) {
    if (typeof value === "number" && isInt32(value)) return value;
    throw new Error(`Int cannot represent value ${String(value)}`);
  },
});

export const FloatType: ScalarType = scalarType({
  name: "Float",
  description: "Double-precision floating point number",
  parse(input) {
    if (input.tag === "LiteralInt" || input.tag === "LiteralFloat") {
      return parsed(Number(input.value));
    }
    if (input.tag === "External" && typeof input.value === "number" && Number.isFinite(input.value)) {
      return parsed(input.value);
    }
    return rejected(`Float cannot represent non numeric value ${printRaw(input)}`);
  },
  serialize(value) {
    if (typeof value === "number" && Number.isFinite(value)) return value;
    throw new Error(`Float cannot represent value ${String(value)}`);
  },
});

export const StringType: ScalarType = scalarType({
  name: "String",
  parse(input) {
    if (input.tag === "LiteralString") return parsed(input.value);
    if (input.tag === "External" && typeof input.value === "string") return parsed(input.value);
    return rejected(`String cannot represent a non string value ${printRaw(input)}`);
  },
  serialize(value) {
    if (typeof value === "string") return value;
    if (typeof value === "number" || typeof value === "boolean") return String(value);
    throw new Error(`String cannot represent value ${String(value)}`);
  },
});

export const BooleanType: ScalarType = scalarType({
  name: "Boolean",
  parse(input) {
    if (input.tag === "LiteralBoolean") return parsed(input.value);
    if (input.tag === "External" && typeof input.value === "boolean") return parsed(input.value);
    return rejected(`Boolean cannot represent a non boolean value ${printRaw(input)}`);
  },
  serialize(value) {
    if (typeof value === "boolean") return value;
    throw new Error(`Boolean cannot represent value ${String(value)}`);
  },
});

export const IDType: ScalarType = scalarType({
  name: "ID",
  description: "Opaque identifier, written as a string or an integer",
  parse(input) {
    if (input.tag === "LiteralString" || input.tag === "LiteralInt") return parsed(input.value);
    if (input.tag === "External") {
      if (typeof input.value === "string") return parsed(input.value);
      if (typeof input.value === "number" && Number.isInteger(input.value)) return parsed(String(input.value));
    }
    return rejected(`ID cannot represent value ${printRaw(input)}`);
  },
  serialize(value) {
    if (typeof value === "string") return value;
    if (typeof value === "number" && Number.isInteger(value)) return String(value);
    throw new Error(`ID cannot represent value ${String(value)}`);
  },
});

export const BUILTIN_SCALARS: readonly ScalarType[] = [IntType, FloatType, StringType, BooleanType, IDType];

/**
 * Declare a scalar whose parser sees the plain JS form of its input, whether it
 * was written inline or supplied as a variable.
 */
export function defineScalar(spec: {
  name: string;
  description?: string;
  parseValue: (value: unknown) => ParseResult;
  serialize: (value: unknown) => unknown;
}): ScalarType {
  return scalarType({
    name: spec.name,
    description: spec.description,
    parse: (input: ScalarInput) => spec.parseValue(valueFromRaw(input)),
    serialize: spec.serialize,
  });
}
