import type { ScalarInput } from "../input/raw";

/** Result of a scalar's parse function. */
export type ParseResult =
  | { readonly ok: true; readonly value: unknown }
  | { readonly ok: false; readonly reason: string };

export function parsed(value: unknown): ParseResult {
  return { ok: true, value };
}

export function rejected(reason: string): ParseResult {
  return { ok: false, reason };
}

export interface ScalarType {
  readonly tag: "Scalar";
  readonly name: string;
  readonly description?: string;
  /** Must accept every legal input shape for this scalar or reject it. */
  readonly parse: (input: ScalarInput) => ParseResult;
  readonly serialize: (value: unknown) => unknown;
}

export interface EnumValue {
  readonly name: string;
  /** Value handed to resolvers. Defaults to the symbol name. */
  readonly value: unknown;
}

export interface EnumType {
  readonly tag: "Enum";
  readonly name: string;
  readonly description?: string;
  readonly values: readonly EnumValue[];
}

export interface InputFieldDefinition {
  readonly type: InputType;
  /** External (JSON-like) value, coerced like a supplied value when the position is absent. */
  readonly defaultValue?: unknown;
  readonly description?: string;
}

export type InputFieldMap = Readonly<Record<string, InputFieldDefinition>>;

export interface InputObjectType {
  readonly tag: "InputObject";
  readonly name: string;
  readonly description?: string;
  /** Declared fields, in declaration order. */
  readonly fields: () => InputFieldMap;
}

export interface ListType {
  readonly tag: "List";
  readonly of: InputType;
}

export interface NonNullType {
  readonly tag: "NonNull";
  readonly of: NullableType;
}

export type NamedType = ScalarType | EnumType | InputObjectType;
export type NullableType = NamedType | ListType;
export type InputType = NullableType | NonNullType;

export function listOf(of: InputType): ListType {
  const type: ListType = { tag: "List", of };
  return Object.freeze(type);
}

export function nonNull(of: NullableType): NonNullType {
  const type: NonNullType = { tag: "NonNull", of };
  return Object.freeze(type);
}

export function enumType(spec: {
  name: string;
  description?: string;
  values: readonly string[] | Readonly<Record<string, { value?: unknown }>>;
}): EnumType {
  const values: EnumValue[] = isNameList(spec.values)
    ? spec.values.map(name => Object.freeze({ name, value: name }))
    : Object.entries(spec.values).map(([name, def]) =>
        Object.freeze({ name, value: "value" in def ? def.value : name })
      );

  const type: EnumType = {
    tag: "Enum",
    name: spec.name,
    description: spec.description,
    values: Object.freeze(values),
  };
  return Object.freeze(type);
}

function isNameList(
  values: readonly string[] | Readonly<Record<string, { value?: unknown }>>
): values is readonly string[] {
  return Array.isArray(values);
}

/**
 * Declare an input object. Pass `fields` as a thunk when the object refers to itself;
 * it is evaluated once, on first use.
 */
export function inputObject(spec: {
  name: string;
  description?: string;
  fields: InputFieldMap | (() => InputFieldMap);
}): InputObjectType {
  const source = spec.fields;
  let resolved: InputFieldMap | undefined;

  const fields = (): InputFieldMap => {
    if (resolved === undefined) {
      const map = typeof source === "function" ? source() : source;
      const frozen: Record<string, InputFieldDefinition> = {};
      for (const [name, def] of Object.entries(map)) {
        frozen[name] = Object.freeze({ ...def });
      }
      resolved = Object.freeze(frozen);
    }
    return resolved;
  };

  const type: InputObjectType = {
    tag: "InputObject",
    name: spec.name,
    description: spec.description,
    fields,
  };
  return Object.freeze(type);
}

/**
 * Declare a scalar with full control over literal and external input shapes.
 */
export function scalarType(spec: Omit<ScalarType, "tag">): ScalarType {
  const type: ScalarType = { tag: "Scalar", ...spec };
  return Object.freeze(type);
}

export function namedType(type: InputType): NamedType {
  switch (type.tag) {
    case "List":
    case "NonNull":
      return namedType(type.of);
    case "Scalar":
    case "Enum":
    case "InputObject":
      return type;
  }
}

/** Render a type in query syntax, e.g. `[Int!]!`. */
export function printType(type: InputType): string {
  switch (type.tag) {
    case "List":
      return `[${printType(type.of)}]`;
    case "NonNull":
      return `${printType(type.of)}!`;
    case "Scalar":
    case "Enum":
    case "InputObject":
      return type.name;
  }
}
