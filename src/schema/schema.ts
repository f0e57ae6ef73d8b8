import { Kind } from "graphql";
import type { ListTypeNode, NamedTypeNode, TypeNode } from "graphql";
import type { Outcome } from "../outcome/outcome";
import { BUILTIN_SCALARS } from "./scalars";
import {
  listOf,
  namedType,
  nonNull,
  type InputFieldDefinition,
  type InputType,
  type NamedType,
  type NullableType,
} from "./types";

export type ArgumentDefinition = InputFieldDefinition;

/** Arguments handed to a resolver. Only positions with a determined value are present. */
export type ArgumentMap = Readonly<Record<string, unknown>>;

export interface ResolveInfo {
  readonly fieldName: string;
  /** Response key: the alias when one was written, otherwise the field name. */
  readonly responseKey: string;
  readonly variables: Readonly<Record<string, unknown>>;
}

export type Resolver = (
  args: ArgumentMap,
  info: ResolveInfo
) => Outcome<unknown> | Promise<Outcome<unknown>>;

/** Return type of a query field. Built from scalars, enums, lists and non-null wrappers. */
export type FieldType = InputType;

export interface FieldDefinition {
  readonly type: FieldType;
  readonly args?: Readonly<Record<string, ArgumentDefinition>>;
  readonly resolve: Resolver;
  readonly description?: string;
}

export interface Schema {
  readonly query: ReadonlyMap<string, FieldDefinition>;
  readonly types: ReadonlyMap<string, NamedType>;
}

/**
 * Build an immutable schema. Every named type reachable from the query fields is
 * indexed by name so operation variables can refer to it.
 */
export function defineSchema(spec: {
  query: Readonly<Record<string, FieldDefinition>>;
  types?: readonly NamedType[];
}): Schema {
  const types = new Map<string, NamedType>();

  const collect = (type: InputType): void => {
    const named = namedType(type);
    const existing = types.get(named.name);
    if (existing !== undefined) {
      if (existing !== named) {
        throw new Error(`Schema defines two different types named "${named.name}"`);
      }
      return;
    }
    types.set(named.name, named);
    if (named.tag === "InputObject") {
      for (const field of Object.values(named.fields())) {
        collect(field.type);
      }
    }
  };

  for (const scalar of BUILTIN_SCALARS) collect(scalar);
  for (const type of spec.types ?? []) collect(type);

  const query = new Map<string, FieldDefinition>();
  for (const [name, field] of Object.entries(spec.query)) {
    const returned = namedType(field.type);
    if (returned.tag === "InputObject") {
      throw new Error(`Field "${name}" cannot return input object type "${returned.name}"`);
    }
    collect(field.type);
    for (const arg of Object.values(field.args ?? {})) {
      collect(arg.type);
    }
    query.set(name, Object.freeze({ ...field, args: Object.freeze({ ...field.args }) }));
  }

  return Object.freeze({ query, types });
}

/**
 * Descriptor for a variable's declared type, or undefined when it names an unknown type.
 */
export function typeFromAst(schema: Schema, node: TypeNode): InputType | undefined {
  if (node.kind === Kind.NON_NULL_TYPE) {
    const inner = nullableFromAst(schema, node.type);
    return inner === undefined ? undefined : nonNull(inner);
  }
  return nullableFromAst(schema, node);
}

function nullableFromAst(schema: Schema, node: NamedTypeNode | ListTypeNode): NullableType | undefined {
  if (node.kind === Kind.LIST_TYPE) {
    const inner = typeFromAst(schema, node.type);
    return inner === undefined ? undefined : listOf(inner);
  }
  return schema.types.get(node.name.value);
}
