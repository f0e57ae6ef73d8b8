import { Kind } from "graphql";
import type { ArgumentNode, ValueNode } from "graphql";
import type { RawValue } from "./raw";
import { NULL_RAW } from "./raw";

/**
 * Translate a parser value node into a RawValue.
 * Variable references are kept as references; the coercer resolves them
 * against the type expected at the position where they occur.
 */
export function normalize(node: ValueNode): RawValue {
  switch (node.kind) {
    case Kind.INT:
      return { tag: "LiteralInt", value: node.value };
    case Kind.FLOAT:
      return { tag: "LiteralFloat", value: node.value };
    case Kind.STRING:
      return { tag: "LiteralString", value: node.value };
    case Kind.BOOLEAN:
      return { tag: "LiteralBoolean", value: node.value };
    case Kind.ENUM:
      return { tag: "LiteralEnum", name: node.value };
    case Kind.NULL:
      return NULL_RAW;
    case Kind.LIST:
      return { tag: "LiteralList", items: node.values.map(normalize) };
    case Kind.OBJECT:
      return {
        tag: "LiteralObject",
        fields: node.fields.map(field => ({ name: field.name.value, value: normalize(field.value) })),
      };
    case Kind.VARIABLE:
      return { tag: "VariableRef", name: node.name.value };
  }
}

/**
 * Raw values of a field's supplied arguments, keyed by argument name.
 */
export function normalizeArguments(
  args: readonly ArgumentNode[] | undefined
): ReadonlyMap<string, RawValue> {
  const out = new Map<string, RawValue>();
  for (const arg of args ?? []) {
    out.set(arg.name.value, normalize(arg.value));
  }
  return out;
}
