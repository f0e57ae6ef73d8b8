import type { FieldType } from "../schema/schema";
import { printType } from "../schema/types";

/**
 * Render a resolver's result through the field's return type.
 * Throws when the value cannot be represented; the caller reports it on the field.
 */
export function serializeResult(type: FieldType, value: unknown): unknown {
  switch (type.tag) {
    case "NonNull":
      if (value === null || value === undefined) {
        throw new Error(`Cannot return null for non-nullable type ${printType(type)}`);
      }
      return serializeResult(type.of, value);
    case "List":
      if (value === null || value === undefined) return null;
      if (!Array.isArray(value)) {
        throw new Error(`Expected a list for type ${printType(type)}`);
      }
      return value.map((item: unknown) => serializeResult(type.of, item));
    case "Scalar":
      return value === null || value === undefined ? null : type.serialize(value);
    case "Enum": {
      if (value === null || value === undefined) return null;
      const match = type.values.find(v => v.value === value);
      if (match === undefined) {
        throw new Error(`Enum ${type.name} cannot represent value ${String(value)}`);
      }
      return match.name;
    }
    case "InputObject":
      throw new Error(`Input object type ${type.name} cannot be returned from a field`);
  }
}
