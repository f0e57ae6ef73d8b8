// Pre-coercion value shapes. Literal* cases come from query text, External from
// variable maps and schema defaults.

export interface LiteralInt { readonly tag: "LiteralInt"; readonly value: string }
export interface LiteralFloat { readonly tag: "LiteralFloat"; readonly value: string }
export interface LiteralString { readonly tag: "LiteralString"; readonly value: string }
export interface LiteralBoolean { readonly tag: "LiteralBoolean"; readonly value: boolean }
export interface LiteralEnum { readonly tag: "LiteralEnum"; readonly name: string }
export interface LiteralNull { readonly tag: "LiteralNull" }

export interface LiteralList { readonly tag: "LiteralList"; readonly items: readonly RawValue[] }
export interface LiteralObject {
  readonly tag: "LiteralObject";
  readonly fields: ReadonlyArray<{ readonly name: string; readonly value: RawValue }>;
}

export interface VariableRef { readonly tag: "VariableRef"; readonly name: string }

/** Not supplied at all. Distinct from an explicit null. */
export interface Absent { readonly tag: "Absent" }

/** A value supplied out of band; read structurally, never contains variable references. */
export interface External { readonly tag: "External"; readonly value: unknown }

export type RawValue =
  | LiteralInt | LiteralFloat | LiteralString | LiteralBoolean | LiteralEnum
  | LiteralList | LiteralObject
  | LiteralNull
  | VariableRef
  | Absent
  | External;

/** What a scalar's parse function receives: anything but null, absence or a bare variable. */
export type ScalarInput = Exclude<RawValue, LiteralNull | Absent | VariableRef>;

export const ABSENT_RAW: Absent = Object.freeze({ tag: "Absent" });
export const NULL_RAW: LiteralNull = Object.freeze({ tag: "LiteralNull" });

export function external(value: unknown): RawValue {
  if (value === undefined) return ABSENT_RAW;
  return { tag: "External", value };
}

export function isNullish(raw: RawValue): boolean {
  return raw.tag === "LiteralNull" || (raw.tag === "External" && raw.value === null);
}

export function isPlainObject(value: unknown): value is Readonly<Record<string, unknown>> {
  if (value === null || typeof value !== "object" || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Plain JS form of a raw value: numbers for numeric literals, enum names as strings,
 * arrays and objects for lists and object literals. Variables read from `variables`.
 */
export function valueFromRaw(
  raw: RawValue,
  variables: Readonly<Record<string, unknown>> = {}
): unknown {
  switch (raw.tag) {
    case "LiteralInt":
    case "LiteralFloat":
      return Number(raw.value);
    case "LiteralString":
    case "LiteralBoolean":
      return raw.value;
    case "LiteralEnum":
      return raw.name;
    case "LiteralNull":
      return null;
    case "LiteralList":
      return raw.items.map(item => valueFromRaw(item, variables));
    case "LiteralObject": {
      const out: Record<string, unknown> = {};
      for (const field of raw.fields) {
        out[field.name] = valueFromRaw(field.value, variables);
      }
      return out;
    }
    case "VariableRef":
      return variables[raw.name];
    case "Absent":
      return undefined;
    case "External":
      return raw.value;
  }
}

/** Render a raw value in query syntax. */
export function printRaw(raw: RawValue): string {
  switch (raw.tag) {
    case "LiteralInt":
    case "LiteralFloat":
      return raw.value;
    case "LiteralString":
      return JSON.stringify(raw.value);
    case "LiteralBoolean":
      return String(raw.value);
    case "LiteralEnum":
      return raw.name;
    case "LiteralNull":
      return "null";
    case "LiteralList":
      return `[${raw.items.map(printRaw).join(", ")}]`;
    case "LiteralObject":
      return `{${raw.fields.map(f => `${f.name}: ${printRaw(f.value)}`).join(", ")}}`;
    case "VariableRef":
      return `$${raw.name}`;
    case "Absent":
      return "nothing";
    case "External":
      return printExternal(raw.value);
  }
}

function printExternal(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(printExternal).join(", ")}]`;
  }
  if (isPlainObject(value)) {
    return `{${Object.entries(value).map(([k, v]) => `${k}: ${printExternal(v)}`).join(", ")}}`;
  }
  if (value === undefined) return "undefined";
  return typeof value === "string" ? JSON.stringify(value) : String(value);
}
