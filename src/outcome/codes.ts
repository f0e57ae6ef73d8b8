import type { Diagnostic } from "./diagnostic";
import type { FailureKind } from "./failure";

interface DiagCodeDef {
  code: string;
  kind: FailureKind;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  C0100: {
    code: "C0100",
    kind: "missing-required-variable",
    template: "Variable \"${name}\" of required type {type} was not provided",
  },
  C0101: {
    code: "C0101",
    kind: "value-required",
    template: "Expected a value of non-null type {type}, found {actual}",
  },
  C0102: {
    code: "C0102",
    kind: "scalar-coercion-failed",
    template: "Expected type {type}, found {value}: {detail}",
  },
  C0103: {
    code: "C0103",
    kind: "invalid-enum-value",
    template: "Value {value} does not exist in enum {type}",
  },
  C0104: {
    code: "C0104",
    kind: "shape-mismatch",
    template: "Expected {expected} for type {type}, found {value}",
  },

  R0200: {
    code: "R0200",
    kind: "resolution-argument-mismatch",
    template: "{reason}",
  },
  R0201: {
    code: "R0201",
    kind: "resolver-failed",
    template: "{reason}",
  },
} as const satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(
  code: DiagnosticCode,
  params: Record<string, string | number> = {}
): Diagnostic {
  const def: DiagCodeDef = DIAGNOSTIC_CODES[code];

  let message = def.template;
  for (const [key, value] of Object.entries(params)) {
    message = message.replace(`{${key}}`, () => String(value));
  }

  return {
    code: def.code,
    message,
    data: params,
  };
}

export function kindOfCode(code: DiagnosticCode): FailureKind {
  return DIAGNOSTIC_CODES[code].kind;
}
