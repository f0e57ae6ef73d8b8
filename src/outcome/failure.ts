import type { Diagnostic } from "./diagnostic";
import { kindOfCode, makeDiagnostic, type DiagnosticCode } from "./codes";

export type FailureKind =
  | "missing-required-variable"
  | "value-required"
  | "scalar-coercion-failed"
  | "invalid-enum-value"
  | "shape-mismatch"
  | "resolution-argument-mismatch"
  | "resolver-failed";

/** A field name or a list index. */
export type PathSegment = string | number;

export interface CoercionFailure {
  readonly kind: FailureKind;
  /** Argument path, rooted at the argument name. Empty for resolver-level failures. */
  readonly path: readonly PathSegment[];
  readonly reason: string;
  readonly diagnostic: Diagnostic;
}

export function failure(
  code: DiagnosticCode,
  path: readonly PathSegment[],
  params?: Record<string, string | number>
): CoercionFailure {
  const diagnostic = makeDiagnostic(code, params);
  return {
    kind: kindOfCode(code),
    path,
    reason: diagnostic.message,
    diagnostic,
  };
}

/**
 * Render a path as `contacts[1].email`.
 */
export function formatPath(path: readonly PathSegment[]): string {
  let out = "";
  for (const segment of path) {
    if (typeof segment === "number") {
      out += `[${segment}]`;
    } else {
      out += out.length === 0 ? segment : `.${segment}`;
    }
  }
  return out;
}

export function describeFailure(f: CoercionFailure): string {
  return f.path.length === 0 ? f.reason : `${formatPath(f.path)}: ${f.reason}`;
}
