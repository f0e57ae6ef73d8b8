import { describeFailure, type CoercionFailure } from "../outcome/failure";

/** A field-scoped error as it appears in the response's error list. */
export interface FieldError {
  readonly message: string;
  /** Response key of the failed field. */
  readonly path?: readonly string[];
  /** Diagnostic codes of the merged failures. */
  readonly extensions?: { readonly codes: readonly string[] };
}

/**
 * Merge every failure recorded for one field into a single error.
 */
export function report(
  fieldName: string,
  failures: readonly CoercionFailure[],
  responseKey: string = fieldName
): FieldError {
  const detail = failures.map(describeFailure).join("; ");
  return {
    ...fieldError(fieldName, detail, responseKey),
    extensions: { codes: failures.map(f => f.diagnostic.code) },
  };
}

export function fieldError(fieldName: string, detail: string, responseKey: string = fieldName): FieldError {
  return { message: `Field \`${fieldName}': ${detail}`, path: [responseKey] };
}

/** An error that belongs to the whole request rather than to one field. */
export interface RequestError {
  readonly message: string;
}

export type ResponseError = FieldError | RequestError;

export function requestError(message: string): RequestError {
  return { message };
}

/**
 * Render an arguments map the way resolver messages quote it: `%{}`, `%{flag: true}`.
 */
export function inspectArguments(args: Readonly<Record<string, unknown>>): string {
  return inspectValue(args);
}

function inspectValue(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(inspectValue).join(", ")}]`;
  }
  if (typeof value === "string") {
    return JSON.stringify(value);
  }
  if (value !== null && typeof value === "object") {
    const entries = Object.entries(value).map(([k, v]) => `${k}: ${inspectValue(v)}`);
    return `%{${entries.join(", ")}}`;
  }
  if (value === null || value === undefined) {
    return "null";
  }
  return String(value);
}
