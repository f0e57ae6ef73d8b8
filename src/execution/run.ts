import { GraphQLError, parse } from "graphql";
import type { DocumentNode } from "graphql";
import { coerceArguments } from "../coercion/arguments";
import { coercionContext, type CoercionContext } from "../coercion/context";
import { loadConfig, type CoercionConfig } from "../config/config";
import { fieldError, report, requestError, type FieldError, type ResponseError } from "../errors/aggregate";
import { createLogger, type Logger } from "../log/logger";
import { resolverFailed } from "../outcome/constructors";
import type { Outcome } from "../outcome/outcome";
import type { Schema } from "../schema/schema";
import { prepareOperation, type FieldSelection } from "./document";
import { serializeResult } from "./serialize";

export interface RunOptions {
  schema: Schema;
  /** Query text, or a document already parsed. */
  source: string | DocumentNode;
  variables?: Readonly<Record<string, unknown>>;
  operationName?: string;
  /** Overrides applied on top of the environment and any config file. */
  config?: Partial<CoercionConfig>;
  logger?: Logger;
}

export interface ExecutionResult {
  /** Absent only when the request failed before any field ran. */
  data?: Record<string, unknown>;
  errors?: ResponseError[];
}

type FieldResult =
  | { tag: "Data"; responseKey: string; value: unknown }
  | { tag: "Error"; error: FieldError };

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Run the top-level fields of a query operation.
 *
 * Each field's arguments are coerced independently; a field whose arguments or
 * resolver fail contributes one error and no data, and its siblings still run.
 */
export async function runQuery(options: RunOptions): Promise<ExecutionResult> {
  const config = loadConfig({ overrides: options.config });
  const logger = options.logger ?? createLogger("runQuery", config.logLevel);
  const variables = options.variables ?? {};

  let document: DocumentNode;
  if (typeof options.source === "string") {
    try {
      document = parse(options.source);
    } catch (e) {
      if (!(e instanceof GraphQLError)) throw e;
      logger.warn(`rejected query: ${e.message}`);
      return { errors: [requestError(e.message)] };
    }
  } else {
    document = options.source;
  }

  const prepared = prepareOperation(options.schema, document, options.operationName);
  if (prepared.tag === "Rejected") {
    logger.warn(`rejected operation: ${prepared.message}`);
    return { errors: [requestError(prepared.message)] };
  }

  const ctx = coercionContext(variables, prepared.variables);
  const results = await Promise.all(
    prepared.fields.map(selection => runField(options.schema, selection, ctx, config, logger))
  );

  const data: Record<string, unknown> = {};
  const errors: FieldError[] = [];
  for (const result of results) {
    if (result.tag === "Data") {
      data[result.responseKey] = result.value;
    } else {
      errors.push(result.error);
    }
  }

  return errors.length > 0 ? { data, errors } : { data };
}

async function runField(
  schema: Schema,
  selection: FieldSelection,
  ctx: CoercionContext,
  config: CoercionConfig,
  logger: Logger
): Promise<FieldResult> {
  const { name, responseKey } = selection;
  const field = schema.query.get(name);
  if (field === undefined) {
    logger.info(`unknown field "${name}"`);
    return { tag: "Error", error: fieldError(name, "not defined on the query type", responseKey) };
  }

  const args = coerceArguments(field.args ?? {}, selection.arguments, ctx, config);
  if (args.tag === "Fail") {
    const error = report(name, args.failures, responseKey);
    logger.info(`argument coercion failed for "${name}"`, { message: error.message });
    return { tag: "Error", error };
  }
  logger.debug(`coerced arguments for "${name}"`, { args: args.value });

  let outcome: Outcome<unknown>;
  try {
    outcome = await field.resolve(args.value, { fieldName: name, responseKey, variables: ctx.variables });
  } catch (e) {
    outcome = resolverFailed(errorMessage(e));
  }

  if (outcome.tag === "Fail") {
    const error = report(name, outcome.failures, responseKey);
    logger.info(`resolver failed for "${name}"`, { message: error.message });
    return { tag: "Error", error };
  }

  try {
    return { tag: "Data", responseKey, value: serializeResult(field.type, outcome.value) };
  } catch (e) {
    const error = fieldError(name, errorMessage(e), responseKey);
    logger.info(`serialization failed for "${name}"`, { message: error.message });
    return { tag: "Error", error };
  }
}
