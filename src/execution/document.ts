import { Kind, OperationTypeNode } from "graphql";
import type { DocumentNode, OperationDefinitionNode } from "graphql";
import type { VariableDefinition } from "../coercion/context";
import { normalize, normalizeArguments } from "../input/normalize";
import type { RawValue } from "../input/raw";
import { typeFromAst, type Schema } from "../schema/schema";

export interface FieldSelection {
  readonly name: string;
  readonly responseKey: string;
  readonly arguments: ReadonlyMap<string, RawValue>;
}

export interface PreparedOperation {
  readonly tag: "Prepared";
  readonly name?: string;
  readonly variables: readonly VariableDefinition[];
  readonly fields: readonly FieldSelection[];
}

export interface RejectedOperation {
  readonly tag: "Rejected";
  readonly message: string;
}

function rejectOperation(message: string): RejectedOperation {
  return { tag: "Rejected", message };
}

function selectOperation(
  document: DocumentNode,
  operationName: string | undefined
): OperationDefinitionNode | string {
  const operations = document.definitions.filter(
    (def): def is OperationDefinitionNode => def.kind === Kind.OPERATION_DEFINITION
  );

  if (operationName !== undefined) {
    return operations.find(op => op.name?.value === operationName) ?? `Unknown operation named "${operationName}"`;
  }
  if (operations.length === 1) {
    return operations[0];
  }
  return operations.length === 0
    ? "Must provide an operation"
    : "Must provide operation name if query contains multiple operations";
}

/**
 * Pick the operation to run and translate its variable declarations and top-level
 * field selections into coercer inputs.
 */
export function prepareOperation(
  schema: Schema,
  document: DocumentNode,
  operationName?: string
): PreparedOperation | RejectedOperation {
  const operation = selectOperation(document, operationName);
  if (typeof operation === "string") {
    return rejectOperation(operation);
  }
  if (operation.operation !== OperationTypeNode.QUERY) {
    return rejectOperation(`Only query operations are supported, got ${operation.operation}`);
  }

  const variables: VariableDefinition[] = [];
  for (const def of operation.variableDefinitions ?? []) {
    const name = def.variable.name.value;
    const type = typeFromAst(schema, def.type);
    if (type === undefined) {
      return rejectOperation(`Variable "$${name}" has unknown type`);
    }
    // The parser only admits constant default values.
    const defaultValue = def.defaultValue === undefined ? undefined : normalize(def.defaultValue);
    variables.push({ name, type, defaultValue });
  }

  const fields: FieldSelection[] = [];
  for (const selection of operation.selectionSet.selections) {
    if (selection.kind !== Kind.FIELD) {
      return rejectOperation("Only field selections are supported at the top level");
    }
    fields.push({
      name: selection.name.value,
      responseKey: selection.alias?.value ?? selection.name.value,
      arguments: normalizeArguments(selection.arguments),
    });
  }

  return {
    tag: "Prepared",
    name: operation.name?.value,
    variables,
    fields,
  };
}
