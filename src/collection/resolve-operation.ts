import type { Document, Filter } from "mongodb";
import { inspect } from "node:util";
import type {
  CountOperation,
  DeleteOperation,
  QueryOperation,
} from "../contracts/operations.contract";

/**
 * Render an operation value for error messages.
 *
 * Never throws: a value whose inspection fails (a throwing getter or custom
 * inspector, for instance) is rendered as a placeholder.
 */
export function describeOperation(operation: unknown): string {
  try {
    return inspect(operation, { depth: 4, breakLength: Infinity, getters: false });
  } catch {
    return "<unrenderable operation>";
  }
}

function hasMethod(value: object, name: string): boolean {
  return typeof Reflect.get(value, name) === "function";
}

export type CountInput<T> = CountOperation<T> | Filter<Document>;

export type DeleteInput<T> = DeleteOperation<T> | Filter<Document>;

export type QueryInput<T, Output> = QueryOperation<T, Output> | Filter<Document>;

/**
 * Whether the value is a count operation rather than a bare filter document.
 */
export function isCountOperation<T>(input: CountInput<T>): input is CountOperation<T> {
  return hasMethod(input, "filter") || hasMethod(input, "options");
}

export function isDeleteOperation<T>(input: DeleteInput<T>): input is DeleteOperation<T> {
  return hasMethod(input, "filter");
}

export function isQueryOperation<T, Output>(
  input: QueryInput<T, Output>,
): input is QueryOperation<T, Output> {
  return "output" in input && typeof input.output === "object" && input.output !== null &&
    hasMethod(input.output, "safeParse");
}

/**
 * Treat a bare filter document as a count operation.
 */
export function countOperation<T>(input: CountInput<T>): CountOperation<T> {
  if (isCountOperation(input)) {
    return input;
  }

  return { filter: () => input };
}

export function deleteOperation<T>(input: DeleteInput<T>): DeleteOperation<T> {
  if (isDeleteOperation(input)) {
    return input;
  }

  return { filter: () => input };
}
