import { Binary, Decimal128, Double, Int32, Long, ObjectId, Timestamp } from "mongodb";
import type { Document } from "mongodb";
import { OdmError } from "../errors/odm.error";
import { bsonKindOf, isDocument } from "./bson-kind";

/**
 * Field extraction helpers for writing `transform()` implementations.
 *
 * Each helper removes the value stored under `key` and returns it, provided it
 * has the expected BSON type. A missing key fails with `MissingDocumentField`,
 * a value of another type fails with `IllTypedDocumentField`; in both cases
 * the document is left untouched.
 *
 * @example
 * ```typescript
 * transform(raw: Document) {
 *   const stats = removeInnerDocument(raw, "stats");
 *
 *   return { total: removeNumber(stats, "total") };
 * }
 * ```
 */

type Guard<Value> = (value: unknown) => value is Value;

export type NumericValue = number | bigint | Int32 | Long | Double | Decimal128;

function hasKey(document: Document, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(document, key);
}

function removeWhere<Value>(
  document: Document,
  key: string,
  description: string,
  guard: Guard<Value>,
): Value {
  if (!hasKey(document, key)) {
    throw new OdmError(
      "MissingDocumentField",
      `error removing ${description} value for key \`${key}\`: key not found`,
    );
  }

  const value: unknown = document[key];

  if (!guard(value)) {
    throw new OdmError(
      "IllTypedDocumentField",
      `error removing ${description} value for key \`${key}\`: found ${bsonKindOf(value)}`,
    );
  }

  delete document[key];

  return value;
}

const isAnything = (value: unknown): value is unknown => true;

const isBool = (value: unknown): value is boolean => typeof value === "boolean";

const isInt32 = (value: unknown): value is number | Int32 => bsonKindOf(value) === "int";

// the driver promotes stored longs and doubles to plain numbers on read
const isInt64 = (value: unknown): value is bigint | Long | number =>
  Number.isSafeInteger(value) || bsonKindOf(value) === "long";

const isDouble = (value: unknown): value is number | Double =>
  typeof value === "number" || value instanceof Double;

const isNumeric = (value: unknown): value is NumericValue =>
  isInt32(value) || isInt64(value) || isDouble(value) || value instanceof Decimal128;

const isString = (value: unknown): value is string => typeof value === "string";

const isArray = (value: unknown): value is unknown[] => Array.isArray(value);

const isObjectId = (value: unknown): value is ObjectId => value instanceof ObjectId;

const isDate = (value: unknown): value is Date => value instanceof Date;

const isTimestamp = (value: unknown): value is Timestamp => value instanceof Timestamp;

const isGenericBinary = (value: unknown): value is Binary | Uint8Array =>
  (value instanceof Binary && value.sub_type === Binary.SUBTYPE_DEFAULT) ||
  value instanceof Uint8Array;

/**
 * Remove the value under `key`, whatever its type.
 */
export function tryRemove(document: Document, key: string): unknown {
  return removeWhere(document, key, "any", isAnything);
}

export function removeBool(document: Document, key: string): boolean {
  return removeWhere(document, key, "bool", isBool);
}

/**
 * Remove a 32-bit integer: an `Int32` or an integral number in the 32-bit range.
 */
export function removeInt32(document: Document, key: string): number | Int32 {
  return removeWhere(document, key, "int32", isInt32);
}

/**
 * Remove a 64-bit integer: a `Long`, a `bigint` or an integral number in the safe range.
 */
export function removeInt64(document: Document, key: string): bigint | Long | number {
  return removeWhere(document, key, "int64", isInt64);
}

/**
 * Remove a double: a `Double` or any number.
 */
export function removeDouble(document: Document, key: string): number | Double {
  return removeWhere(document, key, "double", isDouble);
}

/**
 * Remove any numeric value (int, long, double or decimal).
 */
export function removeNumber(document: Document, key: string): NumericValue {
  return removeWhere(document, key, "numeric", isNumeric);
}

export function removeString(document: Document, key: string): string {
  return removeWhere(document, key, "string", isString);
}

export function removeArray(document: Document, key: string): unknown[] {
  return removeWhere(document, key, "array", isArray);
}

export function removeDocument(document: Document, key: string): Document {
  return removeWhere(document, key, "document", isDocument);
}

export function removeObjectId(document: Document, key: string): ObjectId {
  return removeWhere(document, key, "ObjectId", isObjectId);
}

export function removeDate(document: Document, key: string): Date {
  return removeWhere(document, key, "DateTime", isDate);
}

export function removeTimestamp(document: Document, key: string): Timestamp {
  return removeWhere(document, key, "timestamp", isTimestamp);
}

/**
 * Remove binary data of the generic subtype (a `Binary` of subtype 0, or raw bytes).
 */
export function removeGenericBinary(document: Document, key: string): Binary | Uint8Array {
  return removeWhere(document, key, "generic binary", isGenericBinary);
}

/**
 * Remove an embedded document so its own fields can be extracted in turn.
 *
 * @example
 * ```typescript
 * const value = removeNumber(
 *   removeInnerDocument(removeInnerDocument(raw, "outer"), "inner"),
 *   "value",
 * );
 * ```
 */
export function removeInnerDocument(document: Document, key: string): Document {
  return removeDocument(document, key);
}
