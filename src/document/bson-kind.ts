import {
  Binary,
  BSONRegExp,
  BSONSymbol,
  Code,
  DBRef,
  Decimal128,
  Double,
  Int32,
  Long,
  MaxKey,
  MinKey,
  ObjectId,
  Timestamp,
} from "mongodb";
import type { Document } from "mongodb";

/**
 * BSON type names, spelled the way `$type` expects them.
 */
export type BsonKind =
  | "double"
  | "string"
  | "object"
  | "array"
  | "binData"
  | "undefined"
  | "objectId"
  | "bool"
  | "date"
  | "null"
  | "regex"
  | "dbPointer"
  | "javascript"
  | "symbol"
  | "int"
  | "timestamp"
  | "long"
  | "decimal"
  | "minKey"
  | "maxKey";

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

/**
 * Determine the BSON type a value is stored as.
 *
 * JS numbers follow the serializer: integral values that fit in 32 bits are
 * `int`, every other number is `double`. `bigint` values are `long`.
 */
export function bsonKindOf(value: unknown): BsonKind {
  if (value === undefined) return "undefined";
  if (value === null) return "null";

  switch (typeof value) {
    case "boolean":
      return "bool";
    case "string":
      return "string";
    case "bigint":
      return "long";
    case "number":
      return isInt32(value) ? "int" : "double";
    case "function":
      return "javascript";
    case "symbol":
      return "symbol";
  }

  if (Array.isArray(value)) return "array";
  if (value instanceof Date) return "date";
  if (value instanceof ObjectId) return "objectId";
  if (value instanceof Int32) return "int";
  if (value instanceof Double) return "double";
  // timestamps are longs under the hood, check them first
  if (value instanceof Timestamp) return "timestamp";
  if (value instanceof Long) return "long";
  if (value instanceof Decimal128) return "decimal";
  if (value instanceof Binary || value instanceof Uint8Array) return "binData";
  if (value instanceof RegExp || value instanceof BSONRegExp) return "regex";
  if (value instanceof Code) return "javascript";
  if (value instanceof BSONSymbol) return "symbol";
  if (value instanceof DBRef) return "dbPointer";
  if (value instanceof MinKey) return "minKey";
  if (value instanceof MaxKey) return "maxKey";

  return "object";
}

function isInt32(value: number): boolean {
  return (
    Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX && !Object.is(value, -0)
  );
}

/**
 * Whether the value is an embedded document rather than a scalar or array.
 */
export function isDocument(value: unknown): value is Document {
  return bsonKindOf(value) === "object";
}
