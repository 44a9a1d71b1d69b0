import type { BsonKind } from "./document/bson-kind";

/**
 * Sort and index key directions.
 *
 * @example
 * ```typescript
 * indexes: () => [{ key: { createdAt: Order.Descending } }]
 * ```
 */
export const Order = {
  Ascending: 1,
  Descending: -1,
} as const;

export type Order = (typeof Order)[keyof typeof Order];

/**
 * Special index kinds, used in place of an `Order` in an index key.
 */
export const IndexType = {
  Text: "text",
  Geo2D: "2d",
  Geo2DSphere: "2dsphere",
  Hashed: "hashed",
} as const;

export type IndexType = (typeof IndexType)[keyof typeof IndexType];

/**
 * `$type` aliases, for filters and validators.
 *
 * @example
 * ```typescript
 * filter: () => ({ parent: { $type: [BsonType.Object, BsonType.Null] } })
 * ```
 */
export const BsonType = {
  Double: "double",
  String: "string",
  Object: "object",
  Array: "array",
  Binary: "binData",
  Undefined: "undefined",
  ObjectId: "objectId",
  Boolean: "bool",
  Date: "date",
  Null: "null",
  Regex: "regex",
  DbPointer: "dbPointer",
  JavaScript: "javascript",
  Symbol: "symbol",
  Int: "int",
  Timestamp: "timestamp",
  Long: "long",
  Decimal: "decimal",
  MinKey: "minKey",
  MaxKey: "maxKey",
} as const satisfies Record<string, BsonKind>;

export type BsonType = (typeof BsonType)[keyof typeof BsonType];
