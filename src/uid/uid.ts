import { Long, ObjectId } from "mongodb";
import { z } from "zod";
import type { Decoder } from "../types";

/**
 * Typed identifier of a document of type `T`.
 *
 * The wrapper only exists at compile time as far as the store is concerned:
 * `toBSON()` and `toJSON()` hand out the raw value, so on the wire a `Uid`
 * looks exactly like the identifier it wraps. The phantom `T` keeps the ids of
 * unrelated document types apart even when their raw types are identical.
 *
 * @example
 * ```typescript
 * type User = { _id?: Uid<User>; name: string };
 *
 * const id = Uid.newObjectId<User>();
 * await users.insertOne({ _id: id, name: "Ada" });
 * ```
 */
export class Uid<T, Id = ObjectId> {
  declare private readonly owner?: (document: T) => T;

  public constructor(public readonly value: Id) {}

  /**
   * Wrap an existing raw identifier.
   */
  public static of<T, Id>(value: Id): Uid<T, Id> {
    return new Uid<T, Id>(value);
  }

  /**
   * Generate a fresh `ObjectId`-backed identifier.
   */
  public static newObjectId<T>(): Uid<T, ObjectId> {
    return new Uid<T, ObjectId>(new ObjectId());
  }

  /**
   * Whether both identifiers wrap the same raw value.
   */
  public equals(other: Uid<T, Id>): boolean {
    return this.key() === other.key();
  }

  /**
   * Total ordering over identifiers, usable with `Array.prototype.sort`.
   *
   * Numeric ids come first, then strings, then object ids, then anything else.
   */
  public compare(other: Uid<T, Id>): number {
    const [leftRank, left] = sortKey(this.value);
    const [rightRank, right] = sortKey(other.value);

    if (leftRank !== rightRank) {
      return leftRank - rightRank;
    }

    if (left < right) return -1;
    if (left > right) return 1;

    return 0;
  }

  /**
   * A string that is equal for two identifiers exactly when they are equal,
   * for use as a `Map`/`Set` key.
   */
  public key(): string {
    const [rank, sortable] = sortKey(this.value);

    return `${rank}:${String(sortable)}`;
  }

  public toString(): string {
    return this.value instanceof ObjectId ? this.value.toHexString() : String(this.value);
  }

  public toBSON(): Id {
    return this.value;
  }

  public toJSON(): Id {
    return this.value;
  }

  [Symbol.for("nodejs.util.inspect.custom")](): string {
    return `Uid(${this.toString()})`;
  }
}

function sortKey(value: unknown): [number, bigint | number | string] {
  if (typeof value === "number") return [0, value];
  if (typeof value === "bigint") return [0, value];
  if (value instanceof Long) return [0, value.toBigInt()];
  if (typeof value === "string") return [1, value];
  if (value instanceof ObjectId) return [2, value.toHexString()];
  if (value instanceof Date) return [3, value.getTime()];

  return [4, String(value)];
}

/**
 * Decodes `ObjectId` instances and their 24 character hex representation.
 */
export const objectIdDecoder: Decoder<ObjectId> = z.union([
  z.instanceof(ObjectId),
  z
    .string()
    .regex(/^[0-9a-fA-F]{24}$/, "expected a 24 character hex object id")
    .transform((hex) => ObjectId.createFromHexString(hex)),
]);

/**
 * Build a decoder turning a raw wire identifier into a `Uid`.
 *
 * Without an argument the raw value must be an object id. Values that already
 * are a `Uid` are unwrapped and checked again.
 */
export function uidSchema<T>(): Decoder<Uid<T, ObjectId>>;
export function uidSchema<T, Id>(idDecoder: Decoder<Id>): Decoder<Uid<T, Id>>;
export function uidSchema<T, Id>(
  idDecoder?: Decoder<Id>,
): Decoder<Uid<T, Id>> | Decoder<Uid<T, ObjectId>> {
  if (!idDecoder) {
    return uidSchema<T, ObjectId>(objectIdDecoder);
  }

  return z.unknown().transform((raw, context) => {
    const parsed = idDecoder.safeParse(raw instanceof Uid ? raw.value : raw);

    if (!parsed.success) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        message: parsed.error.issues.map((issue) => issue.message).join("; "),
      });

      return z.NEVER;
    }

    return new Uid<T, Id>(parsed.data);
  });
}
