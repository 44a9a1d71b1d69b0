import type { ObjectId } from "mongodb";
import type { RawUpdateResult, WriteException } from "../contracts/collection-driver.contract";
import { decodeValue } from "../document/serialize";
import { OdmError } from "../errors/odm.error";
import type { Decoder } from "../types";
import type { Uid } from "../uid/uid";

/** The outcome of `updateOne()` and `replaceEntity()`. */
export type UpdateOneResult = Readonly<{
  /** Whether a document matched the filter */
  matched: boolean;
  /** Whether the matched document was actually changed */
  modified: boolean;
}>;

/** The outcome of `upsertOne()` and `upsertEntity()`. */
export type UpsertOneResult<T, Id = ObjectId> = UpdateOneResult &
  Readonly<{
    /** Identifier of the inserted document, only present when one was inserted */
    upsertedId?: Uid<T, Id>;
  }>;

/** The outcome of `updateMany()` and `upsertMany()`. */
export type UpdateManyResult = Readonly<{
  numMatched: number;
  numModified: number;
}>;

export type UpsertManyResult = UpdateManyResult;

/**
 * Identifier reported for one position of a bulk insertion: decoded when
 * possible, the raw value otherwise.
 */
export type InsertedIdEntry<T, Id = ObjectId> =
  | { ok: true; id: Uid<T, Id> }
  | { ok: false; raw: unknown };

/**
 * Context attached to the error of a failed `insertMany()`: the identifiers
 * of the documents that were written, keyed by their input position.
 *
 * It is not attached when the insertion was not even attempted, e.g. when an
 * entity failed to serialize.
 */
export type InsertManyErrorContext<T, Id = ObjectId> = ReadonlyMap<number, InsertedIdEntry<T, Id>>;

/**
 * Get the partial insertion context out of an error thrown by `insertMany()`.
 */
export function insertManyErrorContext<T, Id = ObjectId>(
  error: unknown,
): InsertManyErrorContext<T, Id> | undefined {
  if (OdmError.is(error) && error.context instanceof Map) {
    return error.context;
  }

  return undefined;
}

/**
 * Build the error reporting a write exception embedded in a raw result.
 */
export function writeExceptionError(exception: WriteException, message: string): OdmError {
  const code = exception.code === undefined ? "" : ` (code ${exception.code})`;

  return new OdmError("InfrastructureFailure", `${message}: ${exception.message}${code}`, {
    cause: exception.cause ?? exception,
  });
}

/**
 * Validate a count reported by the store.
 */
export function toCount(value: number, what: string): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new OdmError("InfrastructureFailure", `invalid ${what}: ${value}`);
  }

  return value;
}

export function updateOneResult(raw: RawUpdateResult): UpdateOneResult {
  if (raw.writeException) {
    throw writeExceptionError(raw.writeException, "couldn't perform single update");
  }

  return Object.freeze(matchedAndModified(raw));
}

function matchedAndModified(raw: RawUpdateResult): UpdateOneResult {
  return {
    matched: toCount(raw.matchedCount, "# of matched documents") > 0,
    modified: toCount(raw.modifiedCount, "# of modified documents") > 0,
  };
}

export function upsertOneResult<T, Id>(
  raw: RawUpdateResult,
  idSchema: Decoder<Uid<T, Id>>,
): UpsertOneResult<T, Id> {
  if (raw.writeException) {
    throw writeExceptionError(raw.writeException, "couldn't perform single upsert");
  }

  const { matched, modified } = matchedAndModified(raw);

  if (raw.upsertedId === undefined || raw.upsertedId === null) {
    return Object.freeze({ matched, modified });
  }

  const upsertedId = decodeValue(idSchema, raw.upsertedId, "upserted ID");

  return Object.freeze({ matched, modified, upsertedId });
}

export function updateManyResult(raw: RawUpdateResult): UpdateManyResult {
  if (raw.writeException) {
    throw writeExceptionError(raw.writeException, "couldn't perform update");
  }

  return Object.freeze({
    numMatched: toCount(raw.matchedCount, "# of matched documents"),
    numModified: toCount(raw.modifiedCount, "# of modified documents"),
  });
}
