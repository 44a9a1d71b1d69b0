import {
  MongoBulkWriteError,
  MongoServerError,
  type AggregateOptions,
  type BulkWriteOptions,
  type Collection,
  type CountDocumentsOptions,
  type DeleteOptions,
  type DeleteResult,
  type DistinctOptions,
  type Document,
  type Filter,
  type FindOneAndDeleteOptions,
  type FindOneAndReplaceOptions,
  type FindOneAndUpdateOptions,
  type FindOptions,
  type IndexDescription,
  type InsertOneOptions,
  type ReplaceOptions,
  type UpdateFilter,
  type UpdateOptions,
  type UpdateResult,
} from "mongodb";
import type {
  CollectionDriverContract,
  RawCursor,
  RawDeleteResult,
  RawInsertManyResult,
  RawInsertOneResult,
  RawUpdateResult,
  WriteException,
} from "../../contracts/collection-driver.contract";

/**
 * Convert a server error raised by a write into an embedded write exception.
 * Anything else (network errors, client-side failures) is rethrown.
 */
export function toWriteException(error: unknown): WriteException {
  if (!(error instanceof MongoServerError)) {
    throw error;
  }

  return {
    message: error.message,
    code: typeof error.code === "number" ? error.code : undefined,
    cause: error,
  };
}

/**
 * Keep the identifiers of the documents a failed bulk insertion did write.
 *
 * The driver reports an identifier for every submitted document, written or
 * not. An ordered insertion stops at the first failing position, an unordered
 * one only skips the failing positions.
 */
export function insertedIdsAfterFailure(
  insertedIds: Record<number, unknown>,
  failedPositions: readonly number[],
  ordered: boolean,
): Map<number, unknown> {
  const written = new Map<number, unknown>();
  const failed = new Set(failedPositions);
  const firstFailure = failedPositions.length > 0 ? Math.min(...failedPositions) : Infinity;

  for (const [key, id] of Object.entries(insertedIds)) {
    const position = Number(key);

    if (ordered ? position < firstFailure : !failed.has(position)) {
      written.set(position, id);
    }
  }

  return written;
}

function insertedIdsMap(insertedIds: Record<number, unknown>): Map<number, unknown> {
  return new Map(Object.entries(insertedIds).map(([key, id]) => [Number(key), id]));
}

function rawUpdateResult(result: UpdateResult): RawUpdateResult {
  return {
    matchedCount: result.matchedCount,
    modifiedCount: result.modifiedCount,
    upsertedId: result.upsertedId ?? undefined,
  };
}

function rawDeleteResult(result: DeleteResult): RawDeleteResult {
  return { deletedCount: result.deletedCount };
}

/**
 * Collection driver backed by a native MongoDB collection.
 *
 * Server-side write errors are reported inside the returned results, every
 * other failure rejects.
 */
export class MongoCollectionDriver implements CollectionDriverContract {
  public constructor(public readonly collection: Collection<Document>) {}

  public get collectionName(): string {
    return this.collection.collectionName;
  }

  public countDocuments(filter: Filter<Document>, options: CountDocumentsOptions): Promise<number> {
    return this.collection.countDocuments(filter, options);
  }

  public distinct(
    field: string,
    filter: Filter<Document>,
    options: DistinctOptions,
  ): Promise<unknown[]> {
    return this.collection.distinct(field, filter, options);
  }

  public async aggregate(pipeline: Document[], options: AggregateOptions): Promise<RawCursor> {
    return this.collection.aggregate(pipeline, options);
  }

  public async find(filter: Filter<Document>, options: FindOptions): Promise<RawCursor> {
    return this.collection.find(filter, options);
  }

  public findOne(filter: Filter<Document>, options: FindOptions): Promise<Document | null> {
    return this.collection.findOne(filter, options);
  }

  public async insertOne(
    document: Document,
    options: InsertOneOptions,
  ): Promise<RawInsertOneResult> {
    try {
      const result = await this.collection.insertOne(document, options);

      return { insertedId: result.insertedId };
    } catch (error) {
      return { writeException: toWriteException(error) };
    }
  }

  public async insertMany(
    documents: Document[],
    options: BulkWriteOptions,
  ): Promise<RawInsertManyResult> {
    try {
      const result = await this.collection.insertMany(documents, options);

      return { insertedIds: insertedIdsMap(result.insertedIds) };
    } catch (error) {
      if (error instanceof MongoBulkWriteError) {
        const writeErrors = Array.isArray(error.writeErrors) ? error.writeErrors : [error.writeErrors];

        return {
          insertedIds: insertedIdsAfterFailure(
            error.insertedIds,
            writeErrors.map((writeError) => writeError.index),
            options.ordered !== false,
          ),
          writeException: {
            message: error.message,
            code: writeErrors[0]?.code,
            cause: error,
          },
        };
      }

      return { insertedIds: new Map(), writeException: toWriteException(error) };
    }
  }

  public async replaceOne(
    filter: Filter<Document>,
    replacement: Document,
    options: ReplaceOptions,
  ): Promise<RawUpdateResult> {
    try {
      return rawUpdateResult(await this.collection.replaceOne(filter, replacement, options));
    } catch (error) {
      return { matchedCount: 0, modifiedCount: 0, writeException: toWriteException(error) };
    }
  }

  public async updateOne(
    filter: Filter<Document>,
    update: UpdateFilter<Document>,
    options: UpdateOptions,
  ): Promise<RawUpdateResult> {
    try {
      return rawUpdateResult(await this.collection.updateOne(filter, update, options));
    } catch (error) {
      return { matchedCount: 0, modifiedCount: 0, writeException: toWriteException(error) };
    }
  }

  public async updateMany(
    filter: Filter<Document>,
    update: UpdateFilter<Document>,
    options: UpdateOptions,
  ): Promise<RawUpdateResult> {
    try {
      return rawUpdateResult(await this.collection.updateMany(filter, update, options));
    } catch (error) {
      return { matchedCount: 0, modifiedCount: 0, writeException: toWriteException(error) };
    }
  }

  public async deleteOne(filter: Filter<Document>, options: DeleteOptions): Promise<RawDeleteResult> {
    try {
      return rawDeleteResult(await this.collection.deleteOne(filter, options));
    } catch (error) {
      return { deletedCount: 0, writeException: toWriteException(error) };
    }
  }

  public async deleteMany(
    filter: Filter<Document>,
    options: DeleteOptions,
  ): Promise<RawDeleteResult> {
    try {
      return rawDeleteResult(await this.collection.deleteMany(filter, options));
    } catch (error) {
      return { deletedCount: 0, writeException: toWriteException(error) };
    }
  }

  public findOneAndDelete(
    filter: Filter<Document>,
    options: FindOneAndDeleteOptions,
  ): Promise<Document | null> {
    return this.collection.findOneAndDelete(filter, { ...options, includeResultMetadata: false });
  }

  public findOneAndReplace(
    filter: Filter<Document>,
    replacement: Document,
    options: FindOneAndReplaceOptions,
  ): Promise<Document | null> {
    return this.collection.findOneAndReplace(filter, replacement, {
      ...options,
      includeResultMetadata: false,
    });
  }

  public findOneAndUpdate(
    filter: Filter<Document>,
    update: UpdateFilter<Document>,
    options: FindOneAndUpdateOptions,
  ): Promise<Document | null> {
    return this.collection.findOneAndUpdate(filter, update, {
      ...options,
      includeResultMetadata: false,
    });
  }

  public createIndexes(indexes: IndexDescription[]): Promise<string[]> {
    return this.collection.createIndexes(indexes);
  }

  public drop(): Promise<boolean> {
    return this.collection.drop();
  }
}
