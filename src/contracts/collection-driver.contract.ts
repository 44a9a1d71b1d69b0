import type {
  AggregateOptions,
  BulkWriteOptions,
  CountDocumentsOptions,
  DeleteOptions,
  DistinctOptions,
  Document,
  Filter,
  FindOneAndDeleteOptions,
  FindOneAndReplaceOptions,
  FindOneAndUpdateOptions,
  FindOptions,
  IndexDescription,
  InsertOneOptions,
  ReplaceOptions,
  UpdateFilter,
  UpdateOptions,
} from "mongodb";

/**
 * An error reported by the store inside an otherwise returned write result.
 */
export type WriteException = {
  message: string;
  /** Server error code, when the store reported one */
  code?: number;
  /** The original driver error */
  cause?: unknown;
};

/** Raw result of a single insertion. */
export type RawInsertOneResult = {
  insertedId?: unknown;
  writeException?: WriteException;
};

/**
 * Raw result of a bulk insertion.
 *
 * `insertedIds` maps the 0-based position of each written document to its
 * raw identifier; positions that were not written are absent.
 */
export type RawInsertManyResult = {
  insertedIds: Map<number, unknown>;
  writeException?: WriteException;
};

/** Raw result of an update, upsert or replacement. */
export type RawUpdateResult = {
  matchedCount: number;
  modifiedCount: number;
  /** Raw identifier of the inserted document, only set when an upsert inserted one */
  upsertedId?: unknown;
  writeException?: WriteException;
};

/** Raw result of a deletion. */
export type RawDeleteResult = {
  deletedCount: number;
  writeException?: WriteException;
};

/**
 * A server-side cursor: a lazy sequence of raw documents.
 */
export interface RawCursor extends AsyncIterable<Document> {
  close(): Promise<void>;
}

/**
 * Transport to a single remote collection.
 *
 * Write calls resolve to raw results which may embed a `writeException`;
 * transport-level failures reject. Implementations perform exactly one round
 * trip per call, cursors fetch further batches lazily.
 */
export interface CollectionDriverContract {
  /** Name of the underlying collection. */
  readonly collectionName: string;

  countDocuments(filter: Filter<Document>, options: CountDocumentsOptions): Promise<number>;

  distinct(field: string, filter: Filter<Document>, options: DistinctOptions): Promise<unknown[]>;

  aggregate(pipeline: Document[], options: AggregateOptions): Promise<RawCursor>;

  find(filter: Filter<Document>, options: FindOptions): Promise<RawCursor>;

  findOne(filter: Filter<Document>, options: FindOptions): Promise<Document | null>;

  insertOne(document: Document, options: InsertOneOptions): Promise<RawInsertOneResult>;

  insertMany(documents: Document[], options: BulkWriteOptions): Promise<RawInsertManyResult>;

  replaceOne(
    filter: Filter<Document>,
    replacement: Document,
    options: ReplaceOptions,
  ): Promise<RawUpdateResult>;

  updateOne(
    filter: Filter<Document>,
    update: UpdateFilter<Document>,
    options: UpdateOptions,
  ): Promise<RawUpdateResult>;

  updateMany(
    filter: Filter<Document>,
    update: UpdateFilter<Document>,
    options: UpdateOptions,
  ): Promise<RawUpdateResult>;

  deleteOne(filter: Filter<Document>, options: DeleteOptions): Promise<RawDeleteResult>;

  deleteMany(filter: Filter<Document>, options: DeleteOptions): Promise<RawDeleteResult>;

  findOneAndDelete(
    filter: Filter<Document>,
    options: FindOneAndDeleteOptions,
  ): Promise<Document | null>;

  findOneAndReplace(
    filter: Filter<Document>,
    replacement: Document,
    options: FindOneAndReplaceOptions,
  ): Promise<Document | null>;

  findOneAndUpdate(
    filter: Filter<Document>,
    update: UpdateFilter<Document>,
    options: FindOneAndUpdateOptions,
  ): Promise<Document | null>;

  createIndexes(indexes: IndexDescription[]): Promise<string[]>;

  drop(): Promise<boolean>;
}
