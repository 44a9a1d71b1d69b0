import type {
  AggregateOptions,
  CountDocumentsOptions,
  DeleteOptions,
  DistinctOptions,
  Document,
  Filter,
  FindOneAndUpdateOptions,
  FindOptions,
  UpdateFilter,
  UpdateOptions,
} from "mongodb";
import type { Decoder } from "../types";

/**
 * Operation contracts, one per kind of collection call.
 *
 * Each is implemented by small caller-defined objects, the `T` parameter ties
 * an operation to the document type it targets so a `Query<User>` cannot be
 * run against a `Collection<Post>`. Optional members fall back to an empty
 * filter, an identity transform or the document type's default options.
 *
 * `transform` reshapes the raw value before it is decoded by `output`; it is
 * free to throw, typically an `OdmError` coming from the extraction helpers.
 */

/**
 * Marker tying an operation to its document type at compile time.
 */
export type Targets<T> = {
  readonly target?: (document: T) => void;
};

/**
 * A counting-only query.
 */
export interface CountOperation<T> extends Targets<T> {
  /**
   * Defaults to an empty filter, counting every document.
   */
  filter?(): Filter<Document>;

  options?(): CountDocumentsOptions;
}

/**
 * A query returning the distinct values of one field.
 */
export interface DistinctOperation<T, Output> extends Targets<T> {
  /**
   * The field whose distinct values are returned.
   */
  readonly field: string;

  /**
   * Decoder of a single distinct value.
   */
  readonly output: Decoder<Output>;

  filter?(): Filter<Document>;

  transform?(raw: unknown): unknown;

  options?(): DistinctOptions;
}

/**
 * An aggregation pipeline.
 */
export interface PipelineOperation<T, Output> extends Targets<T> {
  readonly output: Decoder<Output>;

  stages(): Document[];

  transform?(raw: Document): unknown;

  options?(): AggregateOptions;
}

/**
 * A regular query, run by `findOne()` or `findMany()`.
 */
export interface QueryOperation<T, Output = T> extends Targets<T> {
  /**
   * Decoder of each result, often the document type's own schema.
   */
  readonly output: Decoder<Output>;

  /**
   * Defaults to an empty filter, matching every document.
   */
  filter?(): Filter<Document>;

  transform?(raw: Document): unknown;

  options?(): FindOptions;
}

/**
 * An update, never an upsert.
 */
export interface UpdateOperation<T> extends Targets<T> {
  filter(): Filter<Document>;

  /**
   * Update operators (`$set`, `$inc`, ...) applied to matching documents.
   */
  update(): UpdateFilter<Document>;

  options?(): UpdateOptions;
}

/**
 * An update inserting a new document when nothing matches.
 */
export interface UpsertOperation<T> extends Targets<T> {
  filter(): Filter<Document>;

  upsert(): UpdateFilter<Document>;

  options?(): UpdateOptions;
}

/**
 * A deletion.
 */
export interface DeleteOperation<T> extends Targets<T> {
  filter(): Filter<Document>;

  options?(): DeleteOptions;
}

/**
 * Atomically find a single document and update it.
 *
 * Whether this updates or upserts, and whether the document before or after
 * the change is returned, is decided by `options()`.
 */
export interface FindAndUpdateOperation<T, Output = T> extends Targets<T> {
  readonly output: Decoder<Output>;

  filter(): Filter<Document>;

  update(): UpdateFilter<Document>;

  transform?(raw: Document): unknown;

  options?(): FindOneAndUpdateOptions;
}
