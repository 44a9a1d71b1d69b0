import type {
  AggregateOptions,
  BulkWriteOptions,
  CountDocumentsOptions,
  DeleteOptions,
  DistinctOptions,
  Document,
  FindOneAndUpdateOptions,
  FindOptions,
  IndexDescription,
  ObjectId,
  UpdateOptions,
} from "mongodb";
import type { Decoder } from "../types";
import type { Uid } from "../uid/uid";

/**
 * Capability set describing one document type stored in its own collection.
 *
 * Implemented once per entity type, usually through `defineDocument()`, and
 * consulted by the collection façade and by operations for their defaults.
 * Every member is a function of the type, never of an instance.
 */
export interface DocumentContract<T, Id = ObjectId> {
  /**
   * The collection name, non-empty and stable.
   */
  readonly name: string;

  /**
   * Decoder turning a stored document into an entity.
   */
  readonly schema: Decoder<T>;

  /**
   * Decoder turning a raw wire identifier into a typed identifier.
   */
  readonly idSchema: Decoder<Uid<T, Id>>;

  /**
   * The identifier of the given entity, or `undefined` when it was never persisted.
   */
  id(entity: T): Uid<T, Id> | undefined;

  /**
   * Assign an identifier to the given entity.
   */
  setId(entity: T, id: Uid<T, Id>): void;

  /**
   * Index specifications, an empty list means no user-defined index.
   */
  indexes(): IndexDescription[];

  /**
   * Server-side validator used when the collection is created empty.
   */
  validator(): Document | undefined;

  countOptions(): CountDocumentsOptions;

  distinctOptions(): DistinctOptions;

  aggregateOptions(): AggregateOptions;

  queryOptions(): FindOptions;

  /**
   * Options for single and batch insertions.
   */
  insertOptions(): BulkWriteOptions;

  deleteOptions(): DeleteOptions;

  /**
   * Options for strictly non-upsert updates, the `upsert` flag is ignored.
   */
  updateOptions(): UpdateOptions;

  /**
   * Options for upserts, the `upsert` flag is ignored.
   */
  upsertOptions(): UpdateOptions;

  findAndUpdateOptions(): FindOneAndUpdateOptions;
}

/**
 * Extract the entity type of a document contract.
 */
export type EntityOf<D> = D extends DocumentContract<infer T, infer _Id> ? T : never;

/**
 * Extract the raw identifier type of a document contract.
 */
export type IdOf<D> = D extends DocumentContract<infer _T, infer Id> ? Id : never;
