import { colors } from "@mongez/copper";
import { log } from "@warlock.js/logger";
import type {
  Document,
  Filter,
  FindOneAndDeleteOptions,
  FindOneAndReplaceOptions,
  ObjectId,
  UpdateOptions,
} from "mongodb";
import { shouldLog } from "../config";
import type {
  CollectionDriverContract,
  RawDeleteResult,
  RawUpdateResult,
} from "../contracts/collection-driver.contract";
import type { DocumentContract } from "../contracts/document.contract";
import type {
  DistinctOperation,
  FindAndUpdateOperation,
  PipelineOperation,
  QueryOperation,
  UpdateOperation,
  UpsertOperation,
} from "../contracts/operations.contract";
import { decodeValue, serializeDocument } from "../document/serialize";
import { OdmError, wrapError } from "../errors/odm.error";
import type { Uid } from "../uid/uid";
import { DocumentCursor } from "./cursor";
import {
  countOperation,
  deleteOperation,
  describeOperation,
  isQueryOperation,
  type CountInput,
  type DeleteInput,
  type QueryInput,
} from "./resolve-operation";
import {
  toCount,
  updateManyResult,
  updateOneResult,
  upsertOneResult,
  writeExceptionError,
  type InsertedIdEntry,
  type UpdateManyResult,
  type UpdateOneResult,
  type UpsertManyResult,
  type UpsertOneResult,
} from "./results";

/**
 * The members of an operation needed to turn a raw document into its output.
 */
type Converter<Output> = {
  readonly output: QueryOperation<unknown, Output>["output"];
  transform?(raw: Document): unknown;
};

/**
 * A statically-typed, homogeneous collection.
 *
 * Binds a document type to the driver of its collection and runs every
 * operation kind against it: filters, update specifications and options come
 * from the operation value (falling back to the document type's defaults),
 * raw results are checked for embedded write exceptions and payloads are
 * transformed and decoded into the operation's output type.
 *
 * Every failure is an `OdmError` whose message starts with
 * `error in <collection>::<method>(<operation>)`.
 *
 * @example
 * ```typescript
 * const items = database.collection(Item);
 *
 * const id = await items.insertOne({ title: "Lamp", stock: 3 });
 * const inStock = await items.count({ stock: { $gt: 0 } });
 * ```
 */
export class Collection<T, Id = ObjectId> {
  public constructor(
    public readonly document: DocumentContract<T, Id>,
    public readonly driver: CollectionDriverContract,
  ) {}

  /**
   * The collection name of the document type.
   */
  public get name(): string {
    return this.document.name;
  }

  /**
   * Create the indexes declared by the document type, if any.
   */
  public async createIndexes(): Promise<void> {
    const indexes = this.document.indexes();

    if (indexes.length === 0) {
      return;
    }

    const names = await this.run(
      "createIndexes",
      `can't create indexes on ${this.name}`,
      () => this.driver.createIndexes(indexes),
    );

    if (shouldLog("info")) {
      log.info(
        "odm.collection",
        "indexes",
        `Created indexes ${names.join(", ")} on ${colors.bold(colors.yellowBright(this.name))}`,
      );
    }
  }

  /**
   * Drop the whole collection.
   */
  public async drop(): Promise<void> {
    await this.run("drop", this.message("drop"), () => this.driver.drop());

    if (shouldLog("info")) {
      log.info("odm.collection", "drop", `Dropped ${colors.bold(colors.yellowBright(this.name))}`);
    }
  }

  /**
   * Count the documents matching the query, every document for an empty filter.
   */
  public async count(query: CountInput<T>): Promise<number> {
    const operation = countOperation(query);

    return this.run("count", this.message("count", query), async () => {
      const count = await this.driver.countDocuments(
        operation.filter?.() ?? {},
        operation.options?.() ?? this.document.countOptions(),
      );

      return toCount(count, "# of counted documents");
    });
  }

  /**
   * Get the distinct values of a field.
   *
   * The whole call fails on the first value that can't be transformed or decoded.
   */
  public async distinct<Output>(query: DistinctOperation<T, Output>): Promise<Output[]> {
    return this.run("distinct", this.message("distinct", query), async () => {
      const values = await this.driver.distinct(
        query.field,
        query.filter?.() ?? {},
        query.options?.() ?? this.document.distinctOptions(),
      );

      return values.map((raw) =>
        decodeValue(
          query.output,
          query.transform ? query.transform(raw) : raw,
          `${this.name}::${query.field}`,
        ),
      );
    });
  }

  /**
   * Get the distinct values of a field, collected by the given function.
   *
   * @example
   * ```typescript
   * const tags = await items.distinctInto(new DistinctTags(), (values) => new Set(values));
   * ```
   */
  public async distinctInto<Output, Container>(
    query: DistinctOperation<T, Output>,
    collect: (values: Output[]) => Container,
  ): Promise<Container> {
    return collect(await this.distinct(query));
  }

  /**
   * Run an aggregation pipeline.
   *
   * Results are transformed and decoded lazily, while iterating.
   */
  public async aggregate<Output>(
    pipeline: PipelineOperation<T, Output>,
  ): Promise<DocumentCursor<Output>> {
    const message = this.message("aggregate", pipeline);
    const cursor = await this.run("aggregate", message, () =>
      this.driver.aggregate(
        pipeline.stages(),
        pipeline.options?.() ?? this.document.aggregateOptions(),
      ),
    );

    return new DocumentCursor(cursor, (document) => this.convert(pipeline, document), message);
  }

  /**
   * Get the first document matching the query, `null` when nothing matches.
   */
  public findOne<Output>(query: QueryOperation<T, Output>): Promise<Output | null>;
  public findOne(query: Filter<Document>): Promise<T | null>;
  public findOne<Output>(query: QueryInput<T, Output>): Promise<Output | T | null> {
    if (isQueryOperation(query)) {
      return this.findOneWith(query, query);
    }

    return this.findOneWith(this.filterQuery(query), query);
  }

  /**
   * Get every document matching the query, as a lazy cursor.
   */
  public findMany<Output>(query: QueryOperation<T, Output>): Promise<DocumentCursor<Output>>;
  public findMany(query: Filter<Document>): Promise<DocumentCursor<T>>;
  public findMany<Output>(
    query: QueryInput<T, Output>,
  ): Promise<DocumentCursor<Output> | DocumentCursor<T>> {
    if (isQueryOperation(query)) {
      return this.findManyWith(query, query);
    }

    return this.findManyWith(this.filterQuery(query), query);
  }

  /**
   * Insert a single entity and return its identifier.
   *
   * An entity without identifier gets the one reported by the store assigned.
   */
  public async insertOne(entity: T): Promise<Uid<T, Id>> {
    return this.run("insertOne", this.message("insertOne", entity), async () => {
      const document = serializeDocument(entity, this.name);
      const result = await this.driver.insertOne(document, this.document.insertOptions());

      if (result.writeException) {
        throw writeExceptionError(result.writeException, "write exception");
      }

      if (result.insertedId === undefined || result.insertedId === null) {
        throw new OdmError("MissingIdentifier", "missing `insertedId`");
      }

      const id = decodeValue(this.document.idSchema, result.insertedId, `ID for ${this.name}`);

      this.assignId(entity, id);

      return id;
    });
  }

  /**
   * Insert many entities, returning their identifiers keyed by input position.
   *
   * Inserting nothing succeeds without calling the store. When only some of
   * the documents were written, or some returned identifiers can't be
   * decoded, the thrown error carries the identifiers that were reported as
   * its `context` (see `insertManyErrorContext()`).
   */
  public async insertMany(entities: Iterable<T>): Promise<Map<number, Uid<T, Id>>> {
    const list = [...entities];

    return this.run("insertMany", this.message("insertMany", `<${list.length} entities>`), async () => {
      const documents = list.map((entity) => serializeDocument(entity, this.name));

      // stores reject empty bulk inserts, there is nothing to report anyway
      if (documents.length === 0) {
        return new Map<number, Uid<T, Id>>();
      }

      const result = await this.driver.insertMany(documents, this.document.insertOptions());
      const entries = this.decodeInsertedIds(result.insertedIds, documents.length);

      if (result.writeException) {
        throw writeExceptionError(result.writeException, "bulk write exception").withContext(entries);
      }

      if (entries.size !== documents.length) {
        throw new OdmError(
          "MissingIdentifier",
          `${documents.length} documents given, but ${entries.size} IDs returned`,
          { context: entries },
        );
      }

      const ids = new Map<number, Uid<T, Id>>();

      for (const [position, entry] of entries) {
        if (!entry.ok) {
          throw new OdmError("DecodingFailure", "can't deserialize some IDs", { context: entries });
        }

        ids.set(position, entry.id);
      }

      for (const [position, id] of ids) {
        this.assignId(list[position], id);
      }

      return ids;
    });
  }

  /**
   * Overwrite the stored document having the entity's identifier with the
   * entity. Never inserts: nothing happens when no such document exists.
   */
  public async replaceEntity(entity: T): Promise<UpdateOneResult> {
    return this.run("replaceEntity", this.message("replaceEntity", entity), async () =>
      updateOneResult(await this.writeEntity(entity, false)),
    );
  }

  /**
   * Overwrite the stored document having the entity's identifier with the
   * entity, inserting it when no such document exists.
   */
  public async upsertEntity(entity: T): Promise<UpsertOneResult<T, Id>> {
    return this.run("upsertEntity", this.message("upsertEntity", entity), async () =>
      upsertOneResult(await this.writeEntity(entity, true), this.document.idSchema),
    );
  }

  /**
   * Update a single document with update operators; never upserts.
   */
  public async updateOne(update: UpdateOperation<T>): Promise<UpdateOneResult> {
    return this.run("updateOne", this.message("updateOne", update), async () =>
      updateOneResult(
        await this.driver.updateOne(
          update.filter(),
          update.update(),
          this.withUpsert(update.options?.() ?? this.document.updateOptions(), false),
        ),
      ),
    );
  }

  /**
   * Update a single document with update operators, inserting one when nothing matches.
   */
  public async upsertOne(upsert: UpsertOperation<T>): Promise<UpsertOneResult<T, Id>> {
    return this.run("upsertOne", this.message("upsertOne", upsert), async () =>
      upsertOneResult(
        await this.driver.updateOne(
          upsert.filter(),
          upsert.upsert(),
          this.withUpsert(upsert.options?.() ?? this.document.upsertOptions(), true),
        ),
        this.document.idSchema,
      ),
    );
  }

  /**
   * Update every matching document with update operators; never upserts.
   */
  public async updateMany(update: UpdateOperation<T>): Promise<UpdateManyResult> {
    return this.run("updateMany", this.message("updateMany", update), async () =>
      updateManyResult(
        await this.driver.updateMany(
          update.filter(),
          update.update(),
          this.withUpsert(update.options?.() ?? this.document.updateOptions(), false),
        ),
      ),
    );
  }

  /**
   * Update every matching document, or insert one when nothing matches.
   */
  public async upsertMany(upsert: UpsertOperation<T>): Promise<UpsertManyResult> {
    return this.run("upsertMany", this.message("upsertMany", upsert), async () =>
      updateManyResult(
        await this.driver.updateMany(
          upsert.filter(),
          upsert.upsert(),
          this.withUpsert(upsert.options?.() ?? this.document.upsertOptions(), true),
        ),
      ),
    );
  }

  /**
   * Delete the stored document having the entity's identifier.
   *
   * @returns whether a document was removed
   */
  public async deleteEntity(entity: T): Promise<boolean> {
    return this.run("deleteEntity", this.message("deleteEntity", entity), async () => {
      const id = this.requireId(entity, `no \`_id\` in entity of type ${this.name}`);
      const result = await this.driver.deleteOne({ _id: id }, this.document.deleteOptions());

      return this.deletedCount(result) > 0;
    });
  }

  /**
   * Delete the stored documents having the identifiers of the given entities.
   *
   * Fails before calling the store when any entity lacks an identifier.
   *
   * @returns the number of removed documents
   */
  public async deleteEntities(entities: Iterable<T>): Promise<number> {
    const list = [...entities];

    return this.run("deleteEntities", this.message("deleteEntities", `<${list.length} entities>`), async () => {
      const ids = list.map((entity) =>
        this.requireId(entity, `no \`_id\` in entity to delete: ${describeOperation(entity)}`),
      );
      const result = await this.driver.deleteMany(
        { _id: { $in: ids } },
        this.document.deleteOptions(),
      );

      return this.deletedCount(result);
    });
  }

  /**
   * Delete the first matching document.
   *
   * @returns whether a document was removed
   */
  public async deleteOne(query: DeleteInput<T>): Promise<boolean> {
    const operation = deleteOperation(query);

    return this.run("deleteOne", this.message("deleteOne", query), async () => {
      const result = await this.driver.deleteOne(
        operation.filter(),
        operation.options?.() ?? this.document.deleteOptions(),
      );

      return this.deletedCount(result) > 0;
    });
  }

  /**
   * Delete every matching document.
   *
   * @returns the number of removed documents
   */
  public async deleteMany(query: DeleteInput<T>): Promise<number> {
    const operation = deleteOperation(query);

    return this.run("deleteMany", this.message("deleteMany", query), async () =>
      this.deletedCount(
        await this.driver.deleteMany(
          operation.filter(),
          operation.options?.() ?? this.document.deleteOptions(),
        ),
      ),
    );
  }

  /**
   * Atomically delete the first matching document and return it.
   *
   * Only the query's `sort`, `projection` and `maxTimeMS` options are used.
   */
  public findOneAndDelete<Output>(query: QueryOperation<T, Output>): Promise<Output | null>;
  public findOneAndDelete(query: Filter<Document>): Promise<T | null>;
  public findOneAndDelete<Output>(query: QueryInput<T, Output>): Promise<Output | T | null> {
    if (isQueryOperation(query)) {
      return this.findOneAndDeleteWith(query, query);
    }

    return this.findOneAndDeleteWith(this.filterQuery(query), query);
  }

  /**
   * Atomically replace the first matching document and return it as it was
   * before the replacement. Never upserts, use `findOneAndUpdate()` for that.
   */
  public findOneAndReplace<Output>(
    query: QueryOperation<T, Output>,
    replacement: T,
  ): Promise<Output | null>;
  public findOneAndReplace(query: Filter<Document>, replacement: T): Promise<T | null>;
  public findOneAndReplace<Output>(
    query: QueryInput<T, Output>,
    replacement: T,
  ): Promise<Output | T | null> {
    if (isQueryOperation(query)) {
      return this.findOneAndReplaceWith(query, replacement, query);
    }

    return this.findOneAndReplaceWith(this.filterQuery(query), replacement, query);
  }

  /**
   * Atomically update the first matching document and return it.
   *
   * Unlike the other writes this is not split into update and upsert
   * variants: the operation's options decide whether an upsert happens and
   * which version of the document is returned.
   */
  public async findOneAndUpdate<Output>(
    update: FindAndUpdateOperation<T, Output>,
  ): Promise<Output | null> {
    return this.run("findOneAndUpdate", this.message("findOneAndUpdate", update), async () => {
      const document = await this.driver.findOneAndUpdate(
        update.filter(),
        update.update(),
        update.options?.() ?? this.document.findAndUpdateOptions(),
      );

      return document === null ? null : this.convert(update, document);
    });
  }

  public toString(): string {
    return `Collection<${this.name}>`;
  }

  [Symbol.for("nodejs.util.inspect.custom")](): string {
    return this.toString();
  }

  private async findOneWith<Output>(
    query: QueryOperation<T, Output>,
    rendered: unknown,
  ): Promise<Output | null> {
    return this.run("findOne", this.message("findOne", rendered), async () => {
      const document = await this.driver.findOne(
        query.filter?.() ?? {},
        query.options?.() ?? this.document.queryOptions(),
      );

      return document === null ? null : this.convert(query, document);
    });
  }

  private async findManyWith<Output>(
    query: QueryOperation<T, Output>,
    rendered: unknown,
  ): Promise<DocumentCursor<Output>> {
    const message = this.message("findMany", rendered);
    const cursor = await this.run("findMany", message, () =>
      this.driver.find(query.filter?.() ?? {}, query.options?.() ?? this.document.queryOptions()),
    );

    return new DocumentCursor(cursor, (document) => this.convert(query, document), message);
  }

  private async findOneAndDeleteWith<Output>(
    query: QueryOperation<T, Output>,
    rendered: unknown,
  ): Promise<Output | null> {
    return this.run("findOneAndDelete", this.message("findOneAndDelete", rendered), async () => {
      const options: FindOneAndDeleteOptions = this.findAndModifyOptions(query);
      const document = await this.driver.findOneAndDelete(query.filter?.() ?? {}, options);

      return document === null ? null : this.convert(query, document);
    });
  }

  private async findOneAndReplaceWith<Output>(
    query: QueryOperation<T, Output>,
    replacement: T,
    rendered: unknown,
  ): Promise<Output | null> {
    const message = this.message(
      "findOneAndReplace",
      `${describeOperation(rendered)}, ${describeOperation(replacement)}`,
    );

    return this.run("findOneAndReplace", message, async () => {
      const options: FindOneAndReplaceOptions = {
        ...this.findAndModifyOptions(query),
        returnDocument: "before",
        upsert: false,
      };
      const document = await this.driver.findOneAndReplace(
        query.filter?.() ?? {},
        serializeDocument(replacement, this.name),
        options,
      );

      return document === null ? null : this.convert(query, document);
    });
  }

  /**
   * Reuse the sort, projection and time limit of a query for a
   * find-and-modify command, dropping everything else (write concern included).
   */
  private findAndModifyOptions<Output>(query: QueryOperation<T, Output>): FindOneAndDeleteOptions {
    const { sort, projection, maxTimeMS } = query.options?.() ?? this.document.queryOptions();
    const options: FindOneAndDeleteOptions = {};

    if (sort !== undefined) options.sort = sort;
    if (projection !== undefined) options.projection = projection;
    if (maxTimeMS !== undefined) options.maxTimeMS = maxTimeMS;

    return options;
  }

  /**
   * Replace the stored document matching the entity's `_id` with the entity.
   */
  private async writeEntity(entity: T, upsert: boolean): Promise<RawUpdateResult> {
    const { _id: id, ...replacement } = serializeDocument(entity, this.name);

    if (id === undefined || id === null) {
      throw new OdmError("MissingIdentifier", `no \`_id\` in entity of type ${this.name}`);
    }

    const options = this.withUpsert(
      upsert ? this.document.upsertOptions() : this.document.updateOptions(),
      upsert,
    );
    const result = await this.driver.replaceOne({ _id: id }, replacement, options);

    if (result.writeException) {
      throw writeExceptionError(result.writeException, "write exception");
    }

    return result;
  }

  private withUpsert(options: UpdateOptions, upsert: boolean): UpdateOptions {
    return { ...options, upsert };
  }

  private requireId(entity: T, message: string): Document[string] {
    const id = this.document.id(entity);

    if (id === undefined) {
      throw new OdmError("MissingIdentifier", message);
    }

    const { _id: raw } = serializeDocument({ _id: id }, this.name);

    return raw;
  }

  private assignId(entity: T, id: Uid<T, Id>): void {
    if (this.document.id(entity) === undefined) {
      this.document.setId(entity, id);
    }
  }

  private deletedCount(result: RawDeleteResult): number {
    if (result.writeException) {
      throw writeExceptionError(result.writeException, "write exception");
    }

    return toCount(result.deletedCount, "# of deleted documents");
  }

  /**
   * Decode the identifiers reported by a bulk insert, keeping the raw value of
   * the ones that can't be decoded.
   */
  private decodeInsertedIds(
    insertedIds: Map<number, unknown>,
    total: number,
  ): Map<number, InsertedIdEntry<T, Id>> {
    const entries = new Map<number, InsertedIdEntry<T, Id>>();
    const positions = [...insertedIds.keys()].sort((left, right) => left - right);

    for (const position of positions) {
      if (!Number.isInteger(position) || position < 0 || position >= total) {
        throw new OdmError(
          "InfrastructureFailure",
          `invalid position ${position} reported for ${total} documents`,
        );
      }

      const raw = insertedIds.get(position);
      const parsed = this.document.idSchema.safeParse(raw);

      entries.set(position, parsed.success ? { ok: true, id: parsed.data } : { ok: false, raw });
    }

    return entries;
  }

  private filterQuery(filter: Filter<Document>): QueryOperation<T, T> {
    return {
      filter: () => filter,
      output: this.document.schema,
    };
  }

  private convert<Output>(operation: Converter<Output>, document: Document): Output {
    const transformed = operation.transform ? operation.transform(document) : document;

    return decodeValue(operation.output, transformed, `${this.name} document`);
  }

  private message(method: string, operation?: unknown): string {
    const rendered =
      operation === undefined
        ? ""
        : typeof operation === "string"
          ? operation
          : describeOperation(operation);

    return `error in ${this.name}::${method}(${rendered})`;
  }

  /**
   * Run an action, turning any failure into an `OdmError` prefixed with the
   * given message.
   */
  private async run<Result>(
    method: string,
    message: string,
    action: () => Promise<Result>,
  ): Promise<Result> {
    try {
      return await action();
    } catch (error) {
      const failure = wrapError(error, message);

      if (shouldLog("error")) {
        log.error("odm.collection", method, failure.message);
      }

      throw failure;
    }
  }
}
