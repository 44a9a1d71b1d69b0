import { colors } from "@mongez/copper";
import { log } from "@warlock.js/logger";
import { MongoServerError, type CreateCollectionOptions, type Db, type ObjectId } from "mongodb";
import { Collection } from "../collection/collection";
import { shouldLog } from "../config";
import type { DocumentContract } from "../contracts/document.contract";
import { MongoCollectionDriver } from "../drivers/mongodb/mongodb-collection-driver";
import { OdmError, wrapError } from "../errors/odm.error";

const NAMESPACE_NOT_FOUND = 26;

/**
 * Typed entry point over a native MongoDB database.
 *
 * @example
 * ```typescript
 * const { database } = await connectToDatabase({ database: "shop" });
 *
 * const items = database.collection(Item);
 * const orders = await database.emptyCollection(Order);
 * ```
 */
export class OdmDatabase {
  public constructor(public readonly db: Db) {}

  public get name(): string {
    return this.db.databaseName;
  }

  /**
   * Get the collection of the given document type.
   *
   * Does not reach the server, the collection is created lazily on first write.
   */
  public collection<T, Id = ObjectId>(document: DocumentContract<T, Id>): Collection<T, Id> {
    return new Collection(document, new MongoCollectionDriver(this.db.collection(document.name)));
  }

  /**
   * Get the collection of the given document type, failing if it does not exist yet.
   */
  public async existingCollection<T, Id = ObjectId>(
    document: DocumentContract<T, Id>,
  ): Promise<Collection<T, Id>> {
    const message = `error in ${this.name}::existingCollection(${document.name})`;

    try {
      const collections = await this.db
        .listCollections({ name: document.name }, { nameOnly: true })
        .toArray();

      if (collections.length === 0) {
        throw new OdmError("InfrastructureFailure", `collection ${document.name} does not exist`);
      }
    } catch (error) {
      const failure = wrapError(error, message);

      log.error("odm.database", "existingCollection", failure.message);

      throw failure;
    }

    return this.collection(document);
  }

  /**
   * Drop the collection of the given document type if it exists, then create
   * it from scratch with the document's validator and indexes.
   */
  public async emptyCollection<T, Id = ObjectId>(
    document: DocumentContract<T, Id>,
  ): Promise<Collection<T, Id>> {
    const message = `error in ${this.name}::emptyCollection(${document.name})`;
    const validator = document.validator();
    const options: CreateCollectionOptions = validator === undefined ? {} : { validator };

    try {
      await this.db.dropCollection(document.name).catch((error: unknown) => {
        if (error instanceof MongoServerError && error.code === NAMESPACE_NOT_FOUND) {
          return false;
        }

        throw error;
      });
      await this.db.createCollection(document.name, options);
    } catch (error) {
      const failure = wrapError(error, message);

      log.error("odm.database", "emptyCollection", failure.message);

      throw failure;
    }

    if (shouldLog("info")) {
      log.info(
        "odm.database",
        "emptyCollection",
        `Created collection ${colors.bold(colors.yellowBright(document.name))}`,
      );
    }

    const collection = this.collection(document);

    await collection.createIndexes();

    return collection;
  }
}
