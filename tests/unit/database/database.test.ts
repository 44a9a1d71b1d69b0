import { MongoServerError } from "mongodb";
import type { Db } from "mongodb";
import { describe, expect, it, vi } from "vitest";
import { Collection } from "../../../src/collection/collection";
import { OdmDatabase } from "../../../src/database/database";
import { defineDocument } from "../../../src/document/define-document";
import { MongoCollectionDriver } from "../../../src/drivers/mongodb/mongodb-collection-driver";
import { OdmError } from "../../../src/errors/odm.error";
import { Item, Note } from "../../fixtures/documents/item";

/**
 * Mock native database whose collections all share the same mocks.
 */
function createNativeDatabase(existing: string[] = []) {
  const nativeCollection = {
    collectionName: "items",
    createIndexes: vi.fn().mockResolvedValue(["title_1"]),
  };
  const mocks = {
    collection: vi.fn().mockReturnValue(nativeCollection),
    listCollections: vi.fn((filter: { name: string }) => ({
      toArray: vi.fn().mockResolvedValue(existing.includes(filter.name) ? [{ name: filter.name }] : []),
    })),
    dropCollection: vi.fn().mockResolvedValue(true),
    createCollection: vi.fn().mockResolvedValue(nativeCollection),
  };
  const db = { databaseName: "shop", ...mocks } as unknown as Db;

  return { db, mocks, nativeCollection };
}

describe("OdmDatabase", () => {
  it("should build typed collections without reaching the server", () => {
    const { db, mocks } = createNativeDatabase();
    const items = new OdmDatabase(db).collection(Item);

    expect(items).toBeInstanceOf(Collection);
    expect(items.driver).toBeInstanceOf(MongoCollectionDriver);
    expect(mocks.collection).toHaveBeenCalledWith("items");
    expect(mocks.listCollections).not.toHaveBeenCalled();
  });

  it("should return existing collections", async () => {
    const { db } = createNativeDatabase(["items"]);

    expect((await new OdmDatabase(db).existingCollection(Item)).name).toBe("items");
  });

  it("should fail for missing collections", async () => {
    const { db } = createNativeDatabase();
    const error = await new OdmDatabase(db).existingCollection(Item).catch((failure: unknown) => failure);

    expect(OdmError.is(error, "InfrastructureFailure")).toBe(true);
    expect(OdmError.is(error) && error.message).toBe(
      "error in shop::existingCollection(items): collection items does not exist",
    );
  });

  it("should recreate collections with their indexes", async () => {
    const { db, mocks, nativeCollection } = createNativeDatabase();

    mocks.dropCollection.mockRejectedValue(
      new MongoServerError({ message: "ns not found", code: 26 }),
    );

    await new OdmDatabase(db).emptyCollection(Item);

    expect(mocks.createCollection).toHaveBeenCalledWith("items", {});
    expect(nativeCollection.createIndexes).toHaveBeenCalledWith([
      { key: { title: 1 }, unique: true },
    ]);
  });

  it("should create collections with the document's validator", async () => {
    const { db, mocks } = createNativeDatabase();
    const validator = { $jsonSchema: { required: ["text"] } };
    const Validated = defineDocument<Note>({
      name: "notes",
      schema: Note.schema,
      idSchema: Note.idSchema,
      validator: () => validator,
    });

    await new OdmDatabase(db).emptyCollection(Validated);

    expect(mocks.dropCollection).toHaveBeenCalledWith("notes");
    expect(mocks.createCollection).toHaveBeenCalledWith("notes", { validator });
  });

  it("should report other drop failures", async () => {
    const { db, mocks } = createNativeDatabase();

    mocks.dropCollection.mockRejectedValue(new Error("not authorized"));

    await expect(new OdmDatabase(db).emptyCollection(Item)).rejects.toThrow(
      "error in shop::emptyCollection(items): not authorized",
    );
    expect(mocks.createCollection).not.toHaveBeenCalled();
  });
});
