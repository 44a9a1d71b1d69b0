import type { Document } from "mongodb";
import { describe, expect, it } from "vitest";
import { DocumentCursor } from "../../../src/collection/cursor";
import type { RawCursor } from "../../../src/contracts/collection-driver.contract";
import { OdmError } from "../../../src/errors/odm.error";
import { MemoryCursor } from "../../helpers/memory-collection-driver";

function titles(raw: RawCursor): DocumentCursor<string> {
  return new DocumentCursor(
    raw,
    (document) => {
      if (typeof document.title !== "string") {
        throw new OdmError("DecodingFailure", "title is not a string");
      }

      return document.title;
    },
    "error in items::findMany({})",
  );
}

describe("DocumentCursor", () => {
  it("should convert every document", async () => {
    const cursor = titles(new MemoryCursor([{ title: "a" }, { title: "b" }]));

    expect(await cursor.toArray()).toEqual(["a", "b"]);
  });

  it("should pull one document at a time", async () => {
    const cursor = titles(new MemoryCursor([{ title: "a" }]));

    expect(await cursor.next()).toBe("a");
    expect(await cursor.next()).toBeNull();
    expect(await cursor.next()).toBeNull();
  });

  it("should iterate with for await", async () => {
    const results: string[] = [];

    for await (const title of titles(new MemoryCursor([{ title: "a" }, { title: "b" }]))) {
      results.push(title);
    }

    expect(results).toEqual(["a", "b"]);
  });

  it("should stop and close on the first failure", async () => {
    const raw = new MemoryCursor([{ title: "a" }, { title: 2 }, { title: "c" }]);
    const cursor = titles(raw);

    expect(await cursor.next()).toBe("a");

    const error = await cursor.next().catch((failure: unknown) => failure);

    expect(OdmError.is(error, "DecodingFailure")).toBe(true);
    expect(OdmError.is(error) && error.message).toBe(
      "error in items::findMany({}): iteration failed: title is not a string",
    );
    expect(raw.closed).toBe(true);
    expect(await cursor.next()).toBeNull();
  });

  it("should report store failures as infrastructure failures", async () => {
    const raw: RawCursor = {
      async *[Symbol.asyncIterator](): AsyncIterator<Document> {
        yield { title: "a" };
        throw new Error("cursor killed");
      },
      close: async () => undefined,
    };

    await expect(titles(raw).toArray()).rejects.toThrow(
      "error in items::findMany({}): iteration failed: cursor killed",
    );
  });

  it("should close the raw cursor when the loop exits early", async () => {
    const raw = new MemoryCursor([{ title: "a" }, { title: "b" }]);

    for await (const title of titles(raw)) {
      expect(title).toBe("a");
      break;
    }

    expect(raw.closed).toBe(true);
  });

  it("should only be iterated once", () => {
    const cursor = titles(new MemoryCursor([]));

    cursor[Symbol.asyncIterator]();

    expect(() => cursor[Symbol.asyncIterator]()).toThrow(
      "error in items::findMany({}): cursor already consumed",
    );
  });

  it("should report close failures", async () => {
    const raw: RawCursor = {
      async *[Symbol.asyncIterator](): AsyncIterator<Document> {
        yield { title: "a" };
      },
      close: async () => {
        throw new Error("server gone");
      },
    };

    await expect(titles(raw).close()).rejects.toThrow(
      "error in items::findMany({}): can't close cursor: server gone",
    );
  });
});
