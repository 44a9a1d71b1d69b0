import { BSON, Binary, Decimal128, Double, Int32, Long, ObjectId, Timestamp } from "mongodb";
import { describe, expect, it } from "vitest";
import {
  removeArray,
  removeBool,
  removeDate,
  removeDouble,
  removeGenericBinary,
  removeInnerDocument,
  removeInt32,
  removeInt64,
  removeNumber,
  removeObjectId,
  removeString,
  removeTimestamp,
  tryRemove,
} from "../../../src/document/document-ext";
import { OdmError } from "../../../src/errors/odm.error";

function failure(action: () => unknown): unknown {
  try {
    action();
  } catch (error) {
    return error;
  }

  throw new Error("expected the action to fail");
}

describe("document extraction helpers", () => {
  it("should remove and return a value of the expected type", () => {
    const document = { count: 5, rest: true };

    expect(removeInt32(document, "count")).toBe(5);
    expect(document).toEqual({ rest: true });
  });

  it("should report a missing key", () => {
    const error = failure(() => removeInt32({}, "count"));

    expect(OdmError.is(error, "MissingDocumentField")).toBe(true);
    expect(OdmError.is(error) && error.message).toBe(
      "error removing int32 value for key `count`: key not found",
    );
  });

  it("should report an ill-typed value and leave the document untouched", () => {
    const document = { count: "five" };
    const error = failure(() => removeInt32(document, "count"));

    expect(OdmError.is(error, "IllTypedDocumentField")).toBe(true);
    expect(OdmError.is(error) && error.message).toBe(
      "error removing int32 value for key `count`: found string",
    );
    expect(document).toEqual({ count: "five" });
  });

  it("should treat null as present", () => {
    const document = { parent: null };

    expect(tryRemove(document, "parent")).toBeNull();
    expect(document).toEqual({});
  });

  it("should distinguish int, long and double", () => {
    const wide = Long.fromNumber(7);

    expect(removeInt32({ n: new Int32(3) }, "n")).toEqual(new Int32(3));
    expect(removeInt64({ n: 9n }, "n")).toBe(9n);
    expect(removeInt64({ n: wide }, "n")).toBe(wide);
    expect(removeDouble({ n: 1.5 }, "n")).toBe(1.5);
    expect(removeDouble({ n: new Double(2) }, "n")).toEqual(new Double(2));

    const error = failure(() => removeInt32({ n: 2147483648 }, "n"));

    expect(OdmError.is(error) && error.message).toBe(
      "error removing int32 value for key `n`: found double",
    );
  });

  it("should accept longs and doubles the driver reads back as numbers", () => {
    const raw = BSON.deserialize(
      BSON.serialize({ price: new Double(5), big: Long.fromNumber(7), ratio: new Double(0.5) }),
    );

    expect(raw).toEqual({ price: 5, big: 7, ratio: 0.5 });
    expect(removeDouble(raw, "price")).toBe(5);
    expect(removeInt64(raw, "big")).toBe(7);
    expect(removeDouble(raw, "ratio")).toBe(0.5);
    expect(raw).toEqual({});

    const error = failure(() => removeInt64({ n: 1.5 }, "n"));

    expect(OdmError.is(error) && error.message).toBe(
      "error removing int64 value for key `n`: found double",
    );
  });

  it("should accept any numeric kind as a number", () => {
    const decimal = Decimal128.fromString("2.5");

    expect(removeNumber({ n: 1 }, "n")).toBe(1);
    expect(removeNumber({ n: 1.25 }, "n")).toBe(1.25);
    expect(removeNumber({ n: 4n }, "n")).toBe(4n);
    expect(removeNumber({ n: decimal }, "n")).toBe(decimal);
    expect(OdmError.is(failure(() => removeNumber({ n: "1" }, "n")), "IllTypedDocumentField")).toBe(
      true,
    );
  });

  it("should not take a timestamp for a long", () => {
    const error = failure(() => removeInt64({ at: new Timestamp({ t: 10, i: 1 }) }, "at"));

    expect(OdmError.is(error) && error.message).toBe(
      "error removing int64 value for key `at`: found timestamp",
    );
    expect(removeTimestamp({ at: new Timestamp({ t: 10, i: 1 }) }, "at").getHighBits()).toBe(10);
  });

  it("should only accept generic binary data", () => {
    const bytes = new Binary(Buffer.from([1, 2]));
    const uuid = new Binary(Buffer.alloc(16), Binary.SUBTYPE_UUID);

    expect(removeGenericBinary({ data: bytes }, "data")).toBe(bytes);

    const error = failure(() => removeGenericBinary({ data: uuid }, "data"));

    expect(OdmError.is(error) && error.message).toBe(
      "error removing generic binary value for key `data`: found binData",
    );
  });

  it("should remove the remaining scalar kinds", () => {
    const id = new ObjectId();
    const date = new Date(0);

    expect(removeBool({ on: false }, "on")).toBe(false);
    expect(removeString({ s: "x" }, "s")).toBe("x");
    expect(removeArray({ list: [1, 2] }, "list")).toEqual([1, 2]);
    expect(removeObjectId({ id }, "id")).toBe(id);
    expect(removeDate({ at: date }, "at")).toBe(date);
    expect(OdmError.is(failure(() => removeBool({ on: 1 }, "on")), "IllTypedDocumentField")).toBe(
      true,
    );
  });

  it("should walk into embedded documents", () => {
    const document = { stats: { total: 4, other: 1 } };
    const stats = removeInnerDocument(document, "stats");

    expect(removeInt32(stats, "total")).toBe(4);
    expect(stats).toEqual({ other: 1 });
    expect(document).toEqual({});

    const error = failure(() => removeInnerDocument({ stats: [1] }, "stats"));

    expect(OdmError.is(error) && error.message).toBe(
      "error removing document value for key `stats`: found array",
    );
  });
});
