import { ObjectId } from "mongodb";
import { inspect } from "node:util";
import { describe, expect, it } from "vitest";
import { z } from "zod";
import { Uid, objectIdDecoder, uidSchema } from "../../../src/uid/uid";
import type { Item } from "../../fixtures/documents/item";

const HEX = "64b7f0c2a1b2c3d4e5f60718";

describe("Uid", () => {
  it("should serialize to the bare raw value", () => {
    const id = Uid.of<Item, number>(7);

    expect(id.toBSON()).toBe(7);
    expect(JSON.stringify({ _id: id })).toBe('{"_id":7}');
  });

  it("should render object ids as hex", () => {
    const id = Uid.of<Item, ObjectId>(ObjectId.createFromHexString(HEX));

    expect(id.toString()).toBe(HEX);
    expect(inspect(id)).toBe(`Uid(${HEX})`);
  });

  it("should compare equal when wrapping equal values", () => {
    const left = Uid.of<Item, ObjectId>(ObjectId.createFromHexString(HEX));
    const right = Uid.of<Item, ObjectId>(new ObjectId(HEX));

    expect(left.equals(right)).toBe(true);
    expect(left.key()).toBe(right.key());
    expect(left.compare(right)).toBe(0);
  });

  it("should order numbers before strings", () => {
    const ids = [
      Uid.of<Item, number | string>("b"),
      Uid.of<Item, number | string>(10),
      Uid.of<Item, number | string>("a"),
      Uid.of<Item, number | string>(2),
    ];

    const sorted = [...ids].sort((left, right) => left.compare(right)).map((id) => id.value);

    expect(sorted).toEqual([2, 10, "a", "b"]);
  });

  it("should tell apart a number and its string form", () => {
    expect(Uid.of<Item, number | string>(1).equals(Uid.of<Item, number | string>("1"))).toBe(false);
  });

  it("should generate fresh object ids", () => {
    const first = Uid.newObjectId<Item>();
    const second = Uid.newObjectId<Item>();

    expect(first.value).toBeInstanceOf(ObjectId);
    expect(first.equals(second)).toBe(false);
  });
});

describe("objectIdDecoder", () => {
  it("should accept object ids and their hex form", () => {
    const fromHex = objectIdDecoder.parse(HEX);

    expect(fromHex).toBeInstanceOf(ObjectId);
    expect(fromHex.toHexString()).toBe(HEX);
    expect(objectIdDecoder.safeParse("not-an-id").success).toBe(false);
  });
});

describe("uidSchema", () => {
  it("should decode raw object ids", () => {
    const id = uidSchema<Item>().parse(ObjectId.createFromHexString(HEX));

    expect(id).toBeInstanceOf(Uid);
    expect(id.toString()).toBe(HEX);
  });

  it("should unwrap values that already are identifiers", () => {
    const original = Uid.of<Item, ObjectId>(ObjectId.createFromHexString(HEX));

    expect(uidSchema<Item>().parse(original).equals(original)).toBe(true);
  });

  it("should fail on values of another type", () => {
    expect(uidSchema<Item>().safeParse(42).success).toBe(false);
  });

  it("should use the given raw decoder", () => {
    const schema = uidSchema<Item, number>(z.number().int());

    expect(schema.parse(5).value).toBe(5);
    expect(schema.safeParse(1.5).success).toBe(false);
  });
});
