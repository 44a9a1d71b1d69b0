import { inspect } from "node:util";
import { describe, expect, it } from "vitest";
import {
  countOperation,
  deleteOperation,
  describeOperation,
  isCountOperation,
  isQueryOperation,
} from "../../../src/collection/resolve-operation";
import type { Item } from "../../fixtures/documents/item";
import { InStock, SoldOut, Titles } from "../../fixtures/documents/item";

describe("describeOperation", () => {
  it("should render values on a single line", () => {
    expect(describeOperation({ title: "Lamp", stock: { $gt: 1 } })).toBe(
      "{ title: 'Lamp', stock: { '$gt': 1 } }",
    );
  });

  it("should never throw", () => {
    const hostile = {
      [inspect.custom]() {
        throw new Error("no rendering");
      },
    };

    expect(describeOperation(hostile)).toBe("<unrenderable operation>");
  });
});

describe("operation values", () => {
  it("should tell operations from bare filters", () => {
    expect(isCountOperation<Item>(new InStock())).toBe(true);
    expect(isCountOperation<Item>({ stock: 1 })).toBe(false);
    expect(isCountOperation<Item>({ filter: { $exists: true } })).toBe(false);
    expect(isQueryOperation<Item, string>(new Titles())).toBe(true);
    expect(isQueryOperation<Item, string>({ output: 5 })).toBe(false);
  });

  it("should wrap bare filters", () => {
    expect(countOperation<Item>({ stock: 0 }).filter?.()).toEqual({ stock: 0 });
    expect(deleteOperation<Item>({ stock: 0 }).filter()).toEqual({ stock: 0 });
  });

  it("should pass operations through", () => {
    const operation = new SoldOut();

    expect(deleteOperation<Item>(operation)).toBe(operation);
  });
});
