import type { Document } from "mongodb";
import type { ZodError } from "zod";
import { OdmError } from "../errors/odm.error";
import type { Decoder } from "../types";
import { bsonKindOf, isDocument } from "./bson-kind";

type BsonConvertible = { toBSON(): unknown };

function isBsonConvertible(value: object): value is BsonConvertible {
  return "toBSON" in value && typeof value.toBSON === "function";
}

/**
 * Convert a value into its wire form.
 *
 * Values exposing `toBSON()` are replaced by its result, `undefined` object
 * properties are dropped, arrays and embedded documents are walked and every
 * BSON value class is kept as is.
 */
export function serializeValue(value: unknown): unknown {
  if (value === null || typeof value !== "object") {
    return value;
  }

  if (isBsonConvertible(value)) {
    return serializeValue(value.toBSON());
  }

  if (Array.isArray(value)) {
    return value.map((item) => (item === undefined ? null : serializeValue(item)));
  }

  if (bsonKindOf(value) !== "object") {
    return value;
  }

  const document: Document = {};

  for (const [key, item] of Object.entries(value)) {
    if (item !== undefined) {
      document[key] = serializeValue(item);
    }
  }

  return document;
}

/**
 * Serialize an entity into a top-level document.
 */
export function serializeDocument(entity: unknown, typeName = "entity"): Document {
  const serialized = serializeValue(entity);

  if (!isDocument(serialized)) {
    throw new OdmError(
      "DecodingFailure",
      `can't serialize ${typeName}: expected a document, found ${bsonKindOf(serialized)}`,
    );
  }

  return serialized;
}

/**
 * Decode a wire value with the given decoder, failing with a `DecodingFailure`.
 */
export function decodeValue<Output>(decoder: Decoder<Output>, raw: unknown, what: string): Output {
  const result = decoder.safeParse(raw);

  if (!result.success) {
    throw new OdmError("DecodingFailure", `can't deserialize ${what}: ${describeIssues(result.error)}`, {
      cause: result.error,
    });
  }

  return result.data;
}

function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
