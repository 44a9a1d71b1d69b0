import type { Document, IndexDescription, ObjectId } from "mongodb";
import type { DocumentContract } from "../contracts/document.contract";
import type { Decoder } from "../types";
import type { Uid } from "../uid/uid";

/**
 * Shape every entity stored through the mapper has: an optional `_id`.
 */
export type WithUid<T, Id = ObjectId> = {
  _id?: Uid<T, Id>;
};

/**
 * Per-type defaults: no user-defined index, no validator and the server
 * defaults for every operation kind.
 */
export const documentDefaults = {
  indexes: (): IndexDescription[] => [],
  validator: (): Document | undefined => undefined,
  countOptions: () => ({}),
  distinctOptions: () => ({}),
  aggregateOptions: () => ({}),
  queryOptions: () => ({}),
  insertOptions: () => ({}),
  deleteOptions: () => ({}),
  updateOptions: () => ({}),
  upsertOptions: () => ({}),
  findAndUpdateOptions: () => ({}),
} satisfies Omit<DocumentContract<unknown>, "name" | "schema" | "idSchema" | "id" | "setId">;

/**
 * Configuration accepted by `defineDocument()`.
 *
 * Only `name`, `schema` and `idSchema` are required, anything else falls back
 * to `documentDefaults` or, for the identifier accessors, to the `_id` property.
 */
export type DefineDocumentOptions<T, Id> = Pick<DocumentContract<T, Id>, "name" | "schema"> & {
  idSchema: Decoder<Uid<T, Id>>;
} & Partial<Omit<DocumentContract<T, Id>, "name" | "schema" | "idSchema">>;

/**
 * Define the capability set of a document type.
 *
 * @example
 * ```typescript
 * type Item = { _id?: Uid<Item>; title: string; stock: number };
 *
 * export const Item = defineDocument({
 *   name: "items",
 *   schema: z.object({
 *     _id: uidSchema<Item>().optional(),
 *     title: z.string(),
 *     stock: z.number().int(),
 *   }),
 *   idSchema: uidSchema<Item>(),
 *   indexes: () => [{ key: { title: Order.Ascending }, unique: true }],
 * });
 * ```
 */
export function defineDocument<T extends WithUid<T, Id>, Id = ObjectId>(
  options: DefineDocumentOptions<T, Id>,
): DocumentContract<T, Id> {
  if (!options.name) {
    throw new Error("A document type needs a non-empty collection name.");
  }

  return Object.freeze({
    ...documentDefaults,
    id: (entity: T) => entity._id,
    setId: (entity: T, id: Uid<T, Id>) => {
      const target: WithUid<T, Id> = entity;

      target._id = id;
    },
    ...options,
  });
}
