import { log } from "@warlock.js/logger";
import type { Document } from "mongodb";
import type { RawCursor } from "../contracts/collection-driver.contract";
import { OdmError, wrapError } from "../errors/odm.error";

/**
 * Lazy, forward-only sequence of typed results backed by a server cursor.
 *
 * Each raw document is converted (transformed and decoded) only when it is
 * pulled. A failure, whether from the store or from the conversion, rejects
 * that pull, closes the cursor and ends the sequence.
 *
 * @example
 * ```typescript
 * for await (const item of await items.findMany({ stock: { $gt: 0 } })) {
 *   console.log(item.title);
 * }
 * ```
 */
export class DocumentCursor<Output> implements AsyncIterable<Output> {
  private iterator?: AsyncIterator<Document>;

  private finished = false;

  private iterated = false;

  public constructor(
    private readonly raw: RawCursor,
    private readonly convert: (document: Document) => Output,
    private readonly description: string,
  ) {}

  /**
   * Pull the next result, `null` once the cursor is exhausted.
   */
  public async next(): Promise<Output | null> {
    const result = await this.pull();

    return result.done ? null : result.value;
  }

  /**
   * Drain the remaining results into an array.
   */
  public async toArray(): Promise<Output[]> {
    const results: Output[] = [];

    for (let result = await this.pull(); !result.done; result = await this.pull()) {
      results.push(result.value);
    }

    return results;
  }

  /**
   * Release the server cursor; further pulls yield nothing.
   */
  public async close(): Promise<void> {
    if (this.finished) return;

    this.finished = true;

    try {
      await this.raw.close();
    } catch (error) {
      throw wrapError(error, `${this.description}: can't close cursor`);
    }
  }

  public [Symbol.asyncIterator](): AsyncIterator<Output> {
    if (this.iterated) {
      throw new OdmError("InfrastructureFailure", `${this.description}: cursor already consumed`);
    }

    this.iterated = true;

    return {
      next: () => this.pull(),
      return: async () => {
        await this.close();

        return { done: true, value: undefined };
      },
    };
  }

  private async pull(): Promise<IteratorResult<Output, undefined>> {
    if (this.finished) {
      return { done: true, value: undefined };
    }

    if (!this.iterator) {
      this.iterator = this.raw[Symbol.asyncIterator]();
    }

    try {
      const result = await this.iterator.next();

      if (result.done) {
        this.finished = true;

        return { done: true, value: undefined };
      }

      return { done: false, value: this.convert(result.value) };
    } catch (error) {
      await this.abort();

      throw wrapError(error, `${this.description}: iteration failed`);
    }
  }

  private async abort(): Promise<void> {
    this.finished = true;

    await this.raw.close().catch((closeError: unknown) => {
      log.warn("odm.collection", "close", `Failed to close cursor after an error: ${String(closeError)}`);
    });
  }
}
