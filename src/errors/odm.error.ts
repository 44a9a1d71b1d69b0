import { colors } from "@mongez/copper";
import { inspect } from "node:util";

/**
 * The kinds of failure the mapper reports.
 *
 * - `MissingIdentifier`: an identifier was required (to replace, upsert or
 *   delete by identity, or expected back from an insert) but none was present.
 * - `DecodingFailure`: a wire value could not be converted to the expected type.
 * - `MissingDocumentField`: a required key was absent during extraction.
 * - `IllTypedDocumentField`: a key held a value of the wrong kind during extraction.
 * - `InfrastructureFailure`: the store reported a write exception or the
 *   transport failed.
 */
export type OdmErrorKind =
  | "MissingIdentifier"
  | "DecodingFailure"
  | "MissingDocumentField"
  | "IllTypedDocumentField"
  | "InfrastructureFailure";

export type OdmErrorOptions<TContext> = {
  /** The underlying error, if any */
  cause?: unknown;
  /** Structured diagnostic data attached to the failure */
  context?: TContext;
};

/**
 * Error raised by every collection, document and extraction operation.
 *
 * Besides the human-readable message it carries a machine-readable `kind` and,
 * for some failures, a typed `context` payload. `Collection.insertMany()` for
 * instance attaches the identifiers of the documents that did make it into the
 * collection.
 *
 * @example
 * ```typescript
 * try {
 *   await items.insertMany(entities);
 * } catch (error) {
 *   if (OdmError.is(error, "InfrastructureFailure")) {
 *     console.log(error.context); // Map { 0 => { ok: true, id: Uid(...) } }
 *   }
 * }
 * ```
 */
export class OdmError<TContext = unknown> extends Error {
  public readonly kind: OdmErrorKind;

  public readonly context?: TContext;

  public constructor(kind: OdmErrorKind, message: string, options: OdmErrorOptions<TContext> = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "OdmError";
    this.kind = kind;
    this.context = options.context;

    // Maintains proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, OdmError);
    }
  }

  /**
   * Determine whether the given value is an `OdmError`, optionally of the given kind.
   */
  public static is(error: unknown, kind?: OdmErrorKind): error is OdmError {
    return error instanceof OdmError && (kind === undefined || error.kind === kind);
  }

  /**
   * Create a copy of this error carrying the given context.
   */
  public withContext<TNewContext>(context: TNewContext): OdmError<TNewContext> {
    return new OdmError(this.kind, this.message, { cause: this.cause, context });
  }

  [Symbol.for("nodejs.util.inspect.custom")](): string {
    return this.toString();
  }

  public toString(): string {
    const lines = [`${colors.red(this.name)} [${colors.yellow(this.kind)}]: ${this.message}`];

    if (this.context instanceof Map) {
      for (const [position, entry] of this.context) {
        lines.push(`  #${position} ${colors.gray("→")} ${inspect(entry, { depth: 2 })}`);
      }
    } else if (this.context !== undefined) {
      lines.push(`  ${inspect(this.context, { depth: 2 })}`);
    }

    if (this.cause instanceof Error) {
      lines.push(`  ${colors.gray("caused by")} ${this.cause.message}`);
    }

    return lines.join("\n");
  }
}

/**
 * Prefix the given error with a contextual message.
 *
 * An `OdmError` keeps its kind and context; anything else is reported as an
 * `InfrastructureFailure` since it came from the driver or the transport.
 */
export function wrapError(error: unknown, message: string): OdmError {
  if (error instanceof OdmError) {
    return new OdmError(error.kind, `${message}: ${error.message}`, {
      cause: error,
      context: error.context,
    });
  }

  const reason = error instanceof Error ? error.message : String(error);

  return new OdmError("InfrastructureFailure", `${message}: ${reason}`, { cause: error });
}
