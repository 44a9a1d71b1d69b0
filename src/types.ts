import type { MongoClientOptions } from "mongodb";
import type { ZodType, ZodTypeDef } from "zod";

export type OdmConfigurations = {
  /**
   * Connection string, takes precedence over host/port
   */
  uri?: string;
  /**
   * Database host
   * @default `localhost`
   */
  host?: string;
  /**
   * Database port
   * @default 27017
   */
  port?: number;
  /**
   * Database username
   */
  username?: string;
  /**
   * Database password
   */
  password?: string;
  /**
   * Authentication database
   */
  authSource?: string;
  /**
   * Database name
   */
  database?: string;
  /**
   * Debug level
   * Could be one of the following values: `error`, `warn`, `info`
   * @default `warn`
   */
  debugLevel?: "error" | "warn" | "info";
  /**
   * Native client options, merged into the options built from the fields above
   */
  clientOptions?: MongoClientOptions;
};

/**
 * Anything able to turn a loosely-typed wire value into `Output`.
 *
 * Any `zod` schema qualifies, including ones with transforms.
 */
export type Decoder<Output> = ZodType<Output, ZodTypeDef, unknown>;
