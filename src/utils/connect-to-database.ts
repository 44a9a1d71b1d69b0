import { colors } from "@mongez/copper";
import { log } from "@warlock.js/logger";
import { MongoClient, type MongoClientOptions } from "mongodb";
import { getOdmConfigurations } from "../config";
import { OdmDatabase } from "../database/database";
import type { OdmConfigurations } from "../types";

/**
 * An open connection: the native client and the typed database on top of it.
 */
export type DatabaseConnection = {
  client: MongoClient;
  database: OdmDatabase;
  /**
   * Close the underlying client.
   */
  disconnect(): Promise<void>;
};

/**
 * Resolve the connection string, an explicit `uri` wins over host and port.
 */
export function resolveUri(configurations: OdmConfigurations): string {
  if (configurations.uri) {
    return configurations.uri;
  }

  const host = configurations.host ?? "localhost";
  const port = configurations.port ?? 27017;

  return `mongodb://${host}:${port}`;
}

/**
 * Build the native client options, credentials and auth source only apply
 * when the client options don't define them already.
 */
export function buildClientOptions(configurations: OdmConfigurations): MongoClientOptions {
  const options: MongoClientOptions = {
    ...(configurations.clientOptions ?? {}),
  };

  if (configurations.username && !options.auth) {
    options.auth = {
      username: configurations.username,
      password: configurations.password,
    };
  }

  if (configurations.authSource && !options.authSource) {
    options.authSource = configurations.authSource;
  }

  return options;
}

/**
 * Connect to a MongoDB server.
 *
 * The given options override the ones stored with `setOdmConfigurations()`.
 *
 * @example
 * ```typescript
 * const { database, disconnect } = await connectToDatabase({ database: "shop" });
 *
 * const items = database.collection(Item);
 * // ...
 * await disconnect();
 * ```
 */
export async function connectToDatabase(
  options: OdmConfigurations = {},
): Promise<DatabaseConnection> {
  const configurations: OdmConfigurations = {
    ...getOdmConfigurations(),
    ...options,
  };

  const client = new MongoClient(resolveUri(configurations), buildClientOptions(configurations));

  try {
    log.info(
      "odm.connection",
      "connection",
      `Connecting to database ${colors.bold(colors.yellowBright(configurations.database ?? "(default)"))}`,
    );

    await client.connect();

    log.success("odm.connection", "connection", "Connected to database");
  } catch (error) {
    await client.close().catch((closeError: unknown) => {
      log.warn("odm.connection", "connection", `Failed to close client: ${String(closeError)}`);
    });

    log.error(
      "odm.connection",
      "connection",
      `Failed to connect to database: ${error instanceof Error ? error.message : String(error)}`,
    );

    throw error;
  }

  client.on("close", () => {
    log.warn("odm.connection", "connection", "Disconnected from database");
  });

  return {
    client,
    database: new OdmDatabase(client.db(configurations.database)),
    disconnect: () => client.close(),
  };
}
