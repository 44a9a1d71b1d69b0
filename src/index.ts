// Configurations
export * from "./config";
export * from "./types";

// Contracts
export * from "./contracts";

// Errors
export * from "./errors/odm.error";

// Identifiers
export * from "./uid/uid";

// Documents
export * from "./document/bson-kind";
export * from "./document/define-document";
export * from "./document/document-ext";
export * from "./document/serialize";

// Collections
export * from "./collection/collection";
export * from "./collection/cursor";
export * from "./collection/results";
export {
  describeOperation,
  type CountInput,
  type DeleteInput,
  type QueryInput,
} from "./collection/resolve-operation";

// Database
export * from "./database/database";
export * from "./literals";

// MongoDB Driver
export * from "./drivers/mongodb/mongodb-collection-driver";

// Re-export MongoDB client types for convenience
export type { Document, Filter, MongoClientOptions, UpdateFilter } from "mongodb";

// Utilities
export * from "./utils/connect-to-database";
