export { Catalog } from "./Catalog";
export type { CatalogOptions, DynamoDBCatalogConfig, HashMemoryCatalogOptions } from "./Catalog";
export { CatalogSchema, parseIndexKeys } from "./schema/CatalogSchema";
export { WriteAheadLog, makeEntryId } from "./wal/WriteAheadLog";
export { RecoveryEngine } from "./recovery/RecoveryEngine";
export type { RecoverOptions, RecoveryEngineOptions } from "./recovery/RecoveryEngine";
export { QueryEngine } from "./query/QueryEngine";
export { CatalogTableStore } from "./store/CatalogTableStore";
export { HashTableStore } from "./store/TableAdapters/HashTableStore";
export { DynamoDBTableStore } from "./store/TableAdapters/DynamoDB/DynamoDBTableStore";
export type { DocumentCommandSender } from "./store/TableAdapters/DynamoDB/DynamoDBTableStore";
export { contentKey, contentKeyBounds, fingerprint, partitionKey } from "./keys/KeyCodec";
export { loadCatalogConfig } from "./config/CatalogConfig";
export type { CatalogConfig } from "./config/CatalogConfig";
export { CatalogLogger, logger } from "./logging/CatalogLogger";
export * from "./CatalogErrors";
export * from "./CatalogTypes";
