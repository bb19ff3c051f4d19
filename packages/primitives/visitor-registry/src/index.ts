export { VisitorRegistry, DEFAULT_VISITOR_POLICY, RATE_LIMIT_MESSAGE } from "./registry";
export { FeedbackRegistry, DEFAULT_FEEDBACK_POLICY } from "./feedback";
export { createHandlers } from "./handlers";
export type { ApiErrorBody, ApiErrorCode, HandlerResponse, Handlers, HandlersConfig } from "./handlers";
export { migrateStorage } from "./migration";
export type { MigrationOptions, MigrationResult } from "./migration";
export { loadConfig, createStorage, createGuestbook } from "./config";
export type { Guestbook, GuestbookConfig, StorageConfig } from "./config";
export { EventEmitter } from "./events";
export { MemoryAdapter } from "./adapters/memory";
export { FileAdapter } from "./adapters/file";
export type { FileAdapterOptions } from "./adapters/file";
export { PostgresAdapter } from "./adapters/postgres";
export type { PgClient, PgPool, PostgresAdapterOptions } from "./adapters/postgres";
export { identityKey, sanitizeText } from "./utils";
export type * from "./types";
export type * from "./storage/types";
export * from "./errors";
