export type { QueryExecutor, QueryResult } from "./executors/query-executor.js";
export { createPgQueryExecutor } from "./executors/pg-query-executor.js";
export type { CreatePgQueryExecutorOptions, PgQueryable } from "./executors/pg-query-executor.js";

export { loadSessionMigrations, migrateSessionStore, sessionMigrations } from "./migrations/index.js";
export type { LoadedMigration } from "./migrations/index.js";

export {
  createPostgresSessionStore,
  PostgresSessionStore,
} from "./postgres-session-store.js";
export type { PostgresSessionStoreOptions } from "./postgres-session-store.js";

export { createPostgresTelemetry } from "./telemetry.js";
export type {
  PostgresTelemetryContext,
  PostgresTelemetryMetrics,
  PostgresTelemetryOptions,
} from "./telemetry.js";
