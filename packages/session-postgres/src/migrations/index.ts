import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";

import type { QueryExecutor } from "../executors/query-executor.js";

export const sessionMigrations = [
  {
    id: "0001_sessions",
    filename: "0001_sessions.sql",
    description: "Session records with generation and refresh timestamp",
  },
] as const;

export interface LoadedMigration {
  readonly id: string;
  readonly sql: string;
}

export const loadSessionMigrations = async (): Promise<LoadedMigration[]> =>
  Promise.all(
    sessionMigrations.map(async (migration) => ({
      id: migration.id,
      sql: await readFile(fileURLToPath(new URL(`./${migration.filename}`, import.meta.url)), "utf8"),
    })),
  );

export const migrateSessionStore = async (executor: QueryExecutor): Promise<void> => {
  for (const migration of await loadSessionMigrations()) {
    await executor.query(migration.sql);
  }
};
