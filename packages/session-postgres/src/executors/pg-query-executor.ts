import type { Pool, QueryResultRow } from "pg";

import { describeError, runWithSpan } from "@sessionguard/telemetry";

import type { PostgresTelemetryContext } from "../telemetry.js";
import type { QueryExecutor, QueryResult } from "./query-executor.js";

export type PgQueryable = Pick<Pool, "query">;

export interface CreatePgQueryExecutorOptions {
  readonly telemetry?: PostgresTelemetryContext;
}

const truncateStatement = (sql: string, limit = 200): string =>
  sql.length > limit ? `${sql.slice(0, limit)}…` : sql;

export const createPgQueryExecutor = (
  queryable: PgQueryable,
  options: CreatePgQueryExecutorOptions = {},
): QueryExecutor => ({
  async query<Row extends QueryResultRow = QueryResultRow>(
    sql: string,
    params: ReadonlyArray<unknown> = [],
  ): Promise<QueryResult<Row>> {
    const telemetry = options.telemetry;
    if (!telemetry) {
      const result = await queryable.query<Row>(sql, [...params]);
      return { rows: result.rows } satisfies QueryResult<Row>;
    }

    const start = performance.now();
    const record = (outcome: "ok" | "error") => {
      const duration = performance.now() - start;
      telemetry.metrics.queryCounter.add(1, { outcome });
      telemetry.metrics.queryDuration.record(duration, { outcome });
      return duration;
    };

    try {
      const result = await runWithSpan(
        telemetry.tracer,
        "postgres.query",
        async (span) => {
          span.setAttribute("db.system", "postgresql");
          span.setAttribute("db.statement", sql);
          span.setAttribute("db.sql.parameters_length", params.length);
          const queryResult = await queryable.query<Row>(sql, [...params]);
          span.setAttribute("db.rows_returned", queryResult.rowCount ?? queryResult.rows.length);
          return queryResult;
        },
        {
          onError: (error) => {
            telemetry.logger.error("postgres.query.failed", {
              statement: truncateStatement(sql),
              error: describeError(error),
            });
          },
        },
      );

      const durationMs = record("ok");
      telemetry.logger.debug("postgres.query.success", { statement: truncateStatement(sql), durationMs });
      return { rows: result.rows } satisfies QueryResult<Row>;
    } catch (error) {
      record("error");
      throw error;
    }
  },
});
