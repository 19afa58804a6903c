import type { QueryResultRow } from "pg";

export interface QueryResult<Row> {
  readonly rows: ReadonlyArray<Row>;
}

export interface QueryExecutor {
  query<Row extends QueryResultRow = QueryResultRow>(
    sql: string,
    params?: ReadonlyArray<unknown>,
  ): Promise<QueryResult<Row>>;
}
