import { vi } from 'vitest';
import type { QueryResult, SqlClient, SqlDialect, SqlPool } from '@rateboard/core';

export const EMPTY_RESULT: QueryResult = { rows: [], rowCount: 0 };

/**
 * SqlPool stand-in; transactions run on the pool itself
 */
export class MockSqlPool implements SqlPool {
  readonly query = vi.fn(
    async (_sql: string, _params?: readonly unknown[]): Promise<QueryResult> => EMPTY_RESULT
  );
  readonly end = vi.fn(async (): Promise<void> => undefined);
  transactions = 0;

  constructor(readonly dialect: SqlDialect) {}

  async transaction<T>(fn: (client: SqlClient) => Promise<T>): Promise<T> {
    this.transactions++;
    return fn(this);
  }

  /** SQL text of the nth query */
  sql(index: number): string {
    return this.query.mock.calls[index]?.[0] ?? '';
  }

  /** Parameters of the nth query */
  params(index: number): readonly unknown[] | undefined {
    return this.query.mock.calls[index]?.[1];
  }
}
