import { beforeEach, describe, expect, it, vi } from 'vitest';
import { StoreUnavailableError } from '@callbridge/core';

interface PgState {
  queries: { sql: string; params?: unknown[] }[];
  rows: Record<string, unknown>[];
  connectError: string | null;
  queryError: string | null;
}

const pgState = vi.hoisted(() => {
  const state: PgState = { queries: [], rows: [], connectError: null, queryError: null };
  return state;
});

vi.mock('pg', () => {
  class MockPool {
    connect = vi.fn(async () => {
      if (pgState.connectError) throw new Error(pgState.connectError);
      return { release: vi.fn() };
    });
    query = vi.fn(async (sql: string, params?: unknown[]) => {
      pgState.queries.push({ sql, params });
      if (pgState.queryError) throw new Error(pgState.queryError);
      return { rows: pgState.rows, rowCount: pgState.rows.length };
    });
    end = vi.fn(async () => {});
  }
  return { default: { Pool: MockPool }, Pool: MockPool };
});

// Imports after mocks
import { PostgresClient } from '../src/postgresql/client.js';

beforeEach(() => {
  pgState.queries.length = 0;
  pgState.rows = [];
  pgState.connectError = null;
  pgState.queryError = null;
});

describe('PostgresClient', () => {
  it('connects and disconnects', async () => {
    const client = new PostgresClient({ connectionString: 'postgres://callbridge@localhost/test' });

    await client.connect();
    expect(client.isConnected).toBe(true);
    await client.disconnect();
    expect(client.isConnected).toBe(false);
  });

  it('wraps connection failures', async () => {
    pgState.connectError = 'timeout';
    const client = new PostgresClient({});

    const failure = client.connect();
    await expect(failure).rejects.toBeInstanceOf(StoreUnavailableError);
    await expect(failure).rejects.toThrow('PostgreSQL connection failed: timeout');
  });

  it('builds parameterized selects', async () => {
    pgState.rows = [{ id: 1, target_field: 'name' }];
    const client = new PostgresClient({});

    const rows = await client.select('ssot_field_mappings', {
      columns: ['id', 'target_field'],
      where: [
        { column: 'job_type_id', value: 77 },
        { column: 'target_entity', value: "ivr' OR '1'='1" },
      ],
      orderBy: [{ column: 'id', direction: 'desc' }],
    });

    expect(rows).toEqual([{ id: 1, target_field: 'name' }]);
    expect(pgState.queries).toEqual([
      {
        sql:
          'SELECT "id", "target_field" FROM "public"."ssot_field_mappings" ' +
          'WHERE "job_type_id" = $1 AND "target_entity" = $2 ORDER BY "id" DESC',
        params: [77, "ivr' OR '1'='1"],
      },
    ]);
  });

  it('rejects unsafe identifiers before querying', async () => {
    const client = new PostgresClient({});

    await expect(
      client.select('ssot_field_mappings', { where: [{ column: 'id;DROP TABLE users;', value: 1 }] })
    ).rejects.toBeInstanceOf(StoreUnavailableError);
    await expect(client.select('mappings', { schema: 'public"; --' })).rejects.toThrow(
      'Invalid schema name: "public"; --"'
    );
    expect(pgState.queries).toHaveLength(0);
  });

  it('wraps query failures', async () => {
    pgState.queryError = 'relation "job_types" does not exist';
    const client = new PostgresClient({});

    await expect(client.query('SELECT 1')).rejects.toThrow('Query failed: relation "job_types" does not exist');
  });
});
