/**
 * PostgreSQL Client
 *
 * Wrapper around a pg pool for the read-only queries the stores run.
 * Identifiers are validated; values always travel as parameters.
 */

import pg from 'pg';
import { StoreUnavailableError } from '@callbridge/core';

const { Pool } = pg;

export interface PostgresClientConfig {
  /** Connection string or individual params */
  connectionString?: string;
  host?: string;
  port?: number;
  database?: string;
  user?: string;
  password?: string;
  ssl?: boolean | { rejectUnauthorized?: boolean };
  /** Connection pool size */
  max?: number;
}

export type Row = Record<string, unknown>;

export interface PostgresQueryResult {
  rows: Row[];
  rowCount: number;
}

export interface WhereClause {
  column: string;
  value: unknown;
}

export interface SelectOptions {
  columns?: string[];
  where?: WhereClause[];
  orderBy?: { column: string; direction: 'asc' | 'desc' }[];
  schema?: string;
}

/** Valid SQL identifier pattern (alphanumeric + underscore, must start with letter/underscore) */
const VALID_IDENTIFIER = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

function message(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Throw unless `name` is a plain SQL identifier
 */
export function validateIdentifier(name: string, type: string): void {
  if (!VALID_IDENTIFIER.test(name)) {
    throw new StoreUnavailableError({
      message: `Invalid ${type} name: "${name}". Must be alphanumeric with underscores, starting with a letter or underscore.`,
      suggestion: `Use only valid SQL identifiers for ${type} names.`,
    });
  }
}

export function quoteIdentifier(name: string, type: string): string {
  validateIdentifier(name, type);
  return `"${name}"`;
}

export class PostgresClient {
  private pool: pg.Pool;
  private connected = false;

  constructor(config: PostgresClientConfig) {
    this.pool = new Pool({
      connectionString: config.connectionString,
      host: config.host,
      port: config.port ?? 5432,
      database: config.database,
      user: config.user,
      password: config.password,
      ssl: config.ssl,
      max: config.max ?? 10,
    });
  }

  get isConnected(): boolean {
    return this.connected;
  }

  /**
   * Test connection
   */
  async connect(): Promise<void> {
    try {
      const client = await this.pool.connect();
      client.release();
      this.connected = true;
    } catch (error) {
      throw new StoreUnavailableError({
        message: `PostgreSQL connection failed: ${message(error)}`,
        suggestion: 'Check host, port, database, user, and password.',
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  /**
   * Close all connections
   */
  async disconnect(): Promise<void> {
    await this.pool.end();
    this.connected = false;
  }

  /**
   * Execute a parameterized query
   */
  async query(sql: string, params: unknown[] = []): Promise<PostgresQueryResult> {
    try {
      const result = await this.pool.query<Row>(sql, params);
      return {
        rows: result.rows,
        rowCount: result.rowCount ?? 0,
      };
    } catch (error) {
      throw new StoreUnavailableError({
        message: `Query failed: ${message(error)}`,
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  /**
   * Select rows with equality filters
   */
  async select(table: string, options: SelectOptions = {}): Promise<Row[]> {
    const schema = options.schema ?? 'public';
    const from = `${quoteIdentifier(schema, 'schema')}.${quoteIdentifier(table, 'table')}`;
    const columns = options.columns?.length
      ? options.columns.map((c) => quoteIdentifier(c, 'column')).join(', ')
      : '*';

    const params: unknown[] = [];
    let sql = `SELECT ${columns} FROM ${from}`;

    if (options.where?.length) {
      const clauses = options.where.map((w) => {
        params.push(w.value);
        return `${quoteIdentifier(w.column, 'column')} = $${params.length}`;
      });
      sql += ` WHERE ${clauses.join(' AND ')}`;
    }

    if (options.orderBy?.length) {
      const clauses = options.orderBy.map(
        (o) => `${quoteIdentifier(o.column, 'column')} ${o.direction.toUpperCase()}`
      );
      sql += ` ORDER BY ${clauses.join(', ')}`;
    }

    const result = await this.query(sql, params);
    return result.rows;
  }
}
