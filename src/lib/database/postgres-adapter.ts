/**
 * PostgreSQL Database Adapter
 *
 * Wraps pg.Pool/pg.PoolClient with the DatabaseAdapter interface.
 */

import pg from 'pg';
import type { DatabaseAdapter, QueryResult, DatabaseType } from './adapter.js';

export interface PostgresAdapterOptions {
    connectionString: string;
    /** Schema put first on the search_path after connecting */
    schema?: string;
    /** Pool size (default: 5) */
    max?: number;
}

/**
 * PostgreSQL implementation of DatabaseAdapter
 *
 * Lifecycle:
 * 1. connect() - Acquires client from pool, sets search_path
 * 2. query() - Executes queries through client
 * 3. disconnect() - Releases client and ends the pool
 */
export class PostgresAdapter implements DatabaseAdapter {
    private readonly options: PostgresAdapterOptions;
    private pool: pg.Pool | null = null;
    private client: pg.PoolClient | null = null;

    constructor(options: PostgresAdapterOptions) {
        this.options = options;
    }

    /**
     * Acquire client from pool and configure search_path
     */
    async connect(): Promise<void> {
        if (this.client) {
            return; // Already connected
        }

        this.pool = new pg.Pool({
            connectionString: this.options.connectionString,
            max: this.options.max ?? 5,
        });
        this.client = await this.pool.connect();

        if (this.options.schema) {
            await this.client.query(`SET search_path TO "${this.options.schema}", public`);
        }
    }

    /**
     * Release client back to pool
     */
    async disconnect(): Promise<void> {
        if (!this.client || !this.pool) {
            return; // Not connected
        }

        this.client.release();
        this.client = null;
        await this.pool.end();
        this.pool = null;
    }

    isConnected(): boolean {
        return this.client !== null;
    }

    /**
     * Execute SQL query
     *
     * PostgreSQL uses $1, $2, $3... for parameter placeholders.
     */
    async query<T = Record<string, unknown>>(sql: string, params: unknown[] = []): Promise<QueryResult<T>> {
        const client = this.requireConnection();
        const result = await client.query(sql, params);

        return {
            rows: result.rows,
            rowCount: result.rowCount ?? 0,
        };
    }

    getType(): DatabaseType {
        return 'postgresql';
    }

    private requireConnection(): pg.PoolClient {
        if (!this.client) {
            throw new Error('PostgresAdapter: Not connected. Call connect() first.');
        }
        return this.client;
    }
}
