/**
 * Database Adapter Interface
 *
 * Abstraction layer for database backends (PostgreSQL, SQLite) used by the
 * record persister. Query interface matches pg.PoolClient.
 */

/**
 * Supported database backend types
 */
export type DatabaseType = 'postgresql' | 'sqlite';

/**
 * Query result matching pg.QueryResult structure
 */
export interface QueryResult<T = Record<string, unknown>> {
    /** Array of result rows */
    rows: T[];
    /** Number of rows affected (for INSERT/UPDATE/DELETE) */
    rowCount: number;
}

/**
 * Database Adapter Interface
 *
 * All database operations flow through this interface.
 */
export interface DatabaseAdapter {
    /**
     * Establish connection to the database
     *
     * For PostgreSQL: Acquires client from pool and sets search_path
     * For SQLite: Opens file handle (or an in-memory database)
     */
    connect(): Promise<void>;

    /**
     * Release connection resources
     */
    disconnect(): Promise<void>;

    isConnected(): boolean;

    /**
     * Execute SQL query with optional parameters
     *
     * Placeholders are always written PostgreSQL style ($1, $2, ...);
     * the SQLite adapter converts them.
     */
    query<T = Record<string, unknown>>(sql: string, params?: unknown[]): Promise<QueryResult<T>>;

    /**
     * Get the database backend type
     *
     * Used by the type mappings to pick column types and value encodings.
     */
    getType(): DatabaseType;
}

/**
 * Configuration for creating a database adapter
 */
export type AdapterConfig =
    | {
          dbType: 'sqlite';
          /** Full path to the database file, or ':memory:' */
          path: string;
      }
    | {
          dbType: 'postgresql';
          /** postgres:// connection string */
          connectionString: string;
          /** Schema put first on the search_path */
          schema?: string;
          /** Pool size (default: 5) */
          max?: number;
      };
