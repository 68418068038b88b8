/**
 * Database Module
 *
 * Exports:
 * - Database adapter factory for low-level connections
 * - Record persister used by the factory to store built records
 * - DDL helpers for creating tables from their declarations
 */

// Database Adapters (low-level connections)
export type { DatabaseAdapter, QueryResult, DatabaseType, AdapterConfig } from './adapter.js';
export { PostgresAdapter } from './postgres-adapter.js';
export { SqliteAdapter, MEMORY_PATH } from './sqlite-adapter.js';

// Persistence
export type { RecordPersister, RecordCounter, RecordStore } from './record-persister.js';
export { SqlRecordPersister } from './record-persister.js';
export { createTableSql, dropTableSql, quoteIdent } from './ddl.js';
export { encodeValue, decodeValue, getDbType } from './type-mappings.js';

import type { DatabaseAdapter, AdapterConfig, DatabaseType } from './adapter.js';
import { PostgresAdapter } from './postgres-adapter.js';
import { SqliteAdapter } from './sqlite-adapter.js';

/**
 * Create a database adapter based on configuration
 *
 * @returns Database adapter instance (not yet connected)
 *
 * @example
 * const adapter = createAdapter({ dbType: 'sqlite', path: ':memory:' });
 * await adapter.connect();
 */
export function createAdapter(config: AdapterConfig): DatabaseAdapter {
    switch (config.dbType) {
        case 'sqlite':
            return new SqliteAdapter(config.path);

        case 'postgresql':
            return new PostgresAdapter({
                connectionString: config.connectionString,
                schema: config.schema,
                max: config.max,
            });
    }
}

/**
 * Check if a database type is supported
 */
export function isSupportedDatabaseType(dbType: string): dbType is DatabaseType {
    return dbType === 'postgresql' || dbType === 'sqlite';
}
