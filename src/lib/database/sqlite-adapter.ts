/**
 * SQLite Database Adapter
 *
 * Uses better-sqlite3 for synchronous SQLite access. Tests run it against
 * ':memory:' so every test file gets a private, throwaway database.
 */

import { join } from 'path';
import Database from 'better-sqlite3';
import type { DatabaseAdapter, QueryResult, DatabaseType } from './adapter.js';

export const MEMORY_PATH = ':memory:';

/**
 * SQLite implementation of DatabaseAdapter
 *
 * Note: better-sqlite3 is synchronous, but we use async interface
 * for consistency with the PostgreSQL adapter.
 *
 * Differences from PostgreSQL:
 * - Parameter placeholders: ? instead of $1, $2 (converted internally)
 * - Booleans stored as 0/1, timestamps and JSON as TEXT (see type-mappings)
 */
export class SqliteAdapter implements DatabaseAdapter {
    private readonly dbPath: string;
    private db: Database.Database | null = null;

    /**
     * @param dbPath - Database file path, or ':memory:'
     */
    constructor(dbPath: string = MEMORY_PATH) {
        this.dbPath = dbPath;
    }

    /**
     * Build the conventional file path `<dataDir>/<name>.db`
     */
    static pathFor(dataDir: string, name: string): string {
        return join(dataDir, `${name}.db`);
    }

    /**
     * Open SQLite database
     */
    async connect(): Promise<void> {
        if (this.db) {
            return; // Already connected
        }

        this.db = new Database(this.dbPath);

        if (this.dbPath !== MEMORY_PATH) {
            // WAL has no effect on in-memory databases
            this.db.pragma('journal_mode = WAL');
        }
        this.db.pragma('foreign_keys = ON');
    }

    /**
     * Close SQLite database
     */
    async disconnect(): Promise<void> {
        if (!this.db) {
            return; // Not connected
        }

        this.db.close();
        this.db = null;
    }

    isConnected(): boolean {
        return this.db !== null;
    }

    /**
     * Execute SQL query
     *
     * Converts PostgreSQL-style $1, $2 placeholders to SQLite ? placeholders.
     * Statements that return data (SELECT, INSERT ... RETURNING) yield rows;
     * the rest report the number of changed rows.
     */
    async query<T = Record<string, unknown>>(sql: string, params: unknown[] = []): Promise<QueryResult<T>> {
        const db = this.requireConnection();
        const stmt = db.prepare<unknown[], T>(this.convertPlaceholders(sql));

        if (stmt.reader) {
            const rows = stmt.all(...params);
            return {
                rows,
                rowCount: rows.length,
            };
        }

        const info = stmt.run(...params);
        return {
            rows: [],
            rowCount: info.changes,
        };
    }

    getType(): DatabaseType {
        return 'sqlite';
    }

    getPath(): string {
        return this.dbPath;
    }

    private requireConnection(): Database.Database {
        if (!this.db) {
            throw new Error('SqliteAdapter: Not connected. Call connect() first.');
        }
        return this.db;
    }

    /**
     * Convert PostgreSQL-style $1, $2, $3 placeholders to SQLite ? placeholders
     *
     * PostgreSQL: SELECT * FROM author WHERE id = $1 AND name = $2
     * SQLite:     SELECT * FROM author WHERE id = ? AND name = ?
     *
     * Parameters must be passed in placeholder order.
     */
    convertPlaceholders(sql: string): string {
        return sql.replace(/\$\d+/g, '?');
    }
}
