import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import { SqliteAdapter, MEMORY_PATH } from '@src/lib/database/sqlite-adapter.js';
import { createAdapter, isSupportedDatabaseType, PostgresAdapter } from '@src/lib/database/index.js';

describe('SqliteAdapter', () => {
    let adapter: SqliteAdapter;

    beforeEach(async () => {
        adapter = new SqliteAdapter();
        await adapter.connect();
        await adapter.query('CREATE TABLE note (id INTEGER PRIMARY KEY AUTOINCREMENT, body TEXT NOT NULL)');
    });

    afterEach(async () => {
        await adapter.disconnect();
    });

    it('should default to an in-memory database', () => {
        expect(adapter.getPath()).toBe(MEMORY_PATH);
        expect(adapter.getType()).toBe('sqlite');
        expect(adapter.isConnected()).toBe(true);
    });

    it('should convert $n placeholders', () => {
        expect(adapter.convertPlaceholders('SELECT * FROM note WHERE id = $1 AND body = $2'))
            .toBe('SELECT * FROM note WHERE id = ? AND body = ?');
    });

    it('should report changes for statements without rows', async () => {
        const result = await adapter.query('INSERT INTO note (body) VALUES ($1), ($2)', ['a', 'b']);

        expect(result).toEqual({ rows: [], rowCount: 2 });
    });

    it('should return rows for INSERT ... RETURNING', async () => {
        const result = await adapter.query<{ id: number; body: string }>(
            'INSERT INTO note (body) VALUES ($1) RETURNING *',
            ['hello']
        );

        expect(result.rows).toEqual([{ id: 1, body: 'hello' }]);
        expect(result.rowCount).toBe(1);
    });

    it('should refuse queries after disconnect', async () => {
        await adapter.disconnect();
        await expect(adapter.query('SELECT 1')).rejects.toThrow('SqliteAdapter: Not connected. Call connect() first.');
    });

    it('should build file paths from a data directory', () => {
        expect(SqliteAdapter.pathFor('data', 'factory')).toBe(join('data', 'factory.db'));
    });
});

describe('createAdapter', () => {
    it('should create a SQLite adapter', () => {
        const adapter = createAdapter({ dbType: 'sqlite', path: MEMORY_PATH });

        expect(adapter).toBeInstanceOf(SqliteAdapter);
        expect(adapter.isConnected()).toBe(false);
    });

    it('should create a PostgreSQL adapter without connecting', () => {
        const adapter = createAdapter({ dbType: 'postgresql', connectionString: 'postgres://localhost:5432/factory_test' });

        expect(adapter).toBeInstanceOf(PostgresAdapter);
        expect(adapter.getType()).toBe('postgresql');
        expect(adapter.isConnected()).toBe(false);
    });

    it('should recognize supported database types', () => {
        expect(isSupportedDatabaseType('sqlite')).toBe(true);
        expect(isSupportedDatabaseType('postgresql')).toBe(true);
        expect(isSupportedDatabaseType('mysql')).toBe(false);
    });
});
