import type { Table } from '@src/lib/table.js';
import { TableRecord } from '@src/lib/table-record.js';
import { logger as defaultLogger, type Logger } from '@src/lib/logger.js';
import type { DatabaseAdapter } from './adapter.js';
import { quoteIdent } from './ddl.js';
import { decodeValue, encodeValue } from './type-mappings.js';

/**
 * Stores a built record and returns it as the database saw it
 *
 * The returned record carries database-assigned values (generated keys,
 * column defaults) loaded as its original state.
 */
export interface RecordPersister {
    insert(record: TableRecord): Promise<TableRecord>;
}

/**
 * Row counts by table, optionally filtered by column equality
 */
export interface RecordCounter {
    count(table: Table, where?: Readonly<Record<string, unknown>>): Promise<number>;
}

export type RecordStore = RecordPersister & RecordCounter;

/**
 * RecordPersister over a DatabaseAdapter using INSERT ... RETURNING
 *
 * Both PostgreSQL and SQLite (3.35+) support RETURNING, so a single
 * statement both stores the row and reads back the generated values.
 */
export class SqlRecordPersister implements RecordStore {
    constructor(
        private readonly adapter: DatabaseAdapter,
        private readonly logger: Logger = defaultLogger
    ) {}

    async insert(record: TableRecord): Promise<TableRecord> {
        const table = record.table;
        const dbType = this.adapter.getType();
        const data = record.toObject();

        const columns: string[] = [];
        const params: unknown[] = [];

        for (const field of table.fields) {
            const value = data[field.fieldName];
            // Leave unset columns to the database so defaults apply
            if (value === undefined) {
                continue;
            }
            columns.push(quoteIdent(field.fieldName));
            params.push(encodeValue(field, value, dbType));
        }

        const sql = columns.length === 0
            ? `INSERT INTO ${quoteIdent(table.tableName)} DEFAULT VALUES RETURNING *`
            : `INSERT INTO ${quoteIdent(table.tableName)} (${columns.join(', ')}) VALUES (${params.map((_, i) => `$${i + 1}`).join(', ')}) RETURNING *`;

        const start = process.hrtime.bigint();
        const result = await this.adapter.query(sql, params);
        this.logger.time('Record inserted', start, { table: table.tableName, columns: columns.length });

        const row = result.rows[0];
        if (!row) {
            throw new Error(`Insert into '${table.tableName}' returned no row`);
        }

        const stored = new TableRecord(table);
        stored.load(this.decodeRow(table, row));
        return stored;
    }

    /**
     * Count rows in a table, optionally filtered by equality on columns
     */
    async count(table: Table, where: Readonly<Record<string, unknown>> = {}): Promise<number> {
        const dbType = this.adapter.getType();
        const clauses: string[] = [];
        const params: unknown[] = [];

        for (const [fieldName, value] of Object.entries(where)) {
            const field = table.getField(fieldName);
            if (!field) {
                throw new Error(`Unknown field '${fieldName}' on table '${table.tableName}'`);
            }
            if (value === null) {
                clauses.push(`${quoteIdent(fieldName)} IS NULL`);
                continue;
            }
            params.push(encodeValue(field, value, dbType));
            clauses.push(`${quoteIdent(fieldName)} = $${params.length}`);
        }

        const whereSql = clauses.length > 0 ? ` WHERE ${clauses.join(' AND ')}` : '';
        const result = await this.adapter.query<{ count: number | string | bigint }>(
            `SELECT COUNT(*) AS count FROM ${quoteIdent(table.tableName)}${whereSql}`,
            params
        );

        // pg returns COUNT(*) as a bigint string
        return Number(result.rows[0]?.count ?? 0);
    }

    private decodeRow(table: Table, row: Readonly<Record<string, unknown>>): Record<string, unknown> {
        const decoded: Record<string, unknown> = {};
        for (const [column, raw] of Object.entries(row)) {
            const field = table.getField(column);
            decoded[column] = field ? decodeValue(field, raw, this.adapter.getType()) : raw;
        }
        return decoded;
    }
}
