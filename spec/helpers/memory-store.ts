import type { Table } from '@src/lib/table.js';
import { TableRecord } from '@src/lib/table-record.js';
import type { RecordStore } from '@src/lib/database/record-persister.js';

/**
 * RecordStore keeping rows in arrays, for tests that never touch SQL
 *
 * Assigns sequential integer ids to a primary key the record leaves unset.
 */
export class MemoryStore implements RecordStore {
    readonly rows = new Map<string, Record<string, unknown>[]>();
    readonly inserted: TableRecord[] = [];

    async insert(record: TableRecord): Promise<TableRecord> {
        const table = record.table;
        const rows = this.rowsOf(table);
        const row = record.toObject();

        const primaryKey = table.primaryKey;
        if (primaryKey && row[primaryKey.fieldName] === undefined) {
            row[primaryKey.fieldName] = rows.length + 1;
        }
        rows.push(row);

        const stored = new TableRecord(table);
        stored.load(row);
        this.inserted.push(stored);
        return stored;
    }

    async count(table: Table, where: Readonly<Record<string, unknown>> = {}): Promise<number> {
        return this.rowsOf(table).filter(row =>
            Object.entries(where).every(([fieldName, value]) => row[fieldName] === value)
        ).length;
    }

    private rowsOf(table: Table): Record<string, unknown>[] {
        let rows = this.rows.get(table.tableName);
        if (!rows) {
            rows = [];
            this.rows.set(table.tableName, rows);
        }
        return rows;
    }
}
