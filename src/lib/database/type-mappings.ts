/**
 * Database Type Mappings
 *
 * Maps between field types, PostgreSQL column types and SQLite column types,
 * and converts values on their way into and out of each backend.
 */

import type { Field, FieldType } from '@src/lib/field.js';
import type { DatabaseType } from './adapter.js';

/**
 * Field type to PostgreSQL type mapping
 */
export const FIELD_TO_POSTGRESQL: Record<FieldType, string> = {
    'text': 'TEXT',
    'integer': 'INTEGER',
    'decimal': 'NUMERIC',
    'boolean': 'BOOLEAN',
    'timestamp': 'TIMESTAMP',
    'date': 'DATE',
    'uuid': 'UUID',
    'jsonb': 'JSONB',
};

/**
 * Field type to SQLite type mapping
 *
 * SQLite has limited types - everything maps to TEXT, INTEGER or REAL.
 */
export const FIELD_TO_SQLITE: Record<FieldType, string> = {
    'text': 'TEXT',
    'integer': 'INTEGER',
    'decimal': 'REAL',
    'boolean': 'INTEGER',      // 0 or 1
    'timestamp': 'TEXT',       // ISO 8601 string
    'date': 'TEXT',            // YYYY-MM-DD string
    'uuid': 'TEXT',            // 36-char UUID string
    'jsonb': 'TEXT',           // JSON string
};

/**
 * Get the database-specific column type for a field type
 */
export function getDbType(fieldType: FieldType, dbType: DatabaseType): string {
    const mapping = dbType === 'sqlite' ? FIELD_TO_SQLITE : FIELD_TO_POSTGRESQL;
    return mapping[fieldType];
}

/**
 * Convert a record value into a bind parameter
 */
export function encodeValue(field: Field, value: unknown, dbType: DatabaseType): unknown {
    if (value === null || value === undefined) {
        return null;
    }

    switch (field.type) {
        case 'boolean':
            if (dbType === 'sqlite' && typeof value === 'boolean') {
                return value ? 1 : 0;
            }
            return value;

        case 'timestamp':
            if (dbType === 'sqlite' && value instanceof Date) {
                return value.toISOString();
            }
            return value;

        case 'jsonb':
            return JSON.stringify(value);

        default:
            return value;
    }
}

/**
 * Convert a column value returned by the database into a record value
 */
export function decodeValue(field: Field, raw: unknown, dbType: DatabaseType): unknown {
    if (raw === null || raw === undefined) {
        return null;
    }

    switch (field.type) {
        case 'boolean':
            if (typeof raw === 'number' || typeof raw === 'bigint') {
                return raw !== 0 && raw !== 0n;
            }
            return raw;

        case 'timestamp':
            if (typeof raw === 'string' || typeof raw === 'number') {
                return new Date(raw);
            }
            return raw;

        case 'date':
            // pg returns DATE columns as local-midnight Date objects
            if (raw instanceof Date) {
                return formatLocalDate(raw);
            }
            return raw;

        case 'decimal':
            // pg returns NUMERIC as a string to avoid precision loss
            if (typeof raw === 'string') {
                return Number(raw);
            }
            return raw;

        case 'integer':
            if (typeof raw === 'bigint') {
                return Number(raw);
            }
            return raw;

        case 'jsonb':
            if (dbType === 'sqlite' && typeof raw === 'string') {
                return JSON.parse(raw);
            }
            return raw;

        default:
            return raw;
    }
}

function formatLocalDate(date: Date): string {
    const year = date.getFullYear();
    const month = String(date.getMonth() + 1).padStart(2, '0');
    const day = String(date.getDate()).padStart(2, '0');
    return `${year}-${month}-${day}`;
}
