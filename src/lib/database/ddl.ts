/**
 * DDL generation for factory tables
 *
 * Creates the physical table for a Table declaration. Used by test suites
 * and by callers that want a scratch database matching their declarations.
 */

import type { Field } from '@src/lib/field.js';
import type { Table } from '@src/lib/table.js';
import type { DatabaseType } from './adapter.js';
import { getDbType } from './type-mappings.js';

export function quoteIdent(name: string): string {
    return `"${name.replace(/"/g, '""')}"`;
}

function columnSql(field: Field, dbType: DatabaseType): string {
    const parts = [quoteIdent(field.fieldName)];

    // Integer primary keys with a database default become auto-assigned ids
    if (field.primaryKey && field.hasDefault && field.type === 'integer') {
        parts.push(dbType === 'sqlite' ? 'INTEGER PRIMARY KEY AUTOINCREMENT' : 'SERIAL PRIMARY KEY');
        return parts.join(' ');
    }

    parts.push(getDbType(field.type, dbType));

    if (field.primaryKey) {
        parts.push('PRIMARY KEY');
    } else {
        if (!field.nullable) {
            parts.push('NOT NULL');
        }
        if (field.unique) {
            parts.push('UNIQUE');
        }
    }

    if (field.hasDefault) {
        parts.push(`DEFAULT ${defaultExpression(field, dbType)}`);
    }

    return parts.join(' ');
}

function defaultExpression(field: Field, dbType: DatabaseType): string {
    switch (field.type) {
        case 'uuid':
            return dbType === 'sqlite' ? '(lower(hex(randomblob(16))))' : 'gen_random_uuid()';
        case 'timestamp':
            return dbType === 'sqlite' ? '(strftime(\'%Y-%m-%dT%H:%M:%fZ\', \'now\'))' : 'now()';
        case 'date':
            return dbType === 'sqlite' ? '(date(\'now\'))' : 'CURRENT_DATE';
        case 'boolean':
            return dbType === 'sqlite' ? '0' : 'false';
        case 'integer':
        case 'decimal':
            return '0';
        case 'jsonb':
            return dbType === 'sqlite' ? '\'{}\'' : '\'{}\'::jsonb';
        default:
            return '\'\'';
    }
}

/**
 * CREATE TABLE statement for a table declaration
 */
export function createTableSql(table: Table, dbType: DatabaseType): string {
    const columns = table.fields.map(field => `    ${columnSql(field, dbType)}`);
    return `CREATE TABLE ${quoteIdent(table.tableName)} (\n${columns.join(',\n')}\n)`;
}

export function dropTableSql(table: Table): string {
    return `DROP TABLE IF EXISTS ${quoteIdent(table.tableName)}`;
}
