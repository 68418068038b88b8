import { describe, it, expect } from 'vitest';
import { defineTable, FieldFactory, Table } from '@src/lib/table.js';
import { FactoryDefinitionError } from '@src/lib/errors.js';
import { AUTHOR, BOOK } from '@spec/helpers/test-tables.js';

describe('Table', () => {
    describe('defineTable', () => {
        it('should expose typed field handles by property', () => {
            expect(AUTHOR.tableName).toBe('author');
            expect(AUTHOR.columns.name.fieldName).toBe('name');
            expect(AUTHOR.columns.name.type).toBe('text');
            expect(AUTHOR.columns.name.tableName).toBe('author');
        });

        it('should keep fields in declaration order', () => {
            expect(AUTHOR.fieldNames).toEqual(['id', 'name', 'email', 'country', 'active', 'created_at']);
        });
    });

    describe('categorized views', () => {
        it('should categorize required, nullable and unique fields', () => {
            expect([...AUTHOR.requireds.keys()]).toEqual(['name', 'email']);
            expect([...AUTHOR.nullables.keys()]).toEqual(['country']);
            expect([...AUTHOR.uniques.keys()]).toEqual(['id', 'email']);
            expect(AUTHOR.primaryKey?.fieldName).toBe('id');
        });

        it('should leave primaryKey undefined when none is declared', () => {
            const tag = defineTable('tag', t => ({ label: t.text('label') }));
            expect(tag.primaryKey).toBeUndefined();
        });
    });

    describe('lookups', () => {
        it('should find fields by name', () => {
            expect(BOOK.hasField('title')).toBe(true);
            expect(BOOK.hasField('missing')).toBe(false);
            expect(BOOK.getField('title')).toBe(BOOK.columns.title);
            expect(BOOK.getField('missing')).toBeUndefined();
        });
    });

    describe('validation', () => {
        it('should reject a field declared for another table', () => {
            const other = new FieldFactory('other');
            expect(() => new Table('author', { name: other.text('name') }))
                .toThrow("Field 'other:name' does not belong to table 'author'");
        });

        it('should reject duplicate field names', () => {
            expect(() => defineTable('dup', t => ({ a: t.text('name'), b: t.integer('name') })))
                .toThrow("Duplicate field 'name' on table 'dup'");
            expect(() => defineTable('dup', t => ({ a: t.text('name'), b: t.integer('name') })))
                .toThrow(FactoryDefinitionError);
        });

        it('should reject more than one primary key', () => {
            expect(() => defineTable('pk', t => ({
                a: t.integer('a', { primaryKey: true }),
                b: t.integer('b', { primaryKey: true }),
            }))).toThrow("Table 'pk' declares more than one primary key");
        });
    });
});
