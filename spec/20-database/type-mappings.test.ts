import { describe, it, expect } from 'vitest';
import { decodeValue, encodeValue, getDbType } from '@src/lib/database/type-mappings.js';
import { AUTHOR, BOOK } from '@spec/helpers/test-tables.js';

describe('type mappings', () => {
    describe('getDbType', () => {
        it('should map field types per backend', () => {
            expect(getDbType('boolean', 'sqlite')).toBe('INTEGER');
            expect(getDbType('boolean', 'postgresql')).toBe('BOOLEAN');
            expect(getDbType('jsonb', 'sqlite')).toBe('TEXT');
            expect(getDbType('decimal', 'postgresql')).toBe('NUMERIC');
        });
    });

    describe('encodeValue', () => {
        it('should store SQLite booleans as 0/1', () => {
            expect(encodeValue(AUTHOR.columns.active, true, 'sqlite')).toBe(1);
            expect(encodeValue(AUTHOR.columns.active, false, 'sqlite')).toBe(0);
            expect(encodeValue(AUTHOR.columns.active, true, 'postgresql')).toBe(true);
        });

        it('should store SQLite timestamps as ISO text', () => {
            const date = new Date('2024-05-06T07:08:09.000Z');

            expect(encodeValue(AUTHOR.columns.created_at, date, 'sqlite')).toBe('2024-05-06T07:08:09.000Z');
            expect(encodeValue(AUTHOR.columns.created_at, date, 'postgresql')).toBe(date);
        });

        it('should store jsonb as JSON text', () => {
            expect(encodeValue(BOOK.columns.metadata, { tags: ['sci-fi'] }, 'sqlite')).toBe('{"tags":["sci-fi"]}');
        });

        it('should pass null through', () => {
            expect(encodeValue(BOOK.columns.metadata, null, 'sqlite')).toBeNull();
            expect(encodeValue(BOOK.columns.price, undefined, 'sqlite')).toBeNull();
        });
    });

    describe('decodeValue', () => {
        it('should read SQLite booleans back', () => {
            expect(decodeValue(AUTHOR.columns.active, 1, 'sqlite')).toBe(true);
            expect(decodeValue(AUTHOR.columns.active, 0, 'sqlite')).toBe(false);
        });

        it('should read timestamps as dates', () => {
            const decoded = decodeValue(AUTHOR.columns.created_at, '2024-05-06T07:08:09.000Z', 'sqlite');

            expect(decoded).toBeInstanceOf(Date);
            expect(decoded).toEqual(new Date('2024-05-06T07:08:09.000Z'));
        });

        it('should parse SQLite JSON text', () => {
            expect(decodeValue(BOOK.columns.metadata, '{"tags":["sci-fi"]}', 'sqlite')).toEqual({ tags: ['sci-fi'] });
        });

        it('should read PostgreSQL numerics and dates', () => {
            expect(decodeValue(BOOK.columns.price, '12.50', 'postgresql')).toBe(12.5);
            expect(decodeValue(BOOK.columns.published_on, new Date(2021, 2, 4), 'postgresql')).toBe('2021-03-04');
        });

        it('should pass null through', () => {
            expect(decodeValue(BOOK.columns.price, null, 'sqlite')).toBeNull();
        });
    });
});
