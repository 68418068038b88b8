import type { Field, FieldType, FieldTypeMap } from '@src/lib/field.js';
import type { Table } from '@src/lib/table.js';
import { FieldValueError } from '@src/lib/errors.js';
import { logger } from '@src/lib/logger.js';

/**
 * Turns a record into a caller-defined plain object
 */
export type Projector<P> = (record: TableRecord) => P;

/**
 * Convert a snake_case column name to a camelCase property name
 */
export function camelCase(name: string): string {
    return name.replace(/_([a-z0-9])/g, (_, char: string) => char.toUpperCase());
}

/**
 * Record object wrapping a row being built, or the row the database returned
 *
 * Values set on the record overlay the loaded row. Reads go through typed
 * field handles and are checked against the field type.
 */
export class TableRecord {
    readonly table: Table;
    private readonly _current: Map<string, unknown>;
    private _original: ReadonlyMap<string, unknown> | null;

    /**
     * Create a new TableRecord wrapping input data
     * @param table The table this record belongs to
     * @param data Field-name keyed values
     */
    constructor(table: Table, data: Readonly<Record<string, unknown>> = {}) {
        this.table = table;
        this._current = new Map(Object.entries(data));
        this._original = null;
    }

    /**
     * Load the row the database returned for this record
     * Called by the persister after INSERT ... RETURNING
     */
    load(existingData: Readonly<Record<string, unknown>>): void {
        if (this._original !== null) {
            logger.warn('TableRecord.load() called multiple times', {
                table: this.table.tableName,
            });
        }
        this._original = new Map(Object.entries(existingData));
    }

    /**
     * Read a field through its typed handle
     * Returns null when the field has no value
     * @throws FieldValueError when the stored value is not of the field's type
     */
    get<K extends FieldType>(field: Field<K>): FieldTypeMap[K] | null {
        const value = this.value(field.fieldName);
        if (value === undefined || value === null) {
            return null;
        }
        if (field.is(value)) {
            return value;
        }
        throw new FieldValueError(field.key, field.type, value);
    }

    /**
     * Effective untyped value of a field (current overrides original)
     */
    value(fieldName: string): unknown {
        if (this._current.has(fieldName)) {
            return this._current.get(fieldName);
        }
        return this._original?.get(fieldName);
    }

    /**
     * Set a field through its typed handle
     */
    set<K extends FieldType>(field: Field<K>, value: FieldTypeMap[K] | null): void {
        this.assign(field.fieldName, value);
    }

    /**
     * Set a field by name without a type check
     * Used by the factory when copying resolved attributes onto the record
     */
    assign(fieldName: string, value: unknown): void {
        if (!this.table.hasField(fieldName)) {
            logger.warn('Setting unknown field on TableRecord', {
                table: this.table.tableName,
                field: fieldName,
                knownFields: this.table.fieldNames,
            });
        }
        this._current.set(fieldName, value);
    }

    /**
     * Check if a field holds a value, even null
     */
    has(field: Field | string): boolean {
        const fieldName = typeof field === 'string' ? field : field.fieldName;
        return this._current.has(fieldName) || (this._original?.has(fieldName) ?? false);
    }

    /**
     * Plain field-name keyed object (current overrides original)
     */
    toObject(): Record<string, unknown> {
        const merged: Record<string, unknown> = {};
        for (const [key, value] of this._original ?? []) {
            merged[key] = value;
        }
        for (const [key, value] of this._current) {
            merged[key] = value;
        }
        return merged;
    }

    /**
     * Project into a plain object with a caller-supplied projector
     */
    into<P>(projector: Projector<P>): P {
        return projector(this);
    }

    /**
     * Plain object with camelCase property names, in table field order
     */
    toPojo(): Record<string, unknown> {
        const pojo: Record<string, unknown> = {};
        for (const [key, value] of Object.entries(this.toObject())) {
            pojo[camelCase(key)] = value;
        }
        return pojo;
    }

    /**
     * Create a copy of this record
     */
    clone(): TableRecord {
        const cloned = new TableRecord(this.table, Object.fromEntries(this._current));
        if (this._original !== null) {
            cloned.load(Object.fromEntries(this._original));
        }
        return cloned;
    }
}
