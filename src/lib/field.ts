/**
 * Field - typed handle for one column of a table
 *
 * Wraps raw field metadata with typed accessors. The type parameter ties the
 * handle to the TypeScript type of the values it holds, so record reads and
 * factory declarations through a handle are checked at compile time.
 */

/**
 * Column types understood by the factory and the database mappings
 */
export type FieldType = 'text' | 'integer' | 'decimal' | 'boolean' | 'uuid' | 'timestamp' | 'date' | 'jsonb';

/**
 * TypeScript value type held by each column type
 */
export interface FieldTypeMap {
    text: string;
    integer: number;
    decimal: number;
    boolean: boolean;
    uuid: string;
    timestamp: Date;
    date: string;       // YYYY-MM-DD
    jsonb: unknown;
}

export type FieldValue<K extends FieldType> = FieldTypeMap[K];

export const FIELD_TYPES: readonly FieldType[] = ['text', 'integer', 'decimal', 'boolean', 'uuid', 'timestamp', 'date', 'jsonb'];

/**
 * Raw field metadata - matches the shape of a column description row
 */
export interface FieldRow<K extends FieldType = FieldType> {
    table_name: string;
    field_name: string;
    type: K;
    nullable: boolean;
    primary_key: boolean;
    unique: boolean;
    max_length: number | null;
    has_default: boolean;
    description: string | null;
}

type Guard<T> = (value: unknown) => value is T;

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const TYPE_GUARDS: { [K in FieldType]: Guard<FieldTypeMap[K]> } = {
    text: (value): value is string => typeof value === 'string',
    integer: (value): value is number => typeof value === 'number' && Number.isInteger(value),
    decimal: (value): value is number => typeof value === 'number' && Number.isFinite(value),
    boolean: (value): value is boolean => typeof value === 'boolean',
    uuid: (value): value is string => typeof value === 'string',
    timestamp: (value): value is Date => value instanceof Date,
    date: (value): value is string => typeof value === 'string' && DATE_PATTERN.test(value),
    jsonb: (value): value is unknown => value !== undefined,
};

/**
 * First-class Field domain object
 *
 * Immutable after construction - all properties are readonly.
 */
export class Field<K extends FieldType = FieldType> {
    // Identity
    readonly tableName: string;
    readonly fieldName: string;

    // Type information
    readonly type: K;

    // Behavior flags
    readonly nullable: boolean;
    readonly primaryKey: boolean;
    readonly unique: boolean;
    readonly hasDefault: boolean;

    // Constraints
    readonly maxLength: number | undefined;
    readonly description: string | undefined;

    constructor(row: FieldRow<K>) {
        this.tableName = row.table_name;
        this.fieldName = row.field_name;
        this.type = row.type;

        // Primary keys are never nullable, whatever the row says
        this.primaryKey = row.primary_key ?? false;
        this.nullable = this.primaryKey ? false : (row.nullable ?? false);
        this.unique = this.primaryKey || (row.unique ?? false);
        this.hasDefault = row.has_default ?? false;

        this.maxLength = row.max_length ?? undefined;
        this.description = row.description ?? undefined;

        Object.freeze(this);
    }

    /**
     * Check that a value has this field's value type
     */
    is(value: unknown): value is FieldTypeMap[K] {
        const guard: Guard<FieldTypeMap[K]> = TYPE_GUARDS[this.type];
        return guard(value);
    }

    /**
     * Check that a value can be stored in this field (type and length)
     */
    accepts(value: unknown): boolean {
        if (value === null) {
            return this.nullable;
        }
        if (!this.is(value)) {
            return false;
        }
        if (this.maxLength !== undefined && typeof value === 'string') {
            return value.length <= this.maxLength;
        }
        return true;
    }

    /**
     * Fields the database fills in when the insert leaves them out
     */
    isDatabaseManaged(): boolean {
        return this.hasDefault;
    }

    /**
     * Get the full field key (table_name:field_name)
     */
    get key(): string {
        return `${this.tableName}:${this.fieldName}`;
    }

    toJSON() {
        return {
            table_name: this.tableName,
            field_name: this.fieldName,
            type: this.type,
            nullable: this.nullable,
            primary_key: this.primaryKey,
        };
    }
}
