import { FactoryDefinitionError } from '@src/lib/errors.js';
import { Field, type FieldRow, type FieldType } from '@src/lib/field.js';

export type TableName = string;

/**
 * Named field handles of a table
 */
export type Columns = Record<string, Field>;

/**
 * Column options accepted by the field helpers
 */
export interface FieldOptions {
    nullable?: boolean;
    primaryKey?: boolean;
    unique?: boolean;
    maxLength?: number;
    /** The database supplies a value when the insert omits the column */
    hasDefault?: boolean;
    description?: string;
}

/**
 * Field helpers bound to one table name, handed to defineTable()
 */
export class FieldFactory {
    constructor(private readonly tableName: TableName) {}

    field<K extends FieldType>(fieldName: string, type: K, options: FieldOptions = {}): Field<K> {
        const row: FieldRow<K> = {
            table_name: this.tableName,
            field_name: fieldName,
            type,
            nullable: options.nullable ?? false,
            primary_key: options.primaryKey ?? false,
            unique: options.unique ?? false,
            max_length: options.maxLength ?? null,
            has_default: options.hasDefault ?? false,
            description: options.description ?? null,
        };
        return new Field(row);
    }

    text(fieldName: string, options?: FieldOptions) {
        return this.field(fieldName, 'text', options);
    }

    integer(fieldName: string, options?: FieldOptions) {
        return this.field(fieldName, 'integer', options);
    }

    decimal(fieldName: string, options?: FieldOptions) {
        return this.field(fieldName, 'decimal', options);
    }

    boolean(fieldName: string, options?: FieldOptions) {
        return this.field(fieldName, 'boolean', options);
    }

    uuid(fieldName: string, options?: FieldOptions) {
        return this.field(fieldName, 'uuid', options);
    }

    timestamp(fieldName: string, options?: FieldOptions) {
        return this.field(fieldName, 'timestamp', options);
    }

    date(fieldName: string, options?: FieldOptions) {
        return this.field(fieldName, 'date', options);
    }

    jsonb(fieldName: string, options?: FieldOptions) {
        return this.field(fieldName, 'jsonb', options);
    }
}

/**
 * Table - schema handle holding a table's name and field metadata
 *
 * Holds the ordered field list plus categorized views for O(1) lookups.
 * The typed `columns` object gives callers handles such as
 * `AUTHOR.columns.name` (a Field<'text'>).
 */
export class Table<C extends Columns = Columns> {
    readonly tableName: TableName;
    readonly columns: Readonly<C>;

    // All fields in declaration order - primary collection
    readonly fields: readonly Field[];

    // Categorized views (same Field objects, filtered by attribute)
    readonly byName: ReadonlyMap<string, Field>;
    readonly requireds: ReadonlyMap<string, Field>;   // not nullable, no database default
    readonly nullables: ReadonlyMap<string, Field>;
    readonly uniques: ReadonlyMap<string, Field>;
    readonly primaryKey: Field | undefined;

    constructor(tableName: TableName, columns: C) {
        this.tableName = tableName;
        this.columns = Object.freeze({ ...columns });

        const byName = new Map<string, Field>();
        const requireds = new Map<string, Field>();
        const nullables = new Map<string, Field>();
        const uniques = new Map<string, Field>();
        let primaryKey: Field | undefined;

        for (const field of Object.values(columns)) {
            if (field.tableName !== tableName) {
                throw new FactoryDefinitionError(`Field '${field.key}' does not belong to table '${tableName}'`);
            }
            if (byName.has(field.fieldName)) {
                throw new FactoryDefinitionError(`Duplicate field '${field.fieldName}' on table '${tableName}'`);
            }

            byName.set(field.fieldName, field);

            if (field.nullable) {
                nullables.set(field.fieldName, field);
            } else if (!field.hasDefault) {
                requireds.set(field.fieldName, field);
            }
            if (field.unique) {
                uniques.set(field.fieldName, field);
            }
            if (field.primaryKey) {
                if (primaryKey) {
                    throw new FactoryDefinitionError(`Table '${tableName}' declares more than one primary key`);
                }
                primaryKey = field;
            }
        }

        this.fields = Object.freeze([...byName.values()]);
        this.byName = byName;
        this.requireds = requireds;
        this.nullables = nullables;
        this.uniques = uniques;
        this.primaryKey = primaryKey;
    }

    /**
     * Check if a field exists in this table
     */
    hasField(fieldName: string): boolean {
        return this.byName.has(fieldName);
    }

    /**
     * Get a field by name
     */
    getField(fieldName: string): Field | undefined {
        return this.byName.get(fieldName);
    }

    get fieldNames(): string[] {
        return this.fields.map(field => field.fieldName);
    }

    toJSON() {
        return {
            table_name: this.tableName,
            fields: this.fields.map(field => field.toJSON()),
        };
    }
}

/**
 * Declare a table and its typed field handles
 *
 * @example
 * const AUTHOR = defineTable('author', t => ({
 *     id: t.uuid('id', { primaryKey: true }),
 *     name: t.text('name', { maxLength: 100 }),
 *     country: t.text('country', { nullable: true }),
 * }));
 */
export function defineTable<C extends Columns>(tableName: TableName, declare: (t: FieldFactory) => C): Table<C> {
    return new Table(tableName, declare(new FieldFactory(tableName)));
}
