import { FactoryDefinitionError } from '@src/lib/errors.js';
import type { Field, FieldType, FieldTypeMap } from '@src/lib/field.js';
import type { Table } from '@src/lib/table.js';
import type { ValueGenerator } from './value-generator.js';
import type { RecordCallback, TransientAwareCallback } from './callbacks.js';
import { FactoryDefinition } from './factory-definition.js';
import { Trait } from './trait.js';

/**
 * Reject a field handle declared on another table
 */
export function assertTableField(table: Table, field: Field): void {
    if (field.tableName !== table.tableName || !table.hasField(field.fieldName)) {
        throw new FactoryDefinitionError(`Field '${field.key}' does not belong to table '${table.tableName}'`);
    }
}

/**
 * Shared declaration surface of definitions and traits
 *
 * For each field the last of set() and withGenerator() wins.
 */
abstract class LayerBuilder {
    protected readonly values = new Map<string, unknown>();
    protected readonly generators = new Map<string, ValueGenerator<unknown>>();
    protected readonly beforeCreateCallbacks: RecordCallback[] = [];
    protected readonly afterCreateCallbacks: RecordCallback[] = [];
    protected readonly transientBeforeCreateCallbacks: TransientAwareCallback[] = [];
    protected readonly transientAfterCreateCallbacks: TransientAwareCallback[] = [];

    constructor(readonly table: Table) {}

    set<K extends FieldType>(field: Field<K>, value: FieldTypeMap[K] | null): this {
        assertTableField(this.table, field);
        this.values.set(field.fieldName, value);
        this.generators.delete(field.fieldName);
        return this;
    }

    withGenerator<K extends FieldType>(field: Field<K>, generator: ValueGenerator<FieldTypeMap[K] | null>): this {
        assertTableField(this.table, field);
        this.generators.set(field.fieldName, generator);
        this.values.delete(field.fieldName);
        return this;
    }

    beforeCreate(callback: RecordCallback): this {
        this.beforeCreateCallbacks.push(callback);
        return this;
    }

    afterCreate(callback: RecordCallback): this {
        this.afterCreateCallbacks.push(callback);
        return this;
    }

    beforeCreateTransient(callback: TransientAwareCallback): this {
        this.transientBeforeCreateCallbacks.push(callback);
        return this;
    }

    afterCreateTransient(callback: TransientAwareCallback): this {
        this.transientAfterCreateCallbacks.push(callback);
        return this;
    }

    protected callbacks() {
        return {
            beforeCreateCallbacks: this.beforeCreateCallbacks,
            afterCreateCallbacks: this.afterCreateCallbacks,
            transientBeforeCreateCallbacks: this.transientBeforeCreateCallbacks,
            transientAfterCreateCallbacks: this.transientAfterCreateCallbacks,
        };
    }
}

/**
 * Declares one trait inside a definition
 */
export class TraitBuilder extends LayerBuilder {
    constructor(readonly name: string, table: Table) {
        super(table);
    }

    build(): Trait {
        return new Trait({
            name: this.name,
            overrides: this.values,
            generators: this.generators,
            callbacks: this.callbacks(),
        });
    }
}

/**
 * Declares a factory definition
 *
 * @example
 * const author = new FactoryDefinitionBuilder(AUTHOR)
 *     .set(AUTHOR.columns.name, 'Ursula')
 *     .trait('retired', t => t.set(AUTHOR.columns.active, false))
 *     .build();
 */
export class FactoryDefinitionBuilder extends LayerBuilder {
    private parentName: string | null = null;
    private readonly traits = new Map<string, Trait>();

    /**
     * Inherit from the definition registered under `name`
     */
    parent(name: string): this {
        this.parentName = name;
        return this;
    }

    /**
     * Declare a trait; declaring the same name again replaces it
     */
    trait(name: string, declare: (trait: TraitBuilder) => void): this {
        const builder = new TraitBuilder(name, this.table);
        declare(builder);
        this.traits.set(name, builder.build());
        return this;
    }

    build(): FactoryDefinition {
        return new FactoryDefinition({
            table: this.table,
            parentName: this.parentName,
            defaultValues: this.values,
            generators: this.generators,
            traits: this.traits.values(),
            callbacks: this.callbacks(),
        });
    }
}
