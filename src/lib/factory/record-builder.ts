import type { Field, FieldType, FieldTypeMap } from '@src/lib/field.js';
import type { Table } from '@src/lib/table.js';
import { TableRecord } from '@src/lib/table-record.js';
import type { RecordPersister } from '@src/lib/database/record-persister.js';
import type { Logger } from '@src/lib/logger.js';
import type { ValueGenerator } from './value-generator.js';
import type { GeneratorRegistry } from './generator-registry.js';
import type { FactoryDefinition } from './factory-definition.js';
import { BuildConfiguration } from './build-configuration.js';
import { TransientAttributes } from './transient-attributes.js';
import { runCallbacks } from './callbacks.js';
import { assertTableField } from './definition-builder.js';

/**
 * Collaborators a builder needs at build time
 */
export interface BuildServices {
    /** Resolves the (flattened) definition; called once per build */
    readonly definition: () => FactoryDefinition;
    readonly persister: RecordPersister;
    readonly generators: GeneratorRegistry;
    readonly logger: Logger;
}

/**
 * RecordBuilder - builds one row of a table from its factory definition
 *
 * Attribute precedence per field, highest first:
 *   1. set() on this builder
 *   2. withGenerator() on this builder
 *   3. values and generators of the active traits (later trait wins)
 *   4. values and generators of the definition (inheritance flattened)
 *   5. the context's default generators
 *
 * A generator only runs for a field no higher source has filled.
 */
export class RecordBuilder {
    constructor(
        readonly table: Table,
        private readonly services: BuildServices,
        private readonly config: BuildConfiguration = new BuildConfiguration()
    ) {}

    /**
     * Explicit value for a field; the last call per field wins
     */
    set<K extends FieldType>(field: Field<K>, value: FieldTypeMap[K] | null): this {
        assertTableField(this.table, field);
        this.config.explicitValues.set(field.fieldName, value);
        return this;
    }

    /**
     * Generator for a field, used when no explicit value is set for it
     */
    withGenerator<K extends FieldType>(field: Field<K>, generator: ValueGenerator<FieldTypeMap[K] | null>): this {
        assertTableField(this.table, field);
        this.config.generators.set(field.fieldName, generator);
        return this;
    }

    /**
     * Activate a trait; traits apply in the order they were activated
     */
    trait(name: string): this {
        this.config.traits.push(name);
        return this;
    }

    /**
     * Parameter handed to transient-aware callbacks; never stored
     */
    transientAttr(name: string, value: unknown): this {
        this.config.transients.set(name, value);
        return this;
    }

    generateNullables(enabled: boolean = true): this {
        this.config.generateNullables = enabled;
        return this;
    }

    /**
     * Build and insert the record
     *
     * before-create callbacks see (and may change) the record before insert;
     * after-create callbacks receive the record as the database returned it.
     */
    async build(): Promise<TableRecord> {
        const definition = this.resolveDefinition();
        const traits = this.config.traits;
        const record = new TableRecord(this.table, this.resolveAttributes(definition));
        const transients = new TransientAttributes(this.config.transients);

        await runCallbacks(
            'beforeCreate',
            definition.resolveBeforeCreateCallbacks(traits),
            definition.resolveTransientBeforeCreateCallbacks(traits),
            record,
            transients,
            this.services.logger
        );

        const persisted = await this.services.persister.insert(record);

        await runCallbacks(
            'afterCreate',
            definition.resolveAfterCreateCallbacks(traits),
            definition.resolveTransientAfterCreateCallbacks(traits),
            persisted,
            transients,
            this.services.logger
        );

        this.services.logger.debug('Built record', { table: this.table.tableName, traits });
        return persisted;
    }

    /**
     * Build the record without inserting it; no callbacks run
     */
    buildWithoutInsert(): TableRecord {
        return new TableRecord(this.table, this.resolveAttributes(this.resolveDefinition()));
    }

    /**
     * Resolved attributes only, keyed by field name
     */
    buildAttributes(): Readonly<Record<string, unknown>> {
        return Object.freeze(this.resolveAttributes(this.resolveDefinition()));
    }

    /**
     * Independent copy of this builder and its configuration
     */
    clone(): RecordBuilder {
        return new RecordBuilder(this.table, this.services, this.config.clone());
    }

    private resolveDefinition(): FactoryDefinition {
        const definition = this.services.definition();
        for (const trait of this.config.traits) {
            if (!definition.hasTrait(trait)) {
                this.services.logger.debug('Skipping unknown trait', { table: this.table.tableName, trait });
            }
        }
        return definition;
    }

    private resolveAttributes(definition: FactoryDefinition): Record<string, unknown> {
        const layer = definition.resolveLayer(this.config.traits);
        const defaults = this.services.generators;
        const attributes: Record<string, unknown> = {};

        for (const field of this.table.fields) {
            const fieldName = field.fieldName;

            if (this.config.explicitValues.has(fieldName)) {
                attributes[fieldName] = this.config.explicitValues.get(fieldName);
                continue;
            }

            const buildGenerator = this.config.generators.get(fieldName);
            if (buildGenerator) {
                attributes[fieldName] = buildGenerator(defaults.paramsFor(field));
                continue;
            }

            // The flattened layer holds a value or a generator per field, never both
            if (layer.values.has(fieldName)) {
                attributes[fieldName] = layer.values.get(fieldName);
                continue;
            }

            const definitionGenerator = layer.generators.get(fieldName);
            if (definitionGenerator) {
                attributes[fieldName] = definitionGenerator(defaults.paramsFor(field));
                continue;
            }

            if (defaults.shouldGenerate(field, this.config.generateNullables)) {
                attributes[fieldName] = defaults.generate(field);
            }
        }

        return attributes;
    }
}
