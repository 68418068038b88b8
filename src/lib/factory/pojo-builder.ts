import type { Field, FieldType, FieldTypeMap } from '@src/lib/field.js';
import type { Projector } from '@src/lib/table-record.js';
import type { ValueGenerator } from './value-generator.js';
import { BuildConfiguration } from './build-configuration.js';
import type { RecordBuilder } from './record-builder.js';

/**
 * Per-index customization applied to each copy in times()
 */
export type TimesCustomizer<P> = (builder: PojoBuilder<P>, index: number) => void | Promise<void>;

/**
 * PojoBuilder - RecordBuilder that hands back plain objects
 *
 * Keeps its own configuration and replays it onto a fresh RecordBuilder for
 * every build, then runs the result through the projector.
 */
export class PojoBuilder<P> {
    constructor(
        private readonly newBuilder: (config: BuildConfiguration) => RecordBuilder,
        private readonly projector: Projector<P>,
        private readonly config: BuildConfiguration = new BuildConfiguration()
    ) {}

    // set() and withGenerator() write through a RecordBuilder over this
    // configuration, so field handles are checked against the table
    set<K extends FieldType>(field: Field<K>, value: FieldTypeMap[K] | null): this {
        this.newBuilder(this.config).set(field, value);
        return this;
    }

    withGenerator<K extends FieldType>(field: Field<K>, generator: ValueGenerator<FieldTypeMap[K] | null>): this {
        this.newBuilder(this.config).withGenerator(field, generator);
        return this;
    }

    trait(name: string): this {
        this.config.traits.push(name);
        return this;
    }

    transientAttr(name: string, value: unknown): this {
        this.config.transients.set(name, value);
        return this;
    }

    generateNullables(enabled: boolean = true): this {
        this.config.generateNullables = enabled;
        return this;
    }

    async build(): Promise<P> {
        const record = await this.newBuilder(this.config.clone()).build();
        return record.into(this.projector);
    }

    buildWithoutInsert(): P {
        return this.newBuilder(this.config.clone()).buildWithoutInsert().into(this.projector);
    }

    buildAttributes(): Readonly<Record<string, unknown>> {
        return this.newBuilder(this.config.clone()).buildAttributes();
    }

    /**
     * Build `count` objects, one after another
     *
     * Each iteration works on its own copy of this builder, so a customizer
     * changing copy `i` never affects copy `i + 1` or this builder.
     */
    async times(count: number, customize?: TimesCustomizer<P>): Promise<P[]> {
        const results: P[] = [];
        for (let index = 0; index < count; index++) {
            const copy = this.clone();
            if (customize) {
                await customize(copy, index);
            }
            results.push(await copy.build());
        }
        return results;
    }

    clone(): PojoBuilder<P> {
        return new PojoBuilder(this.newBuilder, this.projector, this.config.clone());
    }
}
