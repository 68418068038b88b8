import { Faker, base, en } from '@faker-js/faker';
import type { Field, FieldType, FieldTypeMap } from '@src/lib/field.js';
import type { GenerationParams, ValueGenerator } from './value-generator.js';

export type TypeGenerators = { [K in FieldType]: ValueGenerator<FieldTypeMap[K]> };

export interface GeneratorRegistryOptions {
    /** Seed for reproducible values */
    seed?: number;
}

/**
 * Squash a column name for hint matching: `first_name` -> `firstname`
 */
function hintKey(fieldName: string): string {
    return fieldName.toLowerCase().replace(/[_\-\s]/g, '');
}

function textFor(faker: Faker, fieldName: string): string {
    const name = hintKey(fieldName);

    if (name.includes('email')) return faker.internet.email();
    if (name.includes('phone')) return faker.phone.number();
    if (name.includes('firstname')) return faker.person.firstName();
    if (name.includes('lastname')) return faker.person.lastName();
    if (name.includes('username')) return faker.internet.username();
    if (name.includes('name')) return faker.person.fullName();
    if (name.includes('address')) return faker.location.streetAddress();
    if (name.includes('city')) return faker.location.city();
    if (name.includes('state')) return faker.location.state();
    if (name.includes('zip') || name.includes('postal')) return faker.location.zipCode();
    if (name.includes('country')) return faker.location.country();
    if (name.includes('url') || name.includes('website')) return faker.internet.url();
    if (name.includes('title')) return faker.lorem.words(3);
    if (name.includes('description') || name.includes('bio')) return faker.lorem.sentence();
    return faker.lorem.word();
}

function integerFor(faker: Faker, fieldName: string): number {
    const name = hintKey(fieldName);

    if (name.includes('age')) return faker.number.int({ min: 18, max: 100 });
    if (name.includes('year')) return faker.number.int({ min: 1900, max: 2030 });
    if (name.includes('count') || name.includes('quantity')) return faker.number.int({ min: 1, max: 100 });
    return faker.number.int({ min: 1, max: 100_000 });
}

function decimalFor(faker: Faker, fieldName: string): number {
    const name = hintKey(fieldName);

    if (name.includes('price') || name.includes('cost') || name.includes('amount')) {
        return faker.number.float({ min: 0, max: 1000, fractionDigits: 2 });
    }
    return faker.number.float({ min: 0, max: 100_000, fractionDigits: 4 });
}

function timestampFor(faker: Faker, fieldName: string): Date {
    const name = hintKey(fieldName);

    if (name.includes('created') || name.includes('updated')) return faker.date.recent();
    if (name.includes('birth')) return faker.date.past({ years: 60 });
    if (name.includes('expire') || name.includes('expiry')) return faker.date.future();
    return faker.date.anytime();
}

/**
 * Insert a uniqueness suffix, keeping email-shaped values valid
 */
function withSuffix(value: string, suffix: string, maxLength: number | null): string {
    const at = value.indexOf('@');
    if (at > 0) {
        const local = value.slice(0, at);
        const domain = value.slice(at);
        const room = maxLength === null ? local.length : Math.max(1, maxLength - domain.length - suffix.length);
        return `${local.slice(0, room)}${suffix}${domain}`;
    }
    if (maxLength === null) {
        return `${value}${suffix}`;
    }
    const room = Math.max(0, maxLength - suffix.length);
    return `${value.slice(0, room)}${suffix}`.slice(0, maxLength);
}

/**
 * Default values for fields that end up with no value from any other source
 *
 * One instance per factory context. It owns its own faker instance, so seeding
 * one context never changes the values another produces.
 */
export class GeneratorRegistry {
    readonly faker: Faker;
    private readonly sequences = new Map<string, number>();
    private readonly generators: TypeGenerators;

    constructor(options: GeneratorRegistryOptions = {}) {
        this.faker = new Faker({ locale: [en, base] });
        if (options.seed !== undefined) {
            this.faker.seed(options.seed);
        }

        const faker = this.faker;
        this.generators = {
            text: ({ field }) => textFor(faker, field.fieldName),
            integer: ({ field, unique, sequence }) => unique ? sequence : integerFor(faker, field.fieldName),
            decimal: ({ field }) => decimalFor(faker, field.fieldName),
            boolean: () => faker.datatype.boolean(),
            uuid: () => faker.string.uuid(),
            timestamp: ({ field }) => timestampFor(faker, field.fieldName),
            date: () => faker.date.past({ years: 10 }).toISOString().slice(0, 10),
            jsonb: () => ({ [faker.lorem.word()]: faker.lorem.word() }),
        };
    }

    /**
     * Replace the default generator for a field type
     */
    register<K extends FieldType>(type: K, generator: TypeGenerators[K]): this {
        this.generators[type] = generator;
        return this;
    }

    /**
     * Whether a field left without a value should get a generated one
     *
     * Primary keys and columns with a database default are left to the database.
     * Nullable columns are only filled when `generateNullables` is on.
     */
    shouldGenerate(field: Field, generateNullables: boolean): boolean {
        if (field.primaryKey || field.hasDefault) {
            return false;
        }
        return !field.nullable || generateNullables;
    }

    /**
     * Generation parameters for the next value of a field (advances its sequence)
     */
    paramsFor(field: Field): GenerationParams {
        const sequence = (this.sequences.get(field.key) ?? 0) + 1;
        this.sequences.set(field.key, sequence);
        return {
            field,
            maxLength: field.maxLength ?? null,
            unique: field.unique,
            sequence,
        };
    }

    /**
     * Generate a default value for a field
     */
    generate(field: Field): unknown {
        const params = this.paramsFor(field);
        const generator: ValueGenerator<unknown> = this.generators[field.type];
        const value = generator(params);

        if (typeof value !== 'string' || field.type === 'uuid' || field.type === 'date') {
            return value;
        }
        if (params.unique) {
            return withSuffix(value, `-${params.sequence}`, params.maxLength);
        }
        if (params.maxLength !== null && value.length > params.maxLength) {
            return value.slice(0, params.maxLength);
        }
        return value;
    }
}
