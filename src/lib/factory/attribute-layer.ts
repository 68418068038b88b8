import { FactoryDefinitionError } from '@src/lib/errors.js';
import type { ValueGenerator } from './value-generator.js';

/**
 * Field values and generators contributed by one source (a definition,
 * a trait, or the merge of several)
 *
 * A field has at most one entry across the two maps: a literal value or a
 * generator, never both.
 */
export interface AttributeLayer {
    readonly values: Map<string, unknown>;
    readonly generators: Map<string, ValueGenerator<unknown>>;
}

/**
 * Copy a layer's maps, rejecting a field that has both a value and a generator
 */
export function copyLayer(
    values: ReadonlyMap<string, unknown> = new Map(),
    generators: ReadonlyMap<string, ValueGenerator<unknown>> = new Map(),
    owner: string
): AttributeLayer {
    for (const fieldName of generators.keys()) {
        if (values.has(fieldName)) {
            throw new FactoryDefinitionError(`Field '${fieldName}' has both a value and a generator in ${owner}`);
        }
    }
    return { values: new Map(values), generators: new Map(generators) };
}

/**
 * Overlay `values` and `generators` onto `target`, upper entries winning
 *
 * An upper value removes a lower generator for the same field and the other
 * way round, so the field keeps a single source.
 */
export function overlay(
    target: AttributeLayer,
    values: ReadonlyMap<string, unknown>,
    generators: ReadonlyMap<string, ValueGenerator<unknown>>
): AttributeLayer {
    for (const [fieldName, value] of values) {
        target.values.set(fieldName, value);
        target.generators.delete(fieldName);
    }
    for (const [fieldName, generator] of generators) {
        target.generators.set(fieldName, generator);
        target.values.delete(fieldName);
    }
    return target;
}
