import type { Field } from '@src/lib/field.js';

/**
 * What a generator is told about the value it is asked for
 */
export interface GenerationParams {
    readonly field: Field;
    /** Upper bound on string length, or null when the column has none */
    readonly maxLength: number | null;
    readonly unique: boolean;
    /** Per-field counter, starting at 1, advanced on every generation */
    readonly sequence: number;
}

/**
 * Produces a field value when no explicit value was supplied
 *
 * The engine treats generators as pure: it calls one at most once per field
 * per build and never calls it when a higher-precedence value exists.
 */
export type ValueGenerator<T> = (params: GenerationParams) => T;

/**
 * Generator that always yields the same value
 */
export function constant<T>(value: T): ValueGenerator<T> {
    return () => value;
}

/**
 * Generator that yields `format(sequence)`, handy for unique names
 *
 * @example
 * builder.withGenerator(AUTHOR.columns.name, sequence(n => `Author ${n}`));
 */
export function sequence<T>(format: (n: number) => T): ValueGenerator<T> {
    return params => format(params.sequence);
}
