import { TransientTypeError, describeValue } from '@src/lib/errors.js';

/**
 * Value types a transient attribute can be read as
 */
export interface TransientTypeMap {
    string: string;
    number: number;
    boolean: boolean;
    bigint: bigint;
    date: Date;
    array: readonly unknown[];
    object: Readonly<Record<string, unknown>>;
    function: (...args: never[]) => unknown;
}

export type TransientTypeTag = keyof TransientTypeMap;

export type Constructor<T> = abstract new (...args: never[]) => T;

function isPlainObject(value: unknown): value is Record<string, unknown> {
    if (typeof value !== 'object' || value === null) {
        return false;
    }
    const prototype: unknown = Object.getPrototypeOf(value);
    return prototype === Object.prototype || prototype === null;
}

function matches(value: unknown, type: TransientTypeTag | Constructor<unknown>): boolean {
    if (typeof type === 'function') {
        return value instanceof type;
    }
    switch (type) {
        case 'date':
            return value instanceof Date;
        case 'array':
            return Array.isArray(value);
        case 'object':
            return isPlainObject(value);
        default:
            return typeof value === type;
    }
}

function typeName(type: TransientTypeTag | Constructor<unknown>): string {
    return typeof type === 'function' ? type.name : type;
}

/**
 * Read-only bag of per-build parameters handed to transient-aware callbacks
 *
 * Values are stored untyped and checked on read: asking for a value under the
 * wrong type raises TransientTypeError, storing never does.
 *
 * @example
 * ctx.define(AUTHOR, f => f.afterCreateTransient(async (author, transients) => {
 *     const count = transients.getOrDefault('bookCount', 'number', 0);
 *     ...
 * }));
 */
export class TransientAttributes {
    private static readonly EMPTY = new TransientAttributes();

    private readonly values: ReadonlyMap<string, unknown>;

    constructor(values: ReadonlyMap<string, unknown> | Readonly<Record<string, unknown>> = new Map()) {
        this.values = values instanceof Map
            ? new Map<string, unknown>(values)
            : new Map<string, unknown>(Object.entries(values));
        Object.freeze(this);
    }

    static empty(): TransientAttributes {
        return TransientAttributes.EMPTY;
    }

    /**
     * Value stored under `name`, or null when nothing (or null) is stored
     * @throws TransientTypeError when the stored value is not of `type`
     */
    get<K extends TransientTypeTag>(name: string, type: K): TransientTypeMap[K] | null;
    get<T>(name: string, type: Constructor<T>): T | null;
    get(name: string, type: TransientTypeTag | Constructor<unknown>): unknown {
        const value = this.values.get(name);
        if (value === null || value === undefined) {
            return null;
        }
        return this.checked(name, value, type);
    }

    /**
     * Value stored under `name`, or `fallback` when nothing (or null) is stored
     * @throws TransientTypeError when the stored value is not of `type`
     */
    getOrDefault<K extends TransientTypeTag>(name: string, type: K, fallback: TransientTypeMap[K]): TransientTypeMap[K];
    getOrDefault<T>(name: string, type: Constructor<T>, fallback: T): T;
    getOrDefault(name: string, type: TransientTypeTag | Constructor<unknown>, fallback: unknown): unknown {
        const value = this.values.get(name);
        if (value === null || value === undefined) {
            return fallback;
        }
        return this.checked(name, value, type);
    }

    /**
     * Whether `name` was given at all, null values included
     */
    has(name: string): boolean {
        return this.values.has(name);
    }

    get size(): number {
        return this.values.size;
    }

    asMap(): ReadonlyMap<string, unknown> {
        return this.values;
    }

    private checked(name: string, value: unknown, type: TransientTypeTag | Constructor<unknown>): unknown {
        if (!matches(value, type)) {
            throw new TransientTypeError(name, typeName(type), describeValue(value));
        }
        return value;
    }
}
