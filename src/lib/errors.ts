/**
 * Factory Error Types
 *
 * Every failure the factory engine raises itself. All of them are fatal to the
 * call that triggered them; nothing here is retried. Errors raised by the
 * database adapter during insert are not wrapped and reach the caller as-is.
 */

/**
 * Base class for all factory errors
 */
export abstract class FactoryError extends Error {
    public readonly code: string;

    constructor(message: string, code: string) {
        super(message);
        this.name = this.constructor.name;
        this.code = code;
        Error.captureStackTrace?.(this, this.constructor);
    }

    toJSON() {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
        };
    }
}

/**
 * No definition is registered under the requested key
 */
export class DefinitionNotFoundError extends FactoryError {
    public readonly key: string;

    constructor(key: string) {
        super(`Factory definition '${key}' not found`, 'DEFINITION_NOT_FOUND');
        this.key = key;
    }
}

/**
 * A definition names a parent that is not registered at resolution time
 */
export class ParentNotFoundError extends FactoryError {
    public readonly parentName: string;

    constructor(parentName: string) {
        super(
            `Parent factory definition '${parentName}' not found. ` +
            `Register it with ctx.define("${parentName}", table, ...) before referencing it.`,
            'PARENT_NOT_FOUND'
        );
        this.parentName = parentName;
    }
}

/**
 * The parent chain of a definition revisits a name
 */
export class CircularInheritanceError extends FactoryError {
    public readonly parentName: string;

    constructor(parentName: string) {
        super(`Circular factory inheritance detected: '${parentName}' forms a cycle`, 'CIRCULAR_INHERITANCE');
        this.parentName = parentName;
    }
}

/**
 * A transient attribute was read with a type other than the stored one
 */
export class TransientTypeError extends FactoryError {
    public readonly attribute: string;
    public readonly expected: string;
    public readonly actual: string;

    constructor(attribute: string, expected: string, actual: string) {
        super(
            `Transient attribute '${attribute}' is ${actual}, not ${expected}`,
            'TRANSIENT_TYPE_MISMATCH'
        );
        this.attribute = attribute;
        this.expected = expected;
        this.actual = actual;
    }
}

/**
 * A record holds a value that does not match the field's declared type
 */
export class FieldValueError extends FactoryError {
    public readonly field: string;
    public readonly fieldType: string;

    constructor(field: string, fieldType: string, value: unknown) {
        super(
            `Field '${field}' (${fieldType}) cannot hold ${describeValue(value)}`,
            'FIELD_TYPE_MISMATCH'
        );
        this.field = field;
        this.fieldType = fieldType;
    }
}

/**
 * A definition, trait or define() call is declared inconsistently
 */
export class FactoryDefinitionError extends FactoryError {
    constructor(message: string) {
        super(message, 'INVALID_DEFINITION');
    }
}

/**
 * Invalid configuration value
 */
export class FactoryConfigError extends FactoryError {
    public readonly variable: string;

    constructor(variable: string, message: string) {
        super(`${variable}: ${message}`, 'INVALID_CONFIG');
        this.variable = variable;
    }
}

/**
 * Type guard for factory errors
 */
export function isFactoryError(error: unknown): error is FactoryError {
    return error instanceof FactoryError;
}

/**
 * Short human description of a runtime value for error messages
 */
export function describeValue(value: unknown): string {
    if (value === null) return 'null';
    if (value instanceof Date) return 'date';
    if (Array.isArray(value)) return 'array';
    if (typeof value === 'object') {
        const prototype: unknown = Object.getPrototypeOf(value);
        if (prototype !== Object.prototype && prototype !== null && value.constructor.name) {
            return value.constructor.name;
        }
    }
    return typeof value;
}
