import { CircularInheritanceError, DefinitionNotFoundError, ParentNotFoundError } from '@src/lib/errors.js';
import { logger as defaultLogger, type Logger } from '@src/lib/logger.js';
import type { Table } from '@src/lib/table.js';
import { FactoryDefinition } from './factory-definition.js';

/**
 * Registry keys are case-insensitive
 */
export function normalizeKey(key: string): string {
    return key.toLowerCase();
}

/**
 * FactoryDefinitionRegistry - name to definition map owned by a FactoryContext
 *
 * Stores definitions as registered, parent names and all. Inheritance is
 * flattened on every resolve() and the flattened result is never stored, so
 * re-registering a parent is picked up by every child on its next build.
 */
export class FactoryDefinitionRegistry {
    private readonly definitions = new Map<string, FactoryDefinition>();

    constructor(private readonly logger: Logger = defaultLogger) {}

    /**
     * Register a definition, replacing any earlier one under the same key
     */
    register(key: string, definition: FactoryDefinition): void {
        const normalized = normalizeKey(key);
        if (this.definitions.has(normalized)) {
            this.logger.debug('Replacing factory definition', { key: normalized });
        }
        this.definitions.set(normalized, definition);
        this.logger.debug('Registered factory definition', {
            key: normalized,
            table: definition.table.tableName,
            parent: definition.parentName,
            traits: definition.traitNames,
        });
    }

    has(key: string): boolean {
        return this.definitions.has(normalizeKey(key));
    }

    keys(): string[] {
        return [...this.definitions.keys()];
    }

    /**
     * Flattened definition registered under `key`, or undefined
     *
     * @throws ParentNotFoundError when a parent in the chain is not registered
     * @throws CircularInheritanceError when the chain revisits a name
     */
    resolve(key: string): FactoryDefinition | undefined {
        const normalized = normalizeKey(key);
        const definition = this.definitions.get(normalized);
        if (!definition) {
            return undefined;
        }
        return this.flatten(definition, new Set([normalized]));
    }

    /**
     * Like resolve(), but a missing key is an error
     *
     * @throws DefinitionNotFoundError
     */
    require(key: string): FactoryDefinition {
        const definition = this.resolve(key);
        if (!definition) {
            throw new DefinitionNotFoundError(normalizeKey(key));
        }
        return definition;
    }

    /**
     * Table of the definition registered under `key`, without flattening
     *
     * Parent chain problems surface later, when a build resolves the
     * definition.
     *
     * @throws DefinitionNotFoundError
     */
    tableOf(key: string): Table {
        const normalized = normalizeKey(key);
        const definition = this.definitions.get(normalized);
        if (!definition) {
            throw new DefinitionNotFoundError(normalized);
        }
        return definition.table;
    }

    /**
     * Parent-first flatten; `visited` holds every key seen in this resolution
     */
    private flatten(definition: FactoryDefinition, visited: Set<string>): FactoryDefinition {
        if (definition.parentName === null) {
            return definition;
        }

        const parentKey = normalizeKey(definition.parentName);
        if (visited.has(parentKey)) {
            throw new CircularInheritanceError(definition.parentName);
        }
        visited.add(parentKey);

        const parent = this.definitions.get(parentKey);
        if (!parent) {
            throw new ParentNotFoundError(definition.parentName);
        }

        return FactoryDefinition.merge(this.flatten(parent, visited), definition);
    }
}
