import type { Table } from '@src/lib/table.js';
import type { ValueGenerator } from './value-generator.js';
import type { Trait } from './trait.js';
import {
    concatCallbacks,
    copyCallbacks,
    type LifecycleCallbacks,
    type RecordCallback,
    type TransientAwareCallback,
} from './callbacks.js';
import { copyLayer, overlay, type AttributeLayer } from './attribute-layer.js';

export interface FactoryDefinitionInit {
    table: Table;
    parentName?: string | null;
    defaultValues?: ReadonlyMap<string, unknown>;
    generators?: ReadonlyMap<string, ValueGenerator<unknown>>;
    traits?: Iterable<Trait>;
    callbacks?: Partial<LifecycleCallbacks>;
}

/**
 * FactoryDefinition - a named recipe for populating rows of one table
 *
 * Holds base values and generators, named traits, an optional parent name
 * and the lifecycle callbacks. Immutable: every collection is copied on the
 * way in and exposed read-only.
 *
 * The resolve* operations flatten the base and the requested traits:
 * traits apply in the order requested (a later trait wins per field) and
 * their callbacks run after the base callbacks. Trait names the definition
 * does not carry are skipped, so builders can request optional traits.
 *
 * Parent chains are flattened by the registry, not here; a definition built
 * from a merge is always a root.
 */
export class FactoryDefinition implements LifecycleCallbacks {
    readonly table: Table;
    readonly parentName: string | null;
    readonly defaultValues: ReadonlyMap<string, unknown>;
    readonly generators: ReadonlyMap<string, ValueGenerator<unknown>>;
    readonly traits: ReadonlyMap<string, Trait>;

    readonly beforeCreateCallbacks: readonly RecordCallback[];
    readonly afterCreateCallbacks: readonly RecordCallback[];
    readonly transientBeforeCreateCallbacks: readonly TransientAwareCallback[];
    readonly transientAfterCreateCallbacks: readonly TransientAwareCallback[];

    constructor(init: FactoryDefinitionInit) {
        this.table = init.table;
        this.parentName = init.parentName ?? null;

        const layer = copyLayer(init.defaultValues, init.generators, `definition for '${init.table.tableName}'`);
        this.defaultValues = layer.values;
        this.generators = layer.generators;

        const traits = new Map<string, Trait>();
        for (const trait of init.traits ?? []) {
            traits.set(trait.name, trait);
        }
        this.traits = traits;

        const callbacks = copyCallbacks(init.callbacks);
        this.beforeCreateCallbacks = callbacks.beforeCreateCallbacks;
        this.afterCreateCallbacks = callbacks.afterCreateCallbacks;
        this.transientBeforeCreateCallbacks = callbacks.transientBeforeCreateCallbacks;
        this.transientAfterCreateCallbacks = callbacks.transientAfterCreateCallbacks;

        Object.freeze(this);
    }

    /**
     * Definition with no values, traits or callbacks; every field comes from
     * the default generators
     */
    static bare(table: Table): FactoryDefinition {
        return new FactoryDefinition({ table });
    }

    /**
     * Flatten `child` over its already-flattened `parent`
     *
     * Values and generators overlay child-wins per field. Traits overlay by
     * name, a child trait replacing the parent's trait of the same name
     * outright. Callbacks concatenate with the parent's first. The result
     * has no parent.
     */
    static merge(parent: FactoryDefinition, child: FactoryDefinition): FactoryDefinition {
        const layer = overlay(
            { values: new Map(parent.defaultValues), generators: new Map(parent.generators) },
            child.defaultValues,
            child.generators
        );

        const traits = new Map(parent.traits);
        for (const [name, trait] of child.traits) {
            traits.set(name, trait);
        }

        return new FactoryDefinition({
            table: child.table,
            parentName: null,
            defaultValues: layer.values,
            generators: layer.generators,
            traits: traits.values(),
            callbacks: concatCallbacks(parent, child),
        });
    }

    isRoot(): boolean {
        return this.parentName === null;
    }

    hasTrait(name: string): boolean {
        return this.traits.has(name);
    }

    get traitNames(): string[] {
        return [...this.traits.keys()];
    }

    /**
     * Base values overlaid by the requested traits
     */
    resolveDefaults(traitNames: readonly string[] = []): ReadonlyMap<string, unknown> {
        return this.resolveLayer(traitNames).values;
    }

    /**
     * Base generators overlaid by the requested traits
     */
    resolveGenerators(traitNames: readonly string[] = []): ReadonlyMap<string, ValueGenerator<unknown>> {
        return this.resolveLayer(traitNames).generators;
    }

    /**
     * Values and generators together, after the requested traits
     */
    resolveLayer(traitNames: readonly string[] = []): AttributeLayer {
        const layer: AttributeLayer = {
            values: new Map(this.defaultValues),
            generators: new Map(this.generators),
        };
        for (const trait of this.activeTraits(traitNames)) {
            overlay(layer, trait.overrides, trait.generators);
        }
        return layer;
    }

    resolveBeforeCreateCallbacks(traitNames: readonly string[] = []): readonly RecordCallback[] {
        return this.resolveCallbacks(traitNames, 'beforeCreateCallbacks');
    }

    resolveAfterCreateCallbacks(traitNames: readonly string[] = []): readonly RecordCallback[] {
        return this.resolveCallbacks(traitNames, 'afterCreateCallbacks');
    }

    resolveTransientBeforeCreateCallbacks(traitNames: readonly string[] = []): readonly TransientAwareCallback[] {
        return this.resolveCallbacks(traitNames, 'transientBeforeCreateCallbacks');
    }

    resolveTransientAfterCreateCallbacks(traitNames: readonly string[] = []): readonly TransientAwareCallback[] {
        return this.resolveCallbacks(traitNames, 'transientAfterCreateCallbacks');
    }

    private resolveCallbacks<L extends keyof LifecycleCallbacks>(
        traitNames: readonly string[],
        list: L
    ): LifecycleCallbacks[L] {
        let resolved: LifecycleCallbacks = this;
        for (const trait of this.activeTraits(traitNames)) {
            resolved = concatCallbacks(resolved, trait);
        }
        return resolved[list];
    }

    private activeTraits(traitNames: readonly string[]): Trait[] {
        const active: Trait[] = [];
        for (const name of traitNames) {
            const trait = this.traits.get(name);
            if (trait) {
                active.push(trait);
            }
        }
        return active;
    }
}
