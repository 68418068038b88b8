import type { ValueGenerator } from './value-generator.js';
import { copyCallbacks, type LifecycleCallbacks, type RecordCallback, type TransientAwareCallback } from './callbacks.js';
import { copyLayer } from './attribute-layer.js';

export interface TraitInit {
    name: string;
    overrides?: ReadonlyMap<string, unknown>;
    generators?: ReadonlyMap<string, ValueGenerator<unknown>>;
    callbacks?: Partial<LifecycleCallbacks>;
}

/**
 * Named overlay of field values, generators and callbacks
 *
 * Activated per build by name; a definition carries its traits keyed by name.
 * Immutable once constructed.
 */
export class Trait implements LifecycleCallbacks {
    readonly name: string;
    readonly overrides: ReadonlyMap<string, unknown>;
    readonly generators: ReadonlyMap<string, ValueGenerator<unknown>>;

    readonly beforeCreateCallbacks: readonly RecordCallback[];
    readonly afterCreateCallbacks: readonly RecordCallback[];
    readonly transientBeforeCreateCallbacks: readonly TransientAwareCallback[];
    readonly transientAfterCreateCallbacks: readonly TransientAwareCallback[];

    constructor(init: TraitInit) {
        this.name = init.name;

        const layer = copyLayer(init.overrides, init.generators, `trait '${init.name}'`);
        this.overrides = layer.values;
        this.generators = layer.generators;

        const callbacks = copyCallbacks(init.callbacks);
        this.beforeCreateCallbacks = callbacks.beforeCreateCallbacks;
        this.afterCreateCallbacks = callbacks.afterCreateCallbacks;
        this.transientBeforeCreateCallbacks = callbacks.transientBeforeCreateCallbacks;
        this.transientAfterCreateCallbacks = callbacks.transientAfterCreateCallbacks;

        Object.freeze(this);
    }
}
