import type { ValueGenerator } from './value-generator.js';

/**
 * Per-build settings collected by a builder before build()
 *
 * clone() copies every collection, so a clone can be changed without the
 * original (or any other clone) seeing it.
 */
export class BuildConfiguration {
    constructor(
        readonly explicitValues = new Map<string, unknown>(),
        readonly generators = new Map<string, ValueGenerator<unknown>>(),
        readonly traits: string[] = [],
        readonly transients = new Map<string, unknown>(),
        public generateNullables = false
    ) {}

    clone(): BuildConfiguration {
        return new BuildConfiguration(
            new Map(this.explicitValues),
            new Map(this.generators),
            [...this.traits],
            new Map(this.transients),
            this.generateNullables
        );
    }
}
