import { FactoryDefinitionError } from '@src/lib/errors.js';
import { Table } from '@src/lib/table.js';
import type { Projector } from '@src/lib/table-record.js';
import { Logger } from '@src/lib/logger.js';
import { DEFAULT_SETTINGS, FactoryEnv, type FactorySettings } from '@src/lib/factory-env.js';
import {
    createAdapter,
    MEMORY_PATH,
    SqliteAdapter,
    SqlRecordPersister,
    type AdapterConfig,
    type DatabaseAdapter,
    type RecordStore,
} from '@src/lib/database/index.js';
import { FactoryDefinition } from './factory-definition.js';
import { FactoryDefinitionBuilder } from './definition-builder.js';
import { FactoryDefinitionRegistry } from './registry.js';
import { GeneratorRegistry } from './generator-registry.js';
import { BuildConfiguration } from './build-configuration.js';
import { RecordBuilder } from './record-builder.js';
import { PojoBuilder } from './pojo-builder.js';

export type DeclareDefinition = (factory: FactoryDefinitionBuilder) => void;

export interface FactoryContextOptions {
    /** Where built records are inserted and counted */
    store: RecordStore;
    settings?: Partial<FactorySettings>;
    logger?: Logger;
    generators?: GeneratorRegistry;
}

/**
 * FactoryContext - entry point for declaring factories and building rows
 *
 * Owns one definition registry, one set of default generators and one
 * record store. There is no shared global instance: create a context per
 * test file (or per test) and pass it to whatever needs it.
 *
 * @example
 * const ctx = await FactoryContext.open({ dbType: 'sqlite', path: ':memory:' });
 * ctx.define(AUTHOR, f => f.set(AUTHOR.columns.country, 'US'));
 * const author = await ctx.create(AUTHOR).set(AUTHOR.columns.name, 'Ada').build();
 */
export class FactoryContext {
    readonly registry: FactoryDefinitionRegistry;
    readonly generators: GeneratorRegistry;
    readonly logger: Logger;
    readonly settings: FactorySettings;

    private readonly store: RecordStore;
    private adapter: DatabaseAdapter | null = null;

    constructor(options: FactoryContextOptions) {
        this.settings = Object.freeze({ ...DEFAULT_SETTINGS, ...options.settings });
        this.logger = options.logger ?? new Logger(this.settings.logLevel);
        this.generators = options.generators ?? new GeneratorRegistry({ seed: this.settings.seed });
        this.registry = new FactoryDefinitionRegistry(this.logger);
        this.store = options.store;
    }

    /**
     * Connect to a database and return a context inserting into it
     *
     * The context owns the connection; close() releases it.
     */
    static async open(config: AdapterConfig, settings: Partial<FactorySettings> = {}): Promise<FactoryContext> {
        const adapter = createAdapter(config);
        await adapter.connect();

        const logger = new Logger(settings.logLevel ?? DEFAULT_SETTINGS.logLevel);
        const context = new FactoryContext({ store: new SqlRecordPersister(adapter, logger), settings, logger });
        context.adapter = adapter;
        context.logger.debug('Factory context connected', { dbType: adapter.getType() });
        return context;
    }

    /**
     * open() with settings read from the environment
     *
     * Uses PostgreSQL when DATABASE_URL is set, otherwise SQLite: the file
     * `<SQLITE_DATA_DIR>/<databaseName>.db`, or an in-memory database when no
     * name is given.
     */
    static async fromEnv(databaseName?: string, env: NodeJS.ProcessEnv = process.env): Promise<FactoryContext> {
        const settings = FactoryEnv.read(env);

        if (settings.databaseUrl) {
            return FactoryContext.open({ dbType: 'postgresql', connectionString: settings.databaseUrl }, settings);
        }

        const path = databaseName ? SqliteAdapter.pathFor(settings.sqliteDataDir, databaseName) : MEMORY_PATH;
        return FactoryContext.open({ dbType: 'sqlite', path }, settings);
    }

    /**
     * Adapter opened by open(), if any
     */
    get connection(): DatabaseAdapter | null {
        return this.adapter;
    }

    async close(): Promise<void> {
        if (this.adapter) {
            await this.adapter.disconnect();
            this.adapter = null;
        }
    }

    /**
     * Register a definition under the table's name, or under `name`
     *
     * Registering again under the same key replaces the earlier definition.
     */
    define(table: Table, declare?: DeclareDefinition): FactoryDefinition;
    define(name: string, table: Table, declare?: DeclareDefinition): FactoryDefinition;
    define(first: Table | string, second?: Table | DeclareDefinition, third?: DeclareDefinition): FactoryDefinition {
        if (typeof first === 'string') {
            if (!(second instanceof Table)) {
                throw new FactoryDefinitionError(`define('${first}', ...) expects a table as its second argument`);
            }
            return this.register(first, second, third);
        }
        return this.register(first.tableName, first, second instanceof Table ? undefined : second);
    }

    /**
     * Builder producing TableRecords
     *
     * A table with no registered definition builds from its field types
     * alone. A name must be registered.
     *
     * @throws DefinitionNotFoundError for an unregistered name
     */
    createRecord(target: Table | string): RecordBuilder {
        return this.builderFor(target, this.newConfiguration());
    }

    /**
     * Builder producing plain objects; camelCase keys unless a projector is given
     *
     * @throws DefinitionNotFoundError for an unregistered name
     */
    create(target: Table | string): PojoBuilder<Record<string, unknown>>;
    create<P>(target: Table | string, projector: Projector<P>): PojoBuilder<P>;
    create<P>(target: Table | string, projector?: Projector<P>): PojoBuilder<P> | PojoBuilder<Record<string, unknown>> {
        // Fail now on an unknown name rather than at the first build
        this.tableFor(target);

        const newBuilder = (config: BuildConfiguration) => this.builderFor(target, config);
        const config = this.newConfiguration();

        if (projector) {
            return new PojoBuilder(newBuilder, projector, config);
        }
        return new PojoBuilder(newBuilder, record => record.toPojo(), config);
    }

    /**
     * Number of rows in a table, optionally filtered by column equality
     */
    count(table: Table, where?: Readonly<Record<string, unknown>>): Promise<number> {
        return this.store.count(table, where);
    }

    private register(key: string, table: Table, declare?: DeclareDefinition): FactoryDefinition {
        const builder = new FactoryDefinitionBuilder(table);
        declare?.(builder);
        const definition = builder.build();
        this.registry.register(key, definition);
        return definition;
    }

    private newConfiguration(): BuildConfiguration {
        const config = new BuildConfiguration();
        config.generateNullables = this.settings.generateNullables;
        return config;
    }

    private builderFor(target: Table | string, config: BuildConfiguration): RecordBuilder {
        const table = this.tableFor(target);
        const definition = typeof target === 'string'
            ? () => this.registry.require(target)
            : () => this.registry.resolve(target.tableName) ?? FactoryDefinition.bare(target);

        return new RecordBuilder(table, {
            definition,
            persister: this.store,
            generators: this.generators,
            logger: this.logger,
        }, config);
    }

    private tableFor(target: Table | string): Table {
        if (typeof target === 'string') {
            return this.registry.tableOf(target);
        }
        return target;
    }
}
