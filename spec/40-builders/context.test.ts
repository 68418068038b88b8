import { describe, it, expect, afterEach, vi } from 'vitest';
import { FactoryContext } from '@src/lib/factory/context.js';
import { Logger } from '@src/lib/logger.js';
import { DefinitionNotFoundError, FactoryDefinitionError } from '@src/lib/errors.js';
import { openTestContext } from '@spec/helpers/test-context.js';
import { MemoryStore } from '@spec/helpers/memory-store.js';
import { AUTHOR, BOOK } from '@spec/helpers/test-tables.js';

const { name, country } = AUTHOR.columns;

function memoryContext(store = new MemoryStore(), generateNullables = false): FactoryContext {
    return new FactoryContext({ store, settings: { logLevel: 'silent', seed: 42, generateNullables } });
}

describe('FactoryContext', () => {
    let opened: FactoryContext | null = null;

    afterEach(async () => {
        await opened?.close();
        opened = null;
    });

    describe('define()', () => {
        it('should register under the table name', () => {
            const ctx = memoryContext();
            ctx.define(AUTHOR, f => f.set(country, 'US'));

            expect(ctx.registry.keys()).toEqual(['author']);
            expect(ctx.createRecord(AUTHOR).buildAttributes().country).toBe('US');
        });

        it('should register under a custom name without touching the table definition', () => {
            const ctx = memoryContext();
            ctx.define('retiredAuthor', AUTHOR, f => f.set(country, 'ES'));

            expect(ctx.registry.keys()).toEqual(['retiredauthor']);
            expect(ctx.createRecord('retiredAuthor').buildAttributes().country).toBe('ES');
            expect(ctx.createRecord(AUTHOR).buildAttributes().country).toBeUndefined();
        });

        it('should look names up case-insensitively', () => {
            const ctx = memoryContext();
            ctx.define('RetiredAuthor', AUTHOR, f => f.set(country, 'ES'));

            expect(ctx.createRecord('RETIREDAUTHOR').buildAttributes().country).toBe('ES');
        });

        it('should replace an earlier definition under the same key', () => {
            const ctx = memoryContext();
            ctx.define(AUTHOR, f => f.set(country, 'US'));
            ctx.define(AUTHOR, f => f.set(country, 'CA'));

            expect(ctx.createRecord(AUTHOR).buildAttributes().country).toBe('CA');
        });

        it('should register an empty definition when no declaration is given', () => {
            const ctx = memoryContext();
            const definition = ctx.define(BOOK);

            expect(definition.isRoot()).toBe(true);
            expect(definition.traitNames).toEqual([]);
            expect(ctx.registry.has('book')).toBe(true);
        });

        it('should reject a name without a table', () => {
            const ctx = memoryContext();

            // untyped call: the overloads reject this at compile time
            const declare = () => undefined;
            expect(() => Reflect.apply(ctx.define, ctx, ['orphan', declare])).toThrow(
                "define('orphan', ...) expects a table as its second argument"
            );
            expect(() => Reflect.apply(ctx.define, ctx, ['orphan', declare])).toThrow(FactoryDefinitionError);
        });
    });

    describe('createRecord() and create()', () => {
        it('should reject an unknown name straight away', () => {
            const ctx = memoryContext();

            expect(() => ctx.createRecord('ghost')).toThrow(DefinitionNotFoundError);
            expect(() => ctx.create('ghost')).toThrow("Factory definition 'ghost' not found");
        });

        it('should build an unregistered table from field types alone', async () => {
            const store = new MemoryStore();
            const ctx = memoryContext(store);

            const author = await ctx.createRecord(AUTHOR).build();

            expect(author.get(AUTHOR.columns.id)).toBe(1);
            expect(typeof author.get(name)).toBe('string');
            expect(store.inserted).toHaveLength(1);
        });

        it('should insert into the store it was given', async () => {
            const store = new MemoryStore();
            const ctx = memoryContext(store);

            await ctx.create(AUTHOR).set(country, 'US').times(2);
            await ctx.create(AUTHOR).set(country, 'UK').build();

            expect(await ctx.count(AUTHOR)).toBe(3);
            expect(await ctx.count(AUTHOR, { country: 'US' })).toBe(2);
            expect(store.rows.get('author')?.map(row => row.id)).toEqual([1, 2, 3]);
        });
    });

    describe('settings', () => {
        it('should leave nullable fields unset by default', () => {
            const ctx = memoryContext();

            expect('country' in ctx.createRecord(AUTHOR).buildAttributes()).toBe(false);
        });

        it('should generate nullable fields when the setting is on', () => {
            const ctx = memoryContext(new MemoryStore(), true);

            expect(typeof ctx.createRecord(AUTHOR).buildAttributes().country).toBe('string');
        });

        it('should let a builder override the context setting', () => {
            const ctx = memoryContext(new MemoryStore(), true);

            expect('country' in ctx.createRecord(AUTHOR).generateNullables(false).buildAttributes()).toBe(false);
        });

        it('should freeze the merged settings', () => {
            const ctx = memoryContext();

            expect(ctx.settings.seed).toBe(42);
            expect(ctx.settings.sqliteDataDir).toBe('./data');
            expect(Object.isFrozen(ctx.settings)).toBe(true);
        });

        it('should produce the same values for the same seed', () => {
            const first = memoryContext().createRecord(AUTHOR).buildAttributes();
            const second = memoryContext().createRecord(AUTHOR).buildAttributes();

            expect(second).toEqual(first);
        });

        it('should use a logger it is given', () => {
            const logger = new Logger('silent');
            const ctx = new FactoryContext({ store: new MemoryStore(), logger });

            expect(ctx.logger).toBe(logger);
        });
    });

    describe('connections', () => {
        it('should have no connection when built over a store', () => {
            expect(memoryContext().connection).toBeNull();
        });

        it('should open an in-memory SQLite database from an empty environment', async () => {
            opened = await FactoryContext.fromEnv(undefined, { FACTORY_LOG_LEVEL: 'silent' });

            expect(opened.connection?.getType()).toBe('sqlite');
            expect(opened.settings.logLevel).toBe('silent');
        });

        it('should hand its logger to the persister it opens', async () => {
            opened = await openTestContext({ logLevel: 'debug' });
            vi.spyOn(opened.logger, 'debug').mockImplementation(() => {});
            const time = vi.spyOn(opened.logger, 'time').mockImplementation(() => {});

            await opened.createRecord(AUTHOR).build();

            expect(opened.logger.getLevel()).toBe('debug');
            expect(time).toHaveBeenCalledWith('Record inserted', expect.any(BigInt), { table: 'author', columns: 2 });
        });

        it('should release the connection on close()', async () => {
            const ctx = await openTestContext();

            await ctx.close();

            expect(ctx.connection).toBeNull();
            // a second close is a no-op
            await ctx.close();
        });
    });
});
