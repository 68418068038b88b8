import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FactoryContext } from '@src/lib/factory/context.js';
import type { TableRecord } from '@src/lib/table-record.js';
import { openTestContext } from '@spec/helpers/test-context.js';
import { AUTHOR } from '@spec/helpers/test-tables.js';

const { name, email, country } = AUTHOR.columns;

interface AuthorCard {
    id: number | null;
    label: string;
}

function toCard(record: TableRecord): AuthorCard {
    return {
        id: record.get(AUTHOR.columns.id),
        label: `${record.get(name)} (${record.get(country) ?? 'unknown'})`,
    };
}

describe('PojoBuilder', () => {
    let ctx: FactoryContext;

    beforeEach(async () => {
        ctx = await openTestContext();
    });

    afterEach(async () => {
        await ctx.close();
    });

    it('should return camelCase objects by default', async () => {
        const author = await ctx.create(AUTHOR).set(name, 'Ada').build();

        expect(Object.keys(author)).toEqual(['id', 'name', 'email', 'country', 'active', 'createdAt']);
        expect(author.id).toBe(1);
        expect(author.name).toBe('Ada');
        expect(author.country).toBeNull();
        expect(author.active).toBe(false);
        expect(author.createdAt).toBeInstanceOf(Date);
    });

    it('should project through a custom projector', async () => {
        const card = await ctx.create(AUTHOR, toCard).set(name, 'Ada').set(country, 'UK').build();

        expect(card).toEqual({ id: 1, label: 'Ada (UK)' });
    });

    it('should build each copy in times() with its own customization', async () => {
        const authors = await ctx.create(AUTHOR).times(3, (builder, index) => {
            builder.set(name, `Author ${index}`);
        });

        expect(authors.map(author => author.name)).toEqual(['Author 0', 'Author 1', 'Author 2']);
        expect(authors.map(author => author.id)).toEqual([1, 2, 3]);
        expect(await ctx.count(AUTHOR)).toBe(3);
    });

    it('should not let a times() customization reach later copies', async () => {
        const authors = await ctx.create(AUTHOR, toCard).set(name, 'Shared').times(2, (builder, index) => {
            if (index === 0) {
                builder.set(country, 'FR');
            }
        });

        expect(authors.map(author => author.label)).toEqual(['Shared (FR)', 'Shared (unknown)']);
    });

    it('should leave the original builder untouched by times()', async () => {
        const builder = ctx.create(AUTHOR).set(name, 'Original');

        await builder.times(2, copy => {
            copy.set(name, 'Changed').trait('anything');
        });

        expect(builder.buildAttributes().name).toBe('Original');
    });

    it('should return an empty list for times(0)', async () => {
        expect(await ctx.create(AUTHOR).times(0)).toEqual([]);
        expect(await ctx.count(AUTHOR)).toBe(0);
    });

    it('should project without inserting in buildWithoutInsert()', async () => {
        const author = ctx.create(AUTHOR).set(name, 'Ada').set(email, 'ada@example.com').buildWithoutInsert();

        expect(author).toEqual({ name: 'Ada', email: 'ada@example.com' });
        expect(await ctx.count(AUTHOR)).toBe(0);
    });

    it('should return field-named attributes from buildAttributes()', () => {
        ctx.define(AUTHOR, f => f.set(country, 'NZ'));

        const attributes = ctx.create(AUTHOR).set(name, 'Ada').set(email, 'ada@example.com').buildAttributes();

        expect(attributes).toEqual({ name: 'Ada', email: 'ada@example.com', country: 'NZ' });
    });

    it('should apply traits and transient attributes', async () => {
        const seen: unknown[] = [];
        ctx.define(AUTHOR, f => f
            .trait('kiwi', t => t.set(country, 'NZ'))
            .afterCreateTransient((_record, transients) => {
                seen.push(transients.get('tag', 'string'));
            }));

        const card = await ctx.create(AUTHOR, toCard).set(name, 'Ada').trait('kiwi').transientAttr('tag', 'x').build();

        expect(card.label).toBe('Ada (NZ)');
        expect(seen).toEqual(['x']);
    });

    it('should keep clones independent', () => {
        const original = ctx.create(AUTHOR).set(name, 'Original');
        const copy = original.clone().set(name, 'Copy');

        expect(original.buildAttributes().name).toBe('Original');
        expect(copy.buildAttributes().name).toBe('Copy');
    });
});
