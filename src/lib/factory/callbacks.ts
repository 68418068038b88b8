import type { TableRecord } from '@src/lib/table-record.js';
import type { Logger } from '@src/lib/logger.js';
import type { TransientAttributes } from './transient-attributes.js';

/**
 * Callback that receives the record being created
 */
export type RecordCallback = (record: TableRecord) => void | Promise<void>;

/**
 * Callback that also receives the build's transient attributes
 */
export type TransientAwareCallback = (record: TableRecord, transients: TransientAttributes) => void | Promise<void>;

export type CallbackPhase = 'beforeCreate' | 'afterCreate';

/**
 * The four lifecycle callback lists carried by definitions and traits
 */
export interface LifecycleCallbacks {
    readonly beforeCreateCallbacks: readonly RecordCallback[];
    readonly afterCreateCallbacks: readonly RecordCallback[];
    readonly transientBeforeCreateCallbacks: readonly TransientAwareCallback[];
    readonly transientAfterCreateCallbacks: readonly TransientAwareCallback[];
}

/**
 * Frozen copies of callback lists, missing lists treated as empty
 */
export function copyCallbacks(callbacks: Partial<LifecycleCallbacks> = {}): LifecycleCallbacks {
    return {
        beforeCreateCallbacks: Object.freeze([...(callbacks.beforeCreateCallbacks ?? [])]),
        afterCreateCallbacks: Object.freeze([...(callbacks.afterCreateCallbacks ?? [])]),
        transientBeforeCreateCallbacks: Object.freeze([...(callbacks.transientBeforeCreateCallbacks ?? [])]),
        transientAfterCreateCallbacks: Object.freeze([...(callbacks.transientAfterCreateCallbacks ?? [])]),
    };
}

/**
 * Concatenate callback lists, `first` running before `second`
 */
export function concatCallbacks(first: LifecycleCallbacks, second: LifecycleCallbacks): LifecycleCallbacks {
    return {
        beforeCreateCallbacks: Object.freeze([...first.beforeCreateCallbacks, ...second.beforeCreateCallbacks]),
        afterCreateCallbacks: Object.freeze([...first.afterCreateCallbacks, ...second.afterCreateCallbacks]),
        transientBeforeCreateCallbacks: Object.freeze([...first.transientBeforeCreateCallbacks, ...second.transientBeforeCreateCallbacks]),
        transientAfterCreateCallbacks: Object.freeze([...first.transientAfterCreateCallbacks, ...second.transientAfterCreateCallbacks]),
    };
}

/**
 * Run one lifecycle phase
 *
 * Plain callbacks run first, in registration order, then transient-aware
 * callbacks in registration order. Each callback is awaited before the next
 * starts, so mutations made to the record are visible further down the list.
 * The first failure ends the phase and propagates.
 */
export async function runCallbacks(
    phase: CallbackPhase,
    plain: readonly RecordCallback[],
    transientAware: readonly TransientAwareCallback[],
    record: TableRecord,
    transients: TransientAttributes,
    logger?: Logger
): Promise<void> {
    if (plain.length === 0 && transientAware.length === 0) {
        return;
    }

    logger?.debug('Running factory callbacks', {
        phase,
        table: record.table.tableName,
        plain: plain.length,
        transientAware: transientAware.length,
    });

    for (const callback of plain) {
        await callback(record);
    }
    for (const callback of transientAware) {
        await callback(record, transients);
    }
}
