import { FactoryConfigError } from '@src/lib/errors.js';
import { isLogLevel, type LogLevel } from '@src/lib/logger.js';

/**
 * Settings a FactoryContext starts from
 */
export interface FactorySettings {
    /** Minimum level the context logger writes */
    readonly logLevel: LogLevel;
    /** Generate values for nullable fields that end up without one */
    readonly generateNullables: boolean;
    /** Seed for the random generators, for reproducible runs */
    readonly seed: number | undefined;
    /** Directory holding SQLite database files */
    readonly sqliteDataDir: string;
    /** PostgreSQL connection string */
    readonly databaseUrl: string | undefined;
}

export const DEFAULT_SETTINGS: FactorySettings = Object.freeze({
    logLevel: 'warn',
    generateNullables: false,
    seed: undefined,
    sqliteDataDir: './data',
    databaseUrl: undefined,
});

/**
 * FactoryEnv - reads factory settings from environment variables
 *
 * Recognized variables:
 * - FACTORY_LOG_LEVEL           debug | info | warn | error | silent
 * - FACTORY_GENERATE_NULLABLES  true | false | 1 | 0
 * - FACTORY_SEED                integer
 * - SQLITE_DATA_DIR             path
 * - DATABASE_URL                postgres://...
 *
 * Unset or empty variables fall back to DEFAULT_SETTINGS. Malformed values
 * raise FactoryConfigError rather than being ignored.
 */
export class FactoryEnv {
    static read(env: NodeJS.ProcessEnv = process.env): FactorySettings {
        return Object.freeze({
            logLevel: FactoryEnv.logLevel(env.FACTORY_LOG_LEVEL),
            generateNullables: FactoryEnv.flag('FACTORY_GENERATE_NULLABLES', env.FACTORY_GENERATE_NULLABLES),
            seed: FactoryEnv.integer('FACTORY_SEED', env.FACTORY_SEED),
            sqliteDataDir: env.SQLITE_DATA_DIR || DEFAULT_SETTINGS.sqliteDataDir,
            databaseUrl: env.DATABASE_URL || undefined,
        });
    }

    private static logLevel(raw: string | undefined): LogLevel {
        if (!raw) {
            return DEFAULT_SETTINGS.logLevel;
        }
        const value = raw.trim().toLowerCase();
        if (!isLogLevel(value)) {
            throw new FactoryConfigError('FACTORY_LOG_LEVEL', `unknown log level '${raw}'`);
        }
        return value;
    }

    private static flag(name: string, raw: string | undefined): boolean {
        if (!raw) {
            return DEFAULT_SETTINGS.generateNullables;
        }
        switch (raw.trim().toLowerCase()) {
            case 'true':
            case '1':
                return true;
            case 'false':
            case '0':
                return false;
            default:
                throw new FactoryConfigError(name, `expected true/false, got '${raw}'`);
        }
    }

    private static integer(name: string, raw: string | undefined): number | undefined {
        if (!raw) {
            return undefined;
        }
        const value = Number(raw.trim());
        if (!Number.isInteger(value)) {
            throw new FactoryConfigError(name, `expected an integer, got '${raw}'`);
        }
        return value;
    }
}
