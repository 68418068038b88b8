/**
 * Environment Variable Loader
 *
 * Loads KEY=VALUE pairs from a .env file into process.env before the
 * factory settings are read.
 *
 * - Comments (#) and blank lines are skipped
 * - Single and double quoted values keep their inner text verbatim
 * - Unquoted values drop inline comments
 * - Existing variables win unless `override` is set
 */

import { readFileSync, existsSync } from 'fs';

export interface LoadEnvOptions {
    /** Path to .env file (default: '.env') */
    path?: string;
    /** Print debug info (default: false) */
    debug?: boolean;
    /** Override existing env vars (default: false) */
    override?: boolean;
    /** Target environment (default: process.env) */
    env?: NodeJS.ProcessEnv;
}

export interface LoadEnvResult {
    loaded: number;
    skipped: number;
}

/**
 * Parse a single line from .env file
 * Returns [key, value] tuple or null if line should be skipped
 */
export function parseLine(line: string): [string, string] | null {
    const trimmed = line.trim();

    if (!trimmed || trimmed.startsWith('#')) {
        return null;
    }

    const eqIndex = trimmed.indexOf('=');
    if (eqIndex === -1) {
        return null;
    }

    const key = trimmed.slice(0, eqIndex).replace(/^export\s+/, '').trim();
    let value = trimmed.slice(eqIndex + 1).trim();

    if (!key) {
        return null;
    }

    if (value.length >= 2 &&
        ((value.startsWith('"') && value.endsWith('"')) ||
         (value.startsWith("'") && value.endsWith("'")))) {
        value = value.slice(1, -1);
    } else {
        const hashIndex = value.indexOf('#');
        if (hashIndex !== -1) {
            value = value.slice(0, hashIndex).trim();
        }
    }

    return [key, value];
}

/**
 * Load environment variables from a .env file
 */
export function loadEnv(options: LoadEnvOptions = {}): LoadEnvResult {
    const {
        path = '.env',
        debug = false,
        override = false,
        env = process.env,
    } = options;

    const result: LoadEnvResult = { loaded: 0, skipped: 0 };

    if (!existsSync(path)) {
        if (debug) {
            console.debug(`[env] File not found: ${path}`);
        }
        return result;
    }

    const content = readFileSync(path, 'utf-8');

    for (const line of content.split(/\r?\n/)) {
        const parsed = parseLine(line);
        if (!parsed) continue;

        const [key, value] = parsed;

        if (env[key] !== undefined && !override) {
            result.skipped++;
            if (debug) {
                console.debug(`[env] Skipping ${key} (already set)`);
            }
            continue;
        }

        env[key] = value;
        result.loaded++;

        if (debug) {
            console.debug(`[env] Set ${key}`);
        }
    }

    if (debug) {
        console.debug(`[env] Loaded ${result.loaded} variables from ${path} (${result.skipped} skipped)`);
    }

    return result;
}
