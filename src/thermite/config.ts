import type { ThermiteEngine } from './engine.js';
import { FileEngine } from './file-engine.js';
import { ThermiteError } from './errors.js';
import type { DuplicatePolicy, NameDecoding, ThermiteLogOptions, ThermiteLogger, TableOptions } from './types.js';

export type ResolvedLogOptions = {
    engine: ThermiteEngine;
    logger: ThermiteLogger | null;
    nameDecoding: NameDecoding;
    duplicatePolicy: DuplicatePolicy;
};

const NAME_DECODING_VALUES: readonly NameDecoding[] = ['lenient', 'strict'];
const DUPLICATE_POLICY_VALUES: readonly DuplicatePolicy[] = ['reject', 'last-wins'];

/** `loadTable` defaults: shifted to zero and forward-filled. */
export const DEFAULT_TABLE_OPTIONS: Required<TableOptions> = {
    ffill: true,
    relativeTimestamp: true,
};

function fromEnv<T extends string>(env: NodeJS.ProcessEnv, key: string, allowed: readonly T[], fallback: T): T {
    const raw = env[key];
    if (raw === undefined || raw === '') return fallback;
    const match = allowed.find((v) => v === raw);
    if (match === undefined) {
        throw new ThermiteError(`${key}=${raw} is not one of: ${allowed.join(', ')}`);
    }
    return match;
}

/**
 * Fills in defaults. Precedence: explicit option, then `THERMITE_NAME_DECODING`
 * / `THERMITE_DUPLICATE_POLICY`, then the built-in default.
 */
export function resolveLogOptions(options: ThermiteLogOptions = {}, env: NodeJS.ProcessEnv = process.env): ResolvedLogOptions {
    return {
        engine: options.engine ?? new FileEngine(),
        logger: options.logger ?? null,
        nameDecoding: options.nameDecoding
            ?? fromEnv(env, 'THERMITE_NAME_DECODING', NAME_DECODING_VALUES, 'lenient'),
        duplicatePolicy: options.duplicatePolicy
            ?? fromEnv(env, 'THERMITE_DUPLICATE_POLICY', DUPLICATE_POLICY_VALUES, 'reject'),
    };
}

export function resolveTableOptions(options: TableOptions = {}): Required<TableOptions> {
    return {
        ffill: options.ffill ?? DEFAULT_TABLE_OPTIONS.ffill,
        relativeTimestamp: options.relativeTimestamp ?? DEFAULT_TABLE_OPTIONS.relativeTimestamp,
    };
}
