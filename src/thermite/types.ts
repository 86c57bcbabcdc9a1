import type { ThermiteEngine } from './engine.js';

/** One entry of the header catalog, in file order. */
export interface HeaderEntry {
    name: string;
    /** Location of the signal's data block. Only the engine interprets it. */
    startOffset: bigint;
}

export interface Sample {
    /** Microseconds since the Unix epoch. */
    timestamp: bigint;
    value: number;
}

export type SignalResult =
    | { kind: 'found'; name: string; samples: readonly Sample[] }
    | { kind: 'unknown'; name: string };

export type ThermiteLogger = {
    info?: (msg: string) => void;
    warn?: (msg: string) => void;
    error?: (msg: string) => void;
};

/**
 * How the fixed-width name field is turned into text.
 *
 * - `lenient` (default): invalid UTF-8 becomes U+FFFD
 * - `strict`: invalid UTF-8 fails header loading
 */
export type NameDecoding = 'lenient' | 'strict';

/**
 * What happens when two header records carry the same name.
 *
 * - `reject` (default): header loading fails
 * - `last-wins`: one catalog entry, pointing at the last record's block
 */
export type DuplicatePolicy = 'reject' | 'last-wins';

export type ThermiteLogOptions = {
    /** Engine the handle reads through. Defaults to the file engine. */
    engine?: ThermiteEngine;
    /** Optional logger hook; nothing in src/ writes to the console. */
    logger?: ThermiteLogger | null;
    nameDecoding?: NameDecoding;
    duplicatePolicy?: DuplicatePolicy;
};

export type TableOptions = {
    /** Forward-fill missing cells from the latest earlier value in the column. */
    ffill?: boolean;
    /** Shift the time axis so the first row holding a value sits at zero. */
    relativeTimestamp?: boolean;
};

export interface AlignedColumn {
    name: string;
    /** One cell per row of the table index; `null` marks a missing value. */
    values: (number | null)[];
}

export interface AlignedTable {
    /** Row times in seconds, ascending. */
    index: number[];
    columns: AlignedColumn[];
}

export const EMPTY_SAMPLES: readonly Sample[] = Object.freeze([]);

export function samplesOf(result: SignalResult): readonly Sample[] {
    return result.kind === 'found' ? result.samples : EMPTY_SAMPLES;
}
