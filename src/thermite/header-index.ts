import { EngineError, HeaderDecodeError, DuplicateSignalError } from './errors.js';
import { HEADER_RECORD_SIZE, decodeHeaderRecord, headerRecordAt } from './format.js';
import type { ResolvedLogOptions } from './config.js';
import type { HeaderEntry } from './types.js';

const REPLACEMENT_CHAR = '\uFFFD';

/**
 * Loads the header catalog of a log in file order.
 *
 * Two engine calls: the count query, then one populate call for every record.
 * Either failing surfaces as an `EngineError` naming the operation.
 */
export function loadHeaders(path: string, options: ResolvedLogOptions): HeaderEntry[] {
    const { engine, logger } = options;

    const count = engine.headerCount(path);
    if (count < 0) {
        const err = new EngineError(count, 'header_count', path);
        logger?.error?.(err.message);
        throw err;
    }
    logger?.info?.(`[Thermite] ${path}: ${count} headers`);

    const buffer = new Uint8Array(count * HEADER_RECORD_SIZE);
    const written = engine.headers(path, buffer, count);
    if (written < 0) {
        const err = new EngineError(written, 'headers', path);
        logger?.error?.(err.message);
        throw err;
    }

    const strict = options.nameDecoding === 'strict';
    const decoder = new TextDecoder('utf-8', { fatal: strict });
    const entries: HeaderEntry[] = [];
    for (let i = 0; i < Math.min(written, count); i++) {
        let entry: HeaderEntry;
        try {
            entry = decodeHeaderRecord(headerRecordAt(buffer, i), decoder);
        } catch (e) {
            throw new HeaderDecodeError(path, i, e);
        }
        if (!strict && entry.name.includes(REPLACEMENT_CHAR)) {
            logger?.warn?.(`[Thermite] ${path}: header ${i} name has invalid UTF-8, decoded as "${entry.name}"`);
        }
        entries.push(entry);
    }

    return collapseDuplicates(path, entries, options);
}

function collapseDuplicates(path: string, entries: HeaderEntry[], options: ResolvedLogOptions): HeaderEntry[] {
    const positions = new Map<string, number>();
    const result: HeaderEntry[] = [];

    for (const entry of entries) {
        const at = positions.get(entry.name);
        if (at === undefined) {
            positions.set(entry.name, result.length);
            result.push(entry);
            continue;
        }
        if (options.duplicatePolicy === 'reject') {
            throw new DuplicateSignalError(path, entry.name);
        }
        options.logger?.warn?.(`[Thermite] ${path}: duplicate signal "${entry.name}", last record wins`);
        result[at] = { name: entry.name, startOffset: entry.startOffset };
    }

    return result;
}
