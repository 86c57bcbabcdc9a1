import { EngineError } from './errors.js';
import { SAMPLE_RECORD_SIZE, decodeSampleRecords } from './format.js';
import type { ResolvedLogOptions } from './config.js';
import type { SignalResult } from './types.js';

/**
 * Reads one signal. A name outside the catalog is `unknown` and costs no
 * engine call; a failure on a known name is an `EngineError`.
 */
export function loadSignal(
    path: string,
    catalog: ReadonlySet<string>,
    name: string,
    options: Pick<ResolvedLogOptions, 'engine' | 'logger'>
): SignalResult {
    if (!catalog.has(name)) {
        return { kind: 'unknown', name };
    }
    const { engine, logger } = options;

    const count = engine.dataCount(path, name);
    if (count < 0) {
        const err = new EngineError(count, 'data_count', path, name);
        logger?.error?.(err.message);
        throw err;
    }

    const buffer = new Uint8Array(count * SAMPLE_RECORD_SIZE);
    const written = engine.data(path, name, buffer, count);
    if (written < 0) {
        const err = new EngineError(written, 'data', path, name);
        logger?.error?.(err.message);
        throw err;
    }

    return { kind: 'found', name, samples: decodeSampleRecords(buffer, Math.min(written, count)) };
}
