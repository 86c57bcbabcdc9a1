/**
 * Thermite log reader public API
 *
 * @module thermite
 */

import { ThermiteLog } from './thermite/log.js';
import { FileEngine } from './thermite/file-engine.js';
import { tableToArrow } from './thermite/arrow.js';
import type { ThermiteLogOptions } from './thermite/types.js';

export type {
    HeaderEntry, Sample, SignalResult, AlignedTable, AlignedColumn,
    TableOptions, ThermiteLogOptions as LogOptions, ThermiteLogger as Logger,
    NameDecoding, DuplicatePolicy
} from './thermite/types.js';
export type { ThermiteEngine, EngineOperation } from './thermite/engine.js';
export { samplesOf, EMPTY_SAMPLES } from './thermite/types.js';
export { ThermiteError, EngineError, HeaderDecodeError, DuplicateSignalError } from './thermite/errors.js';
export {
    EngineStatus, HEADER_NAME_SIZE, HEADER_RECORD_SIZE, SAMPLE_RECORD_SIZE, THERMITE_FORMAT_VERSION
} from './thermite/format.js';
export { buildTable, MICROS_PER_SECOND } from './thermite/table.js';
export { SignalCache } from './thermite/signal-cache.js';
export { ThermiteLog, FileEngine, tableToArrow };

// The Thermite Namespace Object
export const Thermite = {
    /**
     * Opens a log and loads its header catalog. Throws if the headers cannot be read.
     */
    open: (path: string, options?: ThermiteLogOptions): ThermiteLog => new ThermiteLog(path, options),

    /**
     * Signal names of a log in file order, without keeping a handle.
     */
    signals: (path: string, options?: ThermiteLogOptions): string[] => new ThermiteLog(path, options).signals(),

    Log: ThermiteLog,

    FileEngine,
};

export default Thermite;
