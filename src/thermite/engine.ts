/**
 * Engine boundary.
 *
 * Every operation takes the log path and returns a count (or the number of
 * records written) on success, and a negative `EngineStatus` code on failure.
 * Output buffers are allocated by the caller: `count * HEADER_RECORD_SIZE`
 * bytes for `headers`, `count * SAMPLE_RECORD_SIZE` bytes for `data`.
 */
export interface ThermiteEngine {
    headerCount(path: string): number;
    headers(path: string, out: Uint8Array, count: number): number;
    dataCount(path: string, signal: string): number;
    data(path: string, signal: string, out: Uint8Array, count: number): number;
}

export type EngineOperation = 'header_count' | 'headers' | 'data_count' | 'data';
