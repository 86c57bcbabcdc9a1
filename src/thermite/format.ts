import type { HeaderEntry, Sample } from './types.js';
import type { TextDecoder } from 'node:util';

export const THERMITE_MAGIC = new Uint8Array([0x54, 0x48, 0x52, 0x4D]); // "THRM"
export const THERMITE_FORMAT_VERSION = 1;

// magic(4) + version(4) + headerCount(8)
export const FILE_PREAMBLE_SIZE = 16;

export const HEADER_NAME_SIZE = 48;
// name(48) + startOffset(8)
export const HEADER_RECORD_SIZE = HEADER_NAME_SIZE + 8;

// Each data block opens with its u64 sample count.
export const DATA_BLOCK_PREFIX_SIZE = 8;
// timestamp(8) + value(8)
export const SAMPLE_RECORD_SIZE = 16;

/**
 * Negative return codes of the engine operations.
 */
export enum EngineStatus {
    IO = -1,
    BAD_FORMAT = -2,
    TRUNCATED = -3,
    UNKNOWN_SIGNAL = -4,
    BAD_BUFFER = -5,
    NAME_TOO_LONG = -6,
}

export function engineStatusName(code: number): string {
    const name: string | undefined = EngineStatus[code];
    return name ?? 'UNKNOWN_STATUS';
}

/**
 * Length of the name stored in a fixed-width field: up to the first NUL,
 * or the whole field when the name fills it.
 */
export function nameFieldLength(field: Uint8Array): number {
    const nul = field.indexOf(0);
    return nul === -1 ? field.length : nul;
}

export function headerRecordAt(buffer: Uint8Array, index: number): Uint8Array {
    const start = index * HEADER_RECORD_SIZE;
    return buffer.subarray(start, start + HEADER_RECORD_SIZE);
}

/**
 * Decodes one 56-byte header record. The name decoder decides how invalid
 * UTF-8 is treated.
 */
export function decodeHeaderRecord(record: Uint8Array, decoder: TextDecoder): HeaderEntry {
    const view = new DataView(record.buffer, record.byteOffset, record.byteLength);
    const nameField = record.subarray(0, HEADER_NAME_SIZE);
    return {
        name: decoder.decode(nameField.subarray(0, nameFieldLength(nameField))),
        startOffset: view.getBigUint64(HEADER_NAME_SIZE, true),
    };
}

export function decodeSampleRecords(buffer: Uint8Array, count: number): readonly Sample[] {
    const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
    const samples: Sample[] = new Array(count);
    let pos = 0;
    for (let i = 0; i < count; i++) {
        const timestamp = view.getBigInt64(pos, true); pos += 8;
        const value = view.getFloat64(pos, true); pos += 8;
        samples[i] = Object.freeze({ timestamp, value });
    }
    return Object.freeze(samples);
}
