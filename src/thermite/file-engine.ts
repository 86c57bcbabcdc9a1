import { closeSync, fstatSync, openSync, readSync } from 'node:fs';
import type { ThermiteEngine } from './engine.js';
import {
    THERMITE_MAGIC, THERMITE_FORMAT_VERSION, FILE_PREAMBLE_SIZE,
    HEADER_NAME_SIZE, HEADER_RECORD_SIZE, DATA_BLOCK_PREFIX_SIZE,
    SAMPLE_RECORD_SIZE, EngineStatus, nameFieldLength, headerRecordAt
} from './format.js';

/** Carries an engine status out of nested reads; never leaves this module. */
class StatusSignal {
    constructor(public readonly code: EngineStatus) { }
}

interface OpenLog {
    fd: number;
    size: number;
}

interface DataBlock {
    start: number;
    count: number;
}

/**
 * Reads thermite logs straight from disk with synchronous positional reads.
 * The file is opened and closed inside every call; no state is kept between
 * calls, so the file must not change while a handle uses it.
 */
export class FileEngine implements ThermiteEngine {
    private readonly encoder = new TextEncoder();

    headerCount(path: string): number {
        return this.run(path, (log) => this.readPreamble(log));
    }

    headers(path: string, out: Uint8Array, count: number): number {
        if (count < 0 || out.length < count * HEADER_RECORD_SIZE) return EngineStatus.BAD_BUFFER;
        return this.run(path, (log) => {
            const available = this.readPreamble(log);
            const n = Math.min(count, available);
            this.readExact(log, FILE_PREAMBLE_SIZE, out.subarray(0, n * HEADER_RECORD_SIZE));
            return n;
        });
    }

    dataCount(path: string, signal: string): number {
        return this.run(path, (log) => this.locate(log, signal).count);
    }

    data(path: string, signal: string, out: Uint8Array, count: number): number {
        if (count < 0 || out.length < count * SAMPLE_RECORD_SIZE) return EngineStatus.BAD_BUFFER;
        return this.run(path, (log) => {
            const block = this.locate(log, signal);
            const n = Math.min(count, block.count);
            this.readExact(log, block.start + DATA_BLOCK_PREFIX_SIZE, out.subarray(0, n * SAMPLE_RECORD_SIZE));
            return n;
        });
    }

    private run(path: string, body: (log: OpenLog) => number): number {
        let fd: number;
        try {
            fd = openSync(path, 'r');
        } catch {
            return EngineStatus.IO;
        }
        try {
            return body({ fd, size: fstatSync(fd).size });
        } catch (e) {
            if (e instanceof StatusSignal) return e.code;
            return EngineStatus.IO;
        } finally {
            closeSync(fd);
        }
    }

    private readExact(log: OpenLog, position: number, target: Uint8Array): void {
        if (position + target.length > log.size) throw new StatusSignal(EngineStatus.TRUNCATED);
        let done = 0;
        while (done < target.length) {
            const n = readSync(log.fd, target, done, target.length - done, position + done);
            if (n === 0) throw new StatusSignal(EngineStatus.TRUNCATED);
            done += n;
        }
    }

    private readU64(log: OpenLog, position: number): number {
        const buf = new Uint8Array(8);
        this.readExact(log, position, buf);
        const value = new DataView(buf.buffer).getBigUint64(0, true);
        if (value > BigInt(Number.MAX_SAFE_INTEGER)) throw new StatusSignal(EngineStatus.BAD_FORMAT);
        return Number(value);
    }

    /** Validates magic and version, returns the header count. */
    private readPreamble(log: OpenLog): number {
        const head = new Uint8Array(FILE_PREAMBLE_SIZE);
        this.readExact(log, 0, head);
        for (let i = 0; i < THERMITE_MAGIC.length; i++) {
            if (head[i] !== THERMITE_MAGIC[i]) throw new StatusSignal(EngineStatus.BAD_FORMAT);
        }
        const view = new DataView(head.buffer);
        if (view.getUint32(4, true) !== THERMITE_FORMAT_VERSION) throw new StatusSignal(EngineStatus.BAD_FORMAT);

        const count = view.getBigUint64(8, true);
        if (count > BigInt(Number.MAX_SAFE_INTEGER)) throw new StatusSignal(EngineStatus.BAD_FORMAT);
        if (FILE_PREAMBLE_SIZE + Number(count) * HEADER_RECORD_SIZE > log.size) {
            throw new StatusSignal(EngineStatus.TRUNCATED);
        }
        return Number(count);
    }

    /**
     * Finds the data block of `signal`. Names are compared byte for byte; when
     * several records share a name the last one is used.
     */
    private locate(log: OpenLog, signal: string): DataBlock {
        const wanted = this.encoder.encode(signal);
        if (wanted.length > HEADER_NAME_SIZE) throw new StatusSignal(EngineStatus.NAME_TOO_LONG);

        const headerCount = this.readPreamble(log);
        const records = new Uint8Array(headerCount * HEADER_RECORD_SIZE);
        this.readExact(log, FILE_PREAMBLE_SIZE, records);

        let start = -1;
        for (let i = 0; i < headerCount; i++) {
            const record = headerRecordAt(records, i);
            if (!sameName(record.subarray(0, HEADER_NAME_SIZE), wanted)) continue;
            const offset = new DataView(record.buffer, record.byteOffset, record.byteLength)
                .getBigUint64(HEADER_NAME_SIZE, true);
            if (offset > BigInt(Number.MAX_SAFE_INTEGER)) throw new StatusSignal(EngineStatus.BAD_FORMAT);
            start = Number(offset);
        }
        if (start < 0) throw new StatusSignal(EngineStatus.UNKNOWN_SIGNAL);

        const count = this.readU64(log, start);
        if (start + DATA_BLOCK_PREFIX_SIZE + count * SAMPLE_RECORD_SIZE > log.size) {
            throw new StatusSignal(EngineStatus.TRUNCATED);
        }
        return { start, count };
    }
}

function sameName(field: Uint8Array, wanted: Uint8Array): boolean {
    if (nameFieldLength(field) !== wanted.length) return false;
    for (let i = 0; i < wanted.length; i++) {
        if (field[i] !== wanted[i]) return false;
    }
    return true;
}
