import { describe, it, expect } from 'vitest';
import { ThermiteLog } from '../../src/index.js';
import { EngineError } from '../../src/thermite/errors.js';
import { buildThermiteLog, writeBytes, SIGNALS_AB } from '../helpers/test-utils.js';

function readEverything(file: string): void {
    const log = new ThermiteLog(file);
    for (const name of log.signals()) log.get(name);
}

describe('Regression: truncated thermite logs', () => {
    it('should throw EngineError for a log cut at any offset', () => {
        const { bytes } = buildThermiteLog(SIGNALS_AB);
        expect(() => readEverything(writeBytes('intact', bytes))).not.toThrow();

        for (let i = 0; i < bytes.length; i++) {
            const file = writeBytes('truncated', bytes.slice(0, i));
            expect(() => readEverything(file), `Failed at offset ${i}/${bytes.length}`).toThrow(EngineError);
        }
    });
});
