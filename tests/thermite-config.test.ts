import { describe, it, expect } from 'vitest';
import { resolveLogOptions, resolveTableOptions } from '../src/thermite/config.js';
import { FileEngine } from '../src/thermite/file-engine.js';
import { ThermiteError } from '../src/thermite/errors.js';
import { FaultyEngine } from './helpers/test-utils.js';

describe('Thermite option resolution', () => {
    it('falls back to the built-in defaults', () => {
        const resolved = resolveLogOptions({}, {});
        expect(resolved.engine).toBeInstanceOf(FileEngine);
        expect(resolved.logger).toBeNull();
        expect(resolved.nameDecoding).toBe('lenient');
        expect(resolved.duplicatePolicy).toBe('reject');
    });

    it('reads defaults from the environment', () => {
        const resolved = resolveLogOptions({}, {
            THERMITE_NAME_DECODING: 'strict',
            THERMITE_DUPLICATE_POLICY: 'last-wins',
        });
        expect(resolved.nameDecoding).toBe('strict');
        expect(resolved.duplicatePolicy).toBe('last-wins');
    });

    it('lets explicit options win over the environment', () => {
        const resolved = resolveLogOptions(
            { nameDecoding: 'lenient', duplicatePolicy: 'reject' },
            { THERMITE_NAME_DECODING: 'strict', THERMITE_DUPLICATE_POLICY: 'last-wins' }
        );
        expect(resolved.nameDecoding).toBe('lenient');
        expect(resolved.duplicatePolicy).toBe('reject');
    });

    it('ignores empty environment values', () => {
        expect(resolveLogOptions({}, { THERMITE_NAME_DECODING: '' }).nameDecoding).toBe('lenient');
    });

    it('rejects unknown environment values', () => {
        expect(() => resolveLogOptions({}, { THERMITE_DUPLICATE_POLICY: 'first-wins' })).toThrow(ThermiteError);
        expect(() => resolveLogOptions({}, { THERMITE_DUPLICATE_POLICY: 'first-wins' }))
            .toThrow('THERMITE_DUPLICATE_POLICY=first-wins is not one of: reject, last-wins');
    });

    it('keeps an injected engine', () => {
        const engine = new FaultyEngine({});
        expect(resolveLogOptions({ engine }, {}).engine).toBe(engine);
    });

    it('defaults table options to shifted and filled', () => {
        expect(resolveTableOptions()).toEqual({ ffill: true, relativeTimestamp: true });
        expect(resolveTableOptions({ ffill: false })).toEqual({ ffill: false, relativeTimestamp: true });
        expect(resolveTableOptions({ ffill: undefined, relativeTimestamp: false }))
            .toEqual({ ffill: true, relativeTimestamp: false });
    });
});
