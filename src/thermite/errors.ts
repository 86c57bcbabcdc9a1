import type { EngineOperation } from './engine.js';
import { engineStatusName } from './format.js';

export class ThermiteError extends Error {
    constructor(message: string, public readonly cause?: unknown) {
        super(message);
        this.name = 'ThermiteError';
    }
}

/**
 * A negative return code from the engine. `operation` tells the count query
 * apart from the populate call.
 */
export class EngineError extends ThermiteError {
    public readonly status: string;

    constructor(
        public readonly code: number,
        public readonly operation: EngineOperation,
        public readonly path: string,
        public readonly signal?: string
    ) {
        const target = signal === undefined ? path : `${path} [${signal}]`;
        super(`Thermite engine: ${operation} failed for ${target} (code ${code}, ${engineStatusName(code)})`);
        this.name = 'EngineError';
        this.status = engineStatusName(code);
    }
}

export class HeaderDecodeError extends ThermiteError {
    constructor(public readonly path: string, public readonly recordIndex: number, cause?: unknown) {
        super(`Thermite header ${recordIndex} of ${path}: name is not valid UTF-8`, cause);
        this.name = 'HeaderDecodeError';
    }
}

export class DuplicateSignalError extends ThermiteError {
    constructor(public readonly path: string, public readonly signal: string) {
        super(`Thermite header of ${path}: duplicate signal name "${signal}"`);
        this.name = 'DuplicateSignalError';
    }
}
