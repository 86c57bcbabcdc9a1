/**
 * Thermite Signal Cache
 * Per-handle memo of decoded signals. Entries are only ever dropped all at once.
 */

import type { SignalResult } from './types.js';

export class SignalCache {
    private entries: Map<string, SignalResult> = new Map();

    /**
     * Returns the cached result, or loads, stores and returns it. `unknown`
     * results are stored too; a throwing loader stores nothing.
     */
    getOrLoad(name: string, load: (name: string) => SignalResult): SignalResult {
        const cached = this.entries.get(name);
        if (cached) return cached;

        const result = load(name);
        this.entries.set(name, result);
        return result;
    }

    has(name: string): boolean {
        return this.entries.has(name);
    }

    clear(): void {
        this.entries.clear();
    }

    get size(): number {
        return this.entries.size;
    }
}
