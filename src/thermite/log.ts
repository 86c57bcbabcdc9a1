import type { Table } from 'apache-arrow';
import { resolveLogOptions, resolveTableOptions, type ResolvedLogOptions } from './config.js';
import { loadHeaders } from './header-index.js';
import { loadSignal } from './signal-reader.js';
import { SignalCache } from './signal-cache.js';
import { buildTable } from './table.js';
import { tableToArrow } from './arrow.js';
import { samplesOf } from './types.js';
import type { AlignedTable, HeaderEntry, Sample, SignalResult, TableOptions, ThermiteLogOptions } from './types.js';

/**
 * An opened thermite log.
 *
 * The header catalog is read once, in the constructor; if that fails the
 * constructor throws. Signals are read on first access and cached on the
 * handle until `clearCache()`. Not safe to share across threads.
 */
export class ThermiteLog {
    public readonly path: string;
    private readonly options: ResolvedLogOptions;
    private readonly entries: readonly HeaderEntry[];
    private readonly catalog: ReadonlySet<string>;
    private readonly cache = new SignalCache();

    constructor(path: string, options: ThermiteLogOptions = {}) {
        this.path = path;
        this.options = resolveLogOptions(options);
        this.entries = loadHeaders(path, this.options);
        this.catalog = new Set(this.entries.map((e) => e.name));
    }

    static open(path: string, options?: ThermiteLogOptions): ThermiteLog {
        return new ThermiteLog(path, options);
    }

    /** Header entries in file order. */
    headers(): HeaderEntry[] {
        return this.entries.map((e) => ({ ...e }));
    }

    /** Signal names in file order. */
    signals(): string[] {
        return this.entries.map((e) => e.name);
    }

    has(name: string): boolean {
        return this.catalog.has(name);
    }

    query(name: string): SignalResult {
        return this.cache.getOrLoad(name, (n) => loadSignal(this.path, this.catalog, n, this.options));
    }

    /**
     * Samples of one signal in file order; empty when the name is not in the
     * catalog. Repeated calls return the same frozen array until
     * `clearCache()`; the cache shares it with every caller.
     */
    get(name: string): readonly Sample[] {
        return samplesOf(this.query(name));
    }

    /** Aligned table of `names`; time shift and forward fill default to on. */
    loadTable(names: Iterable<string>, options?: TableOptions): AlignedTable {
        return buildTable(Array.from(names), (n) => this.get(n), resolveTableOptions(options));
    }

    loadArrow(names: Iterable<string>, options?: TableOptions): Table {
        return tableToArrow(this.loadTable(names, options));
    }

    clearCache(): void {
        const dropped = this.cache.size;
        this.cache.clear();
        this.options.logger?.info?.(`[Thermite] ${this.path}: cleared ${dropped} cached signals`);
    }

    get cachedSignalCount(): number {
        return this.cache.size;
    }
}
