import type { AlignedColumn, AlignedTable, Sample, TableOptions } from './types.js';

export const MICROS_PER_SECOND = 1_000_000;

type SeriesPoint = { time: number; value: number };

function toSeconds(samples: readonly Sample[]): SeriesPoint[] {
    return samples.map((s) => ({ time: Number(s.timestamp) / MICROS_PER_SECOND, value: s.value }));
}

/**
 * Joins several signals on one time axis.
 *
 * Rows are the sorted union of every sample time (seconds, exact equality);
 * a cell is the signal's value at that time or `null`. Signals without
 * samples contribute no column. The time shift runs before the forward fill.
 */
export function buildTable(
    names: readonly string[],
    fetch: (name: string) => readonly Sample[],
    options: Required<TableOptions>
): AlignedTable {
    const series: { name: string; points: SeriesPoint[] }[] = [];
    for (const name of names) {
        const samples = fetch(name);
        if (samples.length === 0) continue;
        series.push({ name, points: toSeconds(samples) });
    }

    const timeSet = new Set<number>();
    for (const s of series) {
        for (const p of s.points) timeSet.add(p.time);
    }
    if (timeSet.size === 0) {
        return { index: [], columns: [] };
    }

    const index = Array.from(timeSet).sort((a, b) => a - b);
    const rowOf = new Map<number, number>();
    index.forEach((t, row) => rowOf.set(t, row));

    const columns: AlignedColumn[] = series.map((s) => {
        const values: (number | null)[] = new Array(index.length).fill(null);
        for (const p of s.points) {
            const row = rowOf.get(p.time);
            // NaN is stored as a missing cell, so shift and fill skip it.
            if (row !== undefined) values[row] = Number.isNaN(p.value) ? null : p.value;
        }
        return { name: s.name, values };
    });

    const table: AlignedTable = { index, columns };
    if (options.relativeTimestamp) shiftToFirstValid(table);
    if (options.ffill) forwardFill(table);
    return table;
}

/** Row index of the first row with any non-null cell, or -1. */
export function firstValidRow(table: AlignedTable): number {
    for (let row = 0; row < table.index.length; row++) {
        if (table.columns.some((c) => c.values[row] !== null)) return row;
    }
    return -1;
}

export function shiftToFirstValid(table: AlignedTable): void {
    const row = firstValidRow(table);
    if (row < 0) return;
    const origin = table.index[row];
    table.index = table.index.map((t) => t - origin);
}

export function forwardFill(table: AlignedTable): void {
    for (const column of table.columns) {
        let last: number | null = null;
        for (let row = 0; row < column.values.length; row++) {
            const v = column.values[row];
            if (v === null) column.values[row] = last;
            else last = v;
        }
    }
}
