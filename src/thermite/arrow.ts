import {
    Field,
    Float64,
    RecordBatch,
    Schema,
    Struct,
    Table,
    makeData,
    vectorFromArray,
    type Data,
} from 'apache-arrow';
import type { AlignedTable } from './types.js';

export const ARROW_TIME_COLUMN = 'time';

type Columns = Record<string, Float64>;

// A single builder pass yields one chunk, so the first chunk is the whole column.
function float64Column(values: readonly (number | null)[]): Data<Float64> {
    return vectorFromArray(values, new Float64()).data[0];
}

/**
 * Arrow view of an aligned table: a `time` column, then one nullable Float64
 * column per signal, in table order. A repeated signal (or a signal called
 * `time`) gets a `#2`, `#3`... suffix.
 */
export function tableToArrow(table: AlignedTable): Table<Columns> {
    const taken = new Set<string>([ARROW_TIME_COLUMN]);
    const fields: Field<Float64>[] = [new Field(ARROW_TIME_COLUMN, new Float64(), true)];
    const children: Data<Float64>[] = [float64Column(table.index)];

    for (const column of table.columns) {
        let label = column.name;
        for (let n = 2; taken.has(label); n++) {
            label = `${column.name}#${n}`;
        }
        taken.add(label);
        fields.push(new Field(label, new Float64(), true));
        children.push(float64Column(column.values));
    }

    const schema = new Schema<Columns>(fields);
    const data = makeData({
        type: new Struct<Columns>(fields),
        length: table.index.length,
        nullCount: 0,
        children,
    });
    return new Table(new RecordBatch(schema, data));
}
