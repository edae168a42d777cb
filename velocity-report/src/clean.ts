import { Table, TOTAL_PER_SKU, TOTAL_VALUES, cell, dropColumns, groupKey, isEmpty, withColumn } from "./table";

/**
 * Drops rows without a SKU. Exports end with a totals/filters footer whose SKU
 * cell is blank; any other blank-SKU line goes with it.
 */
export function dropFooterRows(table: Table, skuColumn: string): Table {
  return {
    columns: [...table.columns],
    rows: table.rows.filter(r => !isEmpty(cell(r, skuColumn)))
  };
}

/** Snapshots the per-SKU totals as values, then removes the raw and intermediate columns */
export function dropConsumedColumns(table: Table, raw: string[]): Table {
  const totals = table.rows.map(r => cell(r, TOTAL_PER_SKU));
  const dropped = dropColumns(table, [...raw, TOTAL_PER_SKU]);
  return withColumn(dropped, TOTAL_VALUES, (_r, i) => totals[i]);
}

/** First row of each SKU wins */
export function dedupeBySku(table: Table, skuColumn: string): Table {
  const seen = new Set<string>();
  return {
    columns: [...table.columns],
    rows: table.rows.filter(r => {
      const key = groupKey(cell(r, skuColumn));
      if (seen.has(key)) return false;
      seen.add(key);
      return true;
    })
  };
}
