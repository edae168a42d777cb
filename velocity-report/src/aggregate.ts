import { PipelineWarning, warning } from "./errors";
import { Table, TOTAL_PER_SKU, cell, groupKey, isEmpty, toNumber, withColumn } from "./table";

export type Aggregation = {
  table: Table;
  /** sum of the quantity column over every input row, footer rows included */
  totalQuantity: number;
  warnings: PipelineWarning[];
};

export function aggregateBySku(table: Table, skuColumn: string, quantityColumn: string): Aggregation {
  const sums = new Map<string, number>();
  let totalQuantity = 0;
  let unreadable = 0;

  for (const r of table.rows) {
    const raw = cell(r, quantityColumn);
    const qty = toNumber(raw);
    if (qty === null && !isEmpty(raw)) unreadable++;
    totalQuantity += qty ?? 0;

    const sku = cell(r, skuColumn);
    if (isEmpty(sku)) continue;
    const key = groupKey(sku);
    sums.set(key, (sums.get(key) ?? 0) + (qty ?? 0));
  }

  // a row without SKU matches no group, so its total is 0
  const out = withColumn(table, TOTAL_PER_SKU, r => {
    const sku = cell(r, skuColumn);
    return isEmpty(sku) ? 0 : sums.get(groupKey(sku)) ?? 0;
  });

  const warnings = unreadable
    ? [warning("coercion", "aggregate", `${unreadable} non-numeric value(s) in "${quantityColumn}" counted as 0`)]
    : [];
  return { table: out, totalQuantity, warnings };
}
