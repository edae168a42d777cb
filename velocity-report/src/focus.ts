import { CUMULATIVE, FOCUS, TOTAL_VALUES, Table, VELOCITY, cell, toNumber, withColumn } from "./table";

export type FocusRules = { unitThreshold: number; cumulativeCutoff: number };

/**
 * Expects a table already ranked by velocity. A row is a focus SKU when it
 * sold at least `unitThreshold` units, or when the running velocity total up
 * to and including it stays within `cumulativeCutoff`. The rules are independent.
 */
export function classifyFocus(table: Table, rules: FocusRules): Table {
  let cum = 0;
  const cumulative = table.rows.map(r => {
    const v = cell(r, VELOCITY);
    if (typeof v !== "number") return null;
    cum += v;
    return cum;
  });

  const withCum = withColumn(table, CUMULATIVE, (_r, i) => cumulative[i]);
  return withColumn(withCum, FOCUS, (r, i) => {
    const units = toNumber(cell(r, TOTAL_VALUES));
    const c = cumulative[i];
    const highUnits = units !== null && units >= rules.unitThreshold;
    const inTopVolume = c !== null && c <= rules.cumulativeCutoff;
    return highUnits || inTopVolume;
  });
}
