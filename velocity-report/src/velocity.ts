import { PipelineWarning, warning } from "./errors";
import { Row, Table, VELOCITY, cell, isEmpty, toNumber, withColumn } from "./table";

export function velocity(reference: number, totalQuantity: number) {
  return totalQuantity === 0 ? 0 : (reference / totalQuantity) * 100;
}

/**
 * Velocity = reference / totalQuantity * 100. A zero total yields 0 for every
 * row; callers that prefer to skip the stage check the total first.
 */
export function computeVelocity(
  table: Table,
  referenceColumn: string,
  totalQuantity: number
): { table: Table; warnings: PipelineWarning[] } {
  let unreadable = 0;
  const out = withColumn(table, VELOCITY, r => {
    const raw = cell(r, referenceColumn);
    const ref = toNumber(raw);
    if (ref === null) {
      if (!isEmpty(raw)) unreadable++;
      return null;
    }
    return velocity(ref, totalQuantity);
  });

  const missing = out.rows.filter(r => cell(r, VELOCITY) === null).length;
  const warnings = missing
    ? [
        warning(
          "coercion",
          "velocity",
          `${missing} row(s) have no numeric "${referenceColumn}" (${unreadable} non-numeric); velocity left empty`
        )
      ]
    : [];
  return { table: out, warnings };
}

/** Stable sort by velocity, largest first; rows without velocity go last */
export function rankByVelocity(table: Table): Table {
  const v = (x: Row) => {
    const n = cell(x, VELOCITY);
    return typeof n === "number" ? n : null;
  };
  const rows = [...table.rows].sort((a, b) => {
    const va = v(a), vb = v(b);
    if (va === null || vb === null) return va === vb ? 0 : va === null ? 1 : -1;
    return vb - va;
  });
  return { columns: [...table.columns], rows };
}
