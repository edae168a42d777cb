export type Cell = string | number | boolean | Date | null;
export type Row = Record<string, Cell>;
export type Table = { columns: string[]; rows: Row[] };

export const TOTAL_PER_SKU = "TotalQuantityPerSKU";
export const TOTAL_VALUES = "TotalQuantityValues";
export const VELOCITY = "Velocity";
export const CUMULATIVE = "CumulativePercentage";
export const FOCUS = "FocusSKU";

export function cell(row: Row, column: string): Cell {
  return row[column] ?? null;
}

export function isEmpty(v: Cell): boolean {
  if (v === null) return true;
  if (typeof v === "string") return v.trim() === "";
  if (typeof v === "number") return Number.isNaN(v);
  return false;
}

/** Numeric value of a cell, or null when it is empty or not a number */
export function toNumber(v: Cell): number | null {
  if (typeof v === "number") return Number.isFinite(v) ? v : null;
  if (typeof v === "string" && v.trim() !== "") {
    const n = Number(v.trim());
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

// "1" and 1 are different SKUs; dates compare by timestamp
export function groupKey(v: Cell): string {
  if (v instanceof Date) return `date:${v.getTime()}`;
  return `${typeof v}:${String(v)}`;
}

export function copyTable(t: Table): Table {
  return {
    columns: [...t.columns],
    rows: t.rows.map(r => {
      const out: Row = {};
      for (const c of t.columns) {
        const v = cell(r, c);
        out[c] = v instanceof Date ? new Date(v.getTime()) : v;
      }
      return out;
    })
  };
}

/** Adds (or replaces, moving it to the end) a derived column */
export function withColumn(t: Table, name: string, value: (row: Row, index: number) => Cell): Table {
  return {
    columns: [...t.columns.filter(c => c !== name), name],
    rows: t.rows.map((r, i) => ({ ...r, [name]: value(r, i) }))
  };
}

export function dropColumns(t: Table, names: string[]): Table {
  const gone = new Set(names);
  return {
    columns: t.columns.filter(c => !gone.has(c)),
    rows: t.rows.map(r => {
      const out: Row = {};
      for (const [k, v] of Object.entries(r)) if (!gone.has(k)) out[k] = v;
      return out;
    })
  };
}
