import fs from "fs";
import path from "path";
import { Cell, Table, cell } from "./table";

export function ensureDir(dir: string) {
  if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  return dir;
}

function field(v: Cell) {
  if (v === null) return "";
  // escape CSV
  const s = (v instanceof Date ? v.toISOString() : String(v)).replace(/"/g, '""');
  return /[",\n]/.test(s) ? `"${s}"` : s;
}

export function toCSV(table: Table) {
  const lines = [
    table.columns.map(field).join(","),
    ...table.rows.map(r => table.columns.map(h => field(cell(r, h))).join(","))
  ];
  return lines.join("\n");
}

export function writeCSV(dir: string, filename: string, table: Table) {
  const file = path.join(ensureDir(dir), filename);
  fs.writeFileSync(file, toCSV(table));
  return file;
}
