import { CellValue, Fill, Workbook } from "exceljs";
import { DecodeError, PipelineWarning, errorMessage, warning } from "./errors";
import { Cell, FOCUS, Row, Table, cell, isEmpty } from "./table";

export const SHEET_NAME = "Cleaned Data";
export const XLSX_MIME = "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";

export const HIGHLIGHT: Fill = { type: "pattern", pattern: "solid", fgColor: { argb: "FFFFFF00" } };

function fromResult(r: unknown): Cell {
  if (typeof r === "string" || typeof r === "number" || typeof r === "boolean" || r instanceof Date) return r;
  return null;
}

/** Hyperlink text arrives either as a string or as rich text runs */
export function plainText(t: unknown): Cell {
  if (typeof t === "object" && t !== null && "richText" in t && Array.isArray(t.richText)) {
    return t.richText
      .map((run: unknown) =>
        typeof run === "object" && run !== null && "text" in run && typeof run.text === "string" ? run.text : ""
      )
      .join("");
  }
  return fromResult(t);
}

// formulas -> cached result, rich text / hyperlinks -> text, errors -> empty
export function toCell(v: CellValue): Cell {
  if (v === null || v === undefined) return null;
  if (typeof v === "string" || typeof v === "number" || typeof v === "boolean" || v instanceof Date) return v;
  if ("richText" in v) return v.richText.map(t => t.text).join("");
  if ("hyperlink" in v) return plainText(v.text);
  if ("result" in v) return fromResult(v.result);
  return null;
}

/** Reads the first worksheet; row 1 is the header */
export async function decodeWorkbook(data: Uint8Array): Promise<Table> {
  const wb = new Workbook();
  const ab = new ArrayBuffer(data.byteLength);
  new Uint8Array(ab).set(data);
  try {
    await wb.xlsx.load(ab);
  } catch (e) {
    throw new DecodeError(`unreadable workbook: ${errorMessage(e)}`, { cause: e });
  }

  if (wb.worksheets.length === 0) throw new DecodeError("workbook has no worksheets");
  const ws = wb.worksheets[0];
  const header = ws.getRow(1);
  if (header.cellCount === 0) throw new DecodeError(`worksheet "${ws.name}" has no header row`);

  // data may run wider than the header; those columns get positional names
  let width = Math.max(header.cellCount, ws.columnCount);
  for (let r = 2; r <= ws.rowCount; r++) width = Math.max(width, ws.getRow(r).cellCount);

  const columns: string[] = [];
  for (let c = 1; c <= width; c++) {
    const v = toCell(header.getCell(c).value);
    const name = isEmpty(v) ? `Unnamed: ${c - 1}` : v instanceof Date ? v.toISOString() : String(v);
    if (name === "__proto__") throw new DecodeError(`unsupported column name "${name}"`);
    if (columns.includes(name)) throw new DecodeError(`duplicate column name "${name}"`);
    columns.push(name);
  }

  const rows: Row[] = [];
  for (let r = 2; r <= ws.rowCount; r++) {
    const line = ws.getRow(r);
    const row: Row = {};
    columns.forEach((name, i) => {
      row[name] = toCell(line.getCell(i + 1).value);
    });
    rows.push(row);
  }
  return { columns, rows };
}

/**
 * Lays the table out on one sheet with an autofilter over the header and every
 * focus row highlighted. Formatting failures become warnings; the data stays.
 */
export function buildWorkbook(table: Table): { workbook: Workbook; warnings: PipelineWarning[] } {
  const workbook = new Workbook();
  const ws = workbook.addWorksheet(SHEET_NAME);
  ws.addRow(table.columns);
  for (const r of table.rows) ws.addRow(table.columns.map(c => cell(r, c)));

  const warnings: PipelineWarning[] = [];
  try {
    ws.autoFilter = {
      from: { row: 1, column: 1 },
      to: { row: table.rows.length + 1, column: table.columns.length }
    };
    if (table.columns.includes(FOCUS)) {
      table.rows.forEach((r, i) => {
        if (cell(r, FOCUS) !== true) return;
        const line = ws.getRow(i + 2);
        for (let c = 1; c <= table.columns.length; c++) line.getCell(c).fill = HIGHLIGHT;
      });
    }
  } catch (e) {
    warnings.push(warning("format", "export", `formatting not applied: ${errorMessage(e)}`));
  }
  return { workbook, warnings };
}

export async function encodeWorkbook(table: Table): Promise<{ data: Buffer; warnings: PipelineWarning[] }> {
  const { workbook, warnings } = buildWorkbook(table);
  const out = await workbook.xlsx.writeBuffer();
  return { data: Buffer.from(out), warnings };
}
