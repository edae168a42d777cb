import { aggregateBySku } from "./aggregate";
import { dedupeBySku, dropConsumedColumns, dropFooterRows } from "./clean";
import { ColumnContract, DEFAULT_CONTRACT, contractSchema, resolveColumns } from "./contract";
import { InvalidTableError, PipelineWarning, warning } from "./errors";
import { classifyFocus } from "./focus";
import { Cell, FOCUS, TOTAL_VALUES, Table, VELOCITY, cell, copyTable, toNumber } from "./table";
import { computeVelocity, rankByVelocity } from "./velocity";

export type ZeroTotalPolicy = "skip" | "zero";

export type PipelineOptions = {
  contract?: ColumnContract;
  focusUnitThreshold?: number;
  focusCumulativeCutoff?: number;
  /** what to do with velocity when the total quantity is 0 */
  zeroTotalPolicy?: ZeroTotalPolicy;
};

export const DEFAULT_OPTIONS: Required<PipelineOptions> = {
  contract: DEFAULT_CONTRACT,
  focusUnitThreshold: 200,
  focusCumulativeCutoff: 80,
  zeroTotalPolicy: "skip"
};

export type FocusSku = { sku: Cell; totalQuantity: number; velocity: number | null };

export type PipelineSummary = {
  /** rows left after dedupe */
  totalSkus: number;
  /** pre-clean quantity sum; null when the quantity column is missing */
  totalQuantity: number | null;
  /** null when focus classification did not run */
  focusSkuCount: number | null;
  focusSkus: FocusSku[];
};

export type PipelineResult = { table: Table; summary: PipelineSummary; warnings: PipelineWarning[] };

function assertTable(table: Table) {
  if (table.columns.length === 0) throw new InvalidTableError("table has no columns");
  const seen = new Set<string>();
  for (const c of table.columns) {
    // would write the row's prototype instead of a key
    if (c === "__proto__") throw new InvalidTableError(`unsupported column name "${c}"`);
    if (seen.has(c)) throw new InvalidTableError(`duplicate column name "${c}"`);
    seen.add(c);
  }
}

function skipped(stages: string[], reason: string): PipelineWarning {
  return warning("schema", "resolve", `${reason}; skipped: ${stages.join(", ")}`);
}

/**
 * Runs every stage over a copy of `input`. Stages whose columns are missing
 * are skipped with a warning; only an unusable table throws.
 */
export function runPipeline(input: Table, options: PipelineOptions = {}): PipelineResult {
  const opts: Required<PipelineOptions> = {
    contract: options.contract ?? DEFAULT_OPTIONS.contract,
    focusUnitThreshold: options.focusUnitThreshold ?? DEFAULT_OPTIONS.focusUnitThreshold,
    focusCumulativeCutoff: options.focusCumulativeCutoff ?? DEFAULT_OPTIONS.focusCumulativeCutoff,
    zeroTotalPolicy: options.zeroTotalPolicy ?? DEFAULT_OPTIONS.zeroTotalPolicy
  };
  const contract = contractSchema.parse(opts.contract);
  assertTable(input);

  const { columns, warnings } = resolveColumns(input, contract);
  // 1) footer rows go regardless; everything else hangs off the quantity column
  let table = copyTable(input);

  if (columns.quantity === null) {
    table = dropFooterRows(table, columns.sku);
    warnings.push(skipped(["aggregate", "dedupe", "velocity", "rank", "focus"], "no quantity column"));
    return { table, summary: summarize(table, columns.sku, null, false), warnings };
  }

  // 2) per-SKU totals over the full table, total frozen before any drop
  const agg = aggregateBySku(table, columns.sku, columns.quantity);
  warnings.push(...agg.warnings);
  const totalQuantity = agg.totalQuantity;

  // 3) clean: footer rows, consumed columns, duplicates
  table = dropFooterRows(agg.table, columns.sku);
  table = dropConsumedColumns(table, columns.drop);
  table = dedupeBySku(table, columns.sku);

  if (columns.reference === null) {
    warnings.push(skipped(["velocity", "rank", "focus"], "no reference column"));
    return { table, summary: summarize(table, columns.sku, totalQuantity, false), warnings };
  }

  if (totalQuantity === 0) {
    if (opts.zeroTotalPolicy === "skip") {
      warnings.push(warning("arithmetic", "velocity", "total quantity is 0; skipped: velocity, rank, focus"));
      return { table, summary: summarize(table, columns.sku, totalQuantity, false), warnings };
    }
    warnings.push(warning("arithmetic", "velocity", "total quantity is 0; velocity set to 0"));
  }

  // 4) velocity + ranking
  const vel = computeVelocity(table, columns.reference, totalQuantity);
  warnings.push(...vel.warnings);
  table = rankByVelocity(vel.table);

  // 5) focus SKUs
  table = classifyFocus(table, {
    unitThreshold: opts.focusUnitThreshold,
    cumulativeCutoff: opts.focusCumulativeCutoff
  });

  return { table, summary: summarize(table, columns.sku, totalQuantity, true), warnings };
}

function summarize(table: Table, skuColumn: string, totalQuantity: number | null, focusRan: boolean): PipelineSummary {
  if (!focusRan) {
    return { totalSkus: table.rows.length, totalQuantity, focusSkuCount: null, focusSkus: [] };
  }
  const focusSkus = table.rows
    .filter(r => cell(r, FOCUS) === true)
    .map(r => {
      const v = cell(r, VELOCITY);
      return {
        sku: cell(r, skuColumn),
        totalQuantity: toNumber(cell(r, TOTAL_VALUES)) ?? 0,
        velocity: typeof v === "number" ? v : null
      };
    });
  return { totalSkus: table.rows.length, totalQuantity, focusSkuCount: focusSkus.length, focusSkus };
}
