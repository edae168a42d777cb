import { z } from "zod";
import { InvalidTableError, PipelineWarning, warning } from "./errors";
import { Table } from "./table";

const position = z.number().int().nonnegative();

export const contractSchema = z
  .object({
    skuPos: position,
    quantityPos: position,
    referencePos: position,
    dropPos: z.array(position)
  })
  .refine(c => new Set([c.skuPos, c.quantityPos, c.referencePos]).size === 3, {
    message: "sku, quantity and reference positions must differ"
  })
  .refine(c => !c.dropPos.includes(c.skuPos) && !c.dropPos.includes(c.referencePos), {
    message: "sku and reference columns cannot be dropped"
  });

export type ColumnContract = z.infer<typeof contractSchema>;

// A = SKU, E = quantity sold, G = reference total; D is dropped with E
export const DEFAULT_CONTRACT: ColumnContract = { skuPos: 0, quantityPos: 4, referencePos: 6, dropPos: [3] };

export type ResolvedColumns = {
  sku: string;
  quantity: string | null;
  reference: string | null;
  /** raw columns removed by the cleaner, quantity included */
  drop: string[];
};

export function resolveColumns(
  table: Table,
  contract: ColumnContract
): { columns: ResolvedColumns; warnings: PipelineWarning[] } {
  const at = (pos: number) => (pos < table.columns.length ? table.columns[pos] : null);
  const warnings: PipelineWarning[] = [];

  const sku = at(contract.skuPos);
  if (sku === null) {
    throw new InvalidTableError(
      `SKU column at position ${contract.skuPos} not found: table has ${table.columns.length} columns`
    );
  }

  const quantity = at(contract.quantityPos);
  if (quantity === null) {
    warnings.push(
      warning(
        "schema",
        "resolve",
        `quantity column at position ${contract.quantityPos} not found (table has ${table.columns.length} columns)`
      )
    );
  }
  const reference = at(contract.referencePos);
  if (reference === null) {
    warnings.push(
      warning(
        "schema",
        "resolve",
        `reference column at position ${contract.referencePos} not found (table has ${table.columns.length} columns)`
      )
    );
  }

  const drop: string[] = [];
  for (const pos of [...contract.dropPos, contract.quantityPos]) {
    const name = at(pos);
    if (name !== null && !drop.includes(name)) drop.push(name);
  }

  return { columns: { sku, quantity, reference, drop }, warnings };
}
