import fs from "fs";
import path from "path";
import pLimit from "p-limit";
import { ensureDir, writeCSV } from "./csv";
import { PipelineWarning, errorMessage } from "./errors";
import { PipelineOptions, PipelineSummary, runPipeline } from "./pipeline";
import { decodeWorkbook, encodeWorkbook } from "./workbook";

export type InboxOptions = {
  inboxDir: string;
  outboxDir: string;
  concurrency: number;
  /** also write a .csv copy of each report */
  csv?: boolean;
  options?: PipelineOptions;
};

export type InboxReport = {
  processed: Array<{ file: string; output: string; warnings: PipelineWarning[]; summary: PipelineSummary }>;
  failed: Array<{ file: string; error: string }>;
};

export function outputName(file: string, ext = "xlsx") {
  return `${path.basename(file, path.extname(file))}.cleaned.${ext}`;
}

async function moveTo(file: string, dir: string) {
  await fs.promises.rename(file, path.join(ensureDir(dir), path.basename(file)));
}

/** Each spreadsheet in the inbox is one independent run; sources are moved out once handled */
export async function processInbox({ inboxDir, outboxDir, concurrency, csv, options }: InboxOptions): Promise<InboxReport> {
  ensureDir(inboxDir);
  ensureDir(outboxDir);
  const entries = await fs.promises.readdir(inboxDir, { withFileTypes: true });
  const files = entries
    .filter(e => e.isFile() && /\.xlsx$/i.test(e.name) && !e.name.startsWith("~$"))
    .map(e => e.name)
    .sort();

  const report: InboxReport = { processed: [], failed: [] };
  const limit = pLimit(concurrency);

  await Promise.all(
    files.map(name => limit(async () => {
      const file = path.join(inboxDir, name);
      try {
        const table = await decodeWorkbook(await fs.promises.readFile(file));
        const res = runPipeline(table, options);
        const { data, warnings } = await encodeWorkbook(res.table);
        const output = path.join(outboxDir, outputName(name));
        await fs.promises.writeFile(output, data);
        if (csv) writeCSV(outboxDir, outputName(name, "csv"), res.table);
        await moveTo(file, path.join(inboxDir, "processed"));
        report.processed.push({ file: name, output, warnings: [...res.warnings, ...warnings], summary: res.summary });
      } catch (e) {
        let error = errorMessage(e);
        try {
          await moveTo(file, path.join(inboxDir, "failed"));
        } catch (moveErr) {
          error += `; not moved to failed/: ${errorMessage(moveErr)}`;
        }
        report.failed.push({ file: name, error });
      }
    }))
  );

  const byName = (a: { file: string }, b: { file: string }) => a.file.localeCompare(b.file);
  report.processed.sort(byName);
  report.failed.sort(byName);
  return report;
}
