import cron from "node-cron";
import { cfg, pipelineOptions } from "./config";
import { processInbox } from "./inbox";

export function startScheduler() {
  if (!cfg.cronExpr) return null;
  if (!cron.validate(cfg.cronExpr)) throw new Error(`invalid CRON_EXPR "${cfg.cronExpr}"`);

  return cron.schedule(cfg.cronExpr, async () => {
    try {
      const res = await processInbox({
        inboxDir: cfg.inboxDir,
        outboxDir: cfg.outboxDir,
        concurrency: cfg.concurrency,
        csv: cfg.inboxCsv,
        options: pipelineOptions(cfg)
      });
      for (const p of res.processed) {
        console.log(`[CRON] ${p.file} -> ${p.output}: skus=${p.summary.totalSkus} focus=${p.summary.focusSkuCount ?? "-"}`);
        for (const w of p.warnings) console.log(`[CRON] ${p.file} warning (${w.code}/${w.stage}): ${w.message}`);
      }
      for (const f of res.failed) console.error(`[CRON] ${f.file} failed: ${f.error}`);
    } catch (e) {
      console.error("[CRON] error:", e);
    }
  });
}
