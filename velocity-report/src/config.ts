import "dotenv/config";
import path from "path";
import { ColumnContract, contractSchema } from "./contract";
import { PipelineOptions, ZeroTotalPolicy } from "./pipeline";

function parseList(s: string) {
  return s.split(",").map(x => x.trim()).filter(Boolean).map(x => parseInt(x, 10));
}

function parsePolicy(s: string): ZeroTotalPolicy {
  if (s === "skip" || s === "zero") return s;
  throw new Error(`ZERO_TOTAL_POLICY must be "skip" or "zero", got "${s}"`);
}

export type Config = {
  port: number;
  cronExpr: string;
  inboxDir: string;
  outboxDir: string;
  concurrency: number;
  inboxCsv: boolean;
  maxUploadBytes: number;
  focusUnitThreshold: number;
  focusCumulativeCutoff: number;
  zeroTotalPolicy: ZeroTotalPolicy;
  contract: ColumnContract;
};

export function loadConfig(env: NodeJS.ProcessEnv): Config {
  const cfg: Config = {
    port: parseInt(env.PORT || "8080", 10),
    cronExpr: env.CRON_EXPR || "",
    inboxDir: path.resolve(env.INBOX_DIR || path.join("data", "inbox")),
    outboxDir: path.resolve(env.OUTBOX_DIR || path.join("data", "outbox")),
    concurrency: parseInt(env.INBOX_CONCURRENCY || "2", 10),
    inboxCsv: String(env.INBOX_CSV || "").trim() === "1",
    maxUploadBytes: parseInt(env.MAX_UPLOAD_BYTES || String(20 * 1024 * 1024), 10),
    focusUnitThreshold: Number(env.FOCUS_UNIT_THRESHOLD || "200"),
    focusCumulativeCutoff: Number(env.FOCUS_CUMULATIVE_CUTOFF || "80"),
    zeroTotalPolicy: parsePolicy(env.ZERO_TOTAL_POLICY || "skip"),
    contract: contractSchema.parse({
      skuPos: parseInt(env.SKU_COLUMN || "0", 10),
      quantityPos: parseInt(env.QUANTITY_COLUMN || "4", 10),
      referencePos: parseInt(env.REFERENCE_COLUMN || "6", 10),
      dropPos: parseList(env.DROP_COLUMNS ?? "3")
    })
  };

  if (!Number.isFinite(cfg.focusUnitThreshold) || !Number.isFinite(cfg.focusCumulativeCutoff)) {
    throw new Error("FOCUS_UNIT_THRESHOLD / FOCUS_CUMULATIVE_CUTOFF must be numbers");
  }
  if (!(cfg.concurrency >= 1)) {
    throw new Error("INBOX_CONCURRENCY must be at least 1");
  }
  return cfg;
}

export const cfg = loadConfig(process.env);

export function pipelineOptions(c: Config): PipelineOptions {
  return {
    contract: c.contract,
    focusUnitThreshold: c.focusUnitThreshold,
    focusCumulativeCutoff: c.focusCumulativeCutoff,
    zeroTotalPolicy: c.zeroTotalPolicy
  };
}
