import path from "path";
import { describe, expect, it } from "vitest";
import { loadConfig } from "./config";
import { DEFAULT_CONTRACT } from "./contract";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    const c = loadConfig({});
    expect(c).toEqual({
      port: 8080,
      cronExpr: "",
      inboxDir: path.resolve("data", "inbox"),
      outboxDir: path.resolve("data", "outbox"),
      concurrency: 2,
      inboxCsv: false,
      maxUploadBytes: 20 * 1024 * 1024,
      focusUnitThreshold: 200,
      focusCumulativeCutoff: 80,
      zeroTotalPolicy: "skip",
      contract: DEFAULT_CONTRACT
    });
  });

  it("reads the column contract from the environment", () => {
    const c = loadConfig({ QUANTITY_COLUMN: "2", REFERENCE_COLUMN: "3", DROP_COLUMNS: "" });
    expect(c.contract).toEqual({ skuPos: 0, quantityPos: 2, referencePos: 3, dropPos: [] });
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ ZERO_TOTAL_POLICY: "maybe" })).toThrow(/ZERO_TOTAL_POLICY/);
    expect(() => loadConfig({ REFERENCE_COLUMN: "3" })).toThrow();
    expect(() => loadConfig({ SKU_COLUMN: "x" })).toThrow();
    expect(() => loadConfig({ INBOX_CONCURRENCY: "0" })).toThrow(/INBOX_CONCURRENCY/);
  });
});
