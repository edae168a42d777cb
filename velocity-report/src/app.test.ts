import { Server } from "http";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { decodeWorkbook, encodeWorkbook } from "./workbook";

const COLUMNS = ["Item", "Description", "Vendor", "Unit Cost", "Qty Sold", "Sales", "Net Units"];

let server: Server;
let base = "";

beforeAll(async () => {
  server = createApp(loadConfig({})).listen(0, "127.0.0.1");
  await new Promise<void>(resolve => server.once("listening", () => resolve()));
  const addr = server.address();
  if (addr === null || typeof addr === "string") throw new Error("no port");
  base = `http://127.0.0.1:${addr.port}`;
});

afterAll(async () => {
  await new Promise<void>(resolve => server.close(() => resolve()));
});

async function upload(format?: string, data?: Uint8Array) {
  const form = new FormData();
  if (data) form.append("file", new Blob([new Uint8Array(data)]), "sales.xlsx");
  else form.append("note", "no file");
  const qs = format ? `?format=${format}` : "";
  return fetch(`${base}/process${qs}`, { method: "POST", body: form });
}

async function salesExport() {
  const rows = [
    ["A", "alpha", "v", 1, 10, 0, 5],
    ["B", "beta", "v", 1, 30, 0, 15],
    ["A", "alpha", "v", 1, 10, 0, 5]
  ].map(l => Object.fromEntries(COLUMNS.map((c, i) => [c, l[i]])));
  return (await encodeWorkbook({ columns: COLUMNS, rows })).data;
}

describe("POST /process", () => {
  it("answers health checks", async () => {
    const res = await fetch(`${base}/health`);
    expect(await res.json()).toEqual({ ok: true });
  });

  it("returns the report as JSON by default", async () => {
    const res = await upload(undefined, await salesExport());
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      summary: { totalSkus: 2, totalQuantity: 50, focusSkuCount: 2 },
      warnings: [],
      columns: ["Item", "Description", "Vendor", "Sales", "Net Units", "TotalQuantityValues", "Velocity", "CumulativePercentage", "FocusSKU"]
    });
  });

  it("returns a workbook when asked for xlsx", async () => {
    const res = await upload("xlsx", await salesExport());
    expect(res.status).toBe(200);
    expect(res.headers.get("content-disposition")).toBe('attachment; filename="cleaned_data.xlsx"');
    expect(res.headers.get("x-pipeline-warnings")).toBe("0");
    const table = await decodeWorkbook(new Uint8Array(await res.arrayBuffer()));
    expect(table.rows.map(r => r.Item)).toEqual(["B", "A"]);
  });

  it("returns CSV when asked", async () => {
    const res = await upload("csv", await salesExport());
    const lines = (await res.text()).split("\n");
    expect(lines[0]).toBe("Item,Description,Vendor,Sales,Net Units,TotalQuantityValues,Velocity,CumulativePercentage,FocusSKU");
    expect(lines).toHaveLength(3);
  });

  it("rejects an unknown format", async () => {
    const res = await upload("pdf", await salesExport());
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: "invalid query" });
  });

  it("requires a file", async () => {
    const res = await upload();
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: "file is required" });
  });

  it("reports unreadable uploads as 422", async () => {
    const res = await upload("json", new TextEncoder().encode("not a workbook"));
    expect(res.status).toBe(422);
    expect(await res.json()).toMatchObject({ error: "decode_failed" });
  });
});
