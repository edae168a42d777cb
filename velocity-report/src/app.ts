import cors from "cors";
import express, { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from "express";
import multer from "multer";
import { ZodError, z } from "zod";
import { Config, cfg, pipelineOptions } from "./config";
import { toCSV } from "./csv";
import { DecodeError, HttpError, InvalidTableError, badRequest } from "./errors";
import { runPipeline } from "./pipeline";
import { XLSX_MIME, decodeWorkbook, encodeWorkbook } from "./workbook";

type AsyncRequestHandler = (req: Request, res: Response, next: NextFunction) => Promise<unknown>;

function asyncHandler(fn: AsyncRequestHandler): RequestHandler {
  return (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

const querySchema = z.object({
  format: z.enum(["json", "csv", "xlsx"]).default("json")
});

export const errorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
  if (err instanceof ZodError) {
    return res.status(400).json({ error: "validation_failed", issues: err.issues });
  }
  if (err instanceof multer.MulterError) {
    const status = err.code === "LIMIT_FILE_SIZE" ? 413 : 400;
    return res.status(status).json({ error: "upload_failed", message: err.message });
  }
  if (err instanceof HttpError) {
    return res.status(err.statusCode).json({ error: err.message, details: err.details });
  }
  if (err instanceof DecodeError) {
    return res.status(422).json({ error: "decode_failed", message: err.message });
  }
  if (err instanceof InvalidTableError) {
    return res.status(422).json({ error: "invalid_table", message: err.message });
  }
  console.error("[api]", err);
  return res.status(500).json({ error: err instanceof Error ? err.message : "process_failed" });
};

export function createApp(c: Config = cfg) {
  const app = express();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { files: 1, fileSize: c.maxUploadBytes }
  });

  app.use(cors());
  app.use(express.json());
  // request log
  app.use((req, _res, next) => { console.log(req.method, req.url); next(); });

  app.get("/health", (_req, res) => res.json({ ok: true }));

  // one .xlsx upload per request; ?format=json|csv|xlsx
  app.post("/process", upload.single("file"), asyncHandler(async (req, res) => {
    const q = querySchema.safeParse(req.query);
    if (!q.success) throw badRequest("invalid query", q.error.flatten());
    if (!req.file) throw badRequest("file is required");

    const table = await decodeWorkbook(req.file.buffer);
    const out = runPipeline(table, pipelineOptions(c));
    for (const w of out.warnings) console.log(`[api] warning (${w.code}/${w.stage}): ${w.message}`);

    if (q.data.format === "csv") {
      res.setHeader("Content-Disposition", 'attachment; filename="cleaned_data.csv"');
      res.type("text/csv").send(toCSV(out.table));
      return;
    }
    if (q.data.format === "xlsx") {
      const { data, warnings } = await encodeWorkbook(out.table);
      for (const w of warnings) console.log(`[api] warning (${w.code}/${w.stage}): ${w.message}`);
      res.setHeader("Content-Disposition", 'attachment; filename="cleaned_data.xlsx"');
      res.setHeader("X-Pipeline-Warnings", String(out.warnings.length + warnings.length));
      res.type(XLSX_MIME).send(data);
      return;
    }
    res.json({ summary: out.summary, warnings: out.warnings, columns: out.table.columns, rows: out.table.rows });
  }));

  app.use(errorHandler);
  return app;
}
