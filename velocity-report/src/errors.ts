export type WarningCode = "schema" | "arithmetic" | "coercion" | "format";
export type PipelineStage =
  | "resolve"
  | "aggregate"
  | "clean"
  | "dedupe"
  | "velocity"
  | "rank"
  | "focus"
  | "export";

export type PipelineWarning = { code: WarningCode; stage: PipelineStage; message: string };

export function warning(code: WarningCode, stage: PipelineStage, message: string): PipelineWarning {
  return { code, stage, message };
}

/** The table itself cannot be processed (no columns, duplicate names, no SKU column) */
export class InvalidTableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidTableError";
  }
}

/** The uploaded file could not be read as a spreadsheet */
export class DecodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DecodeError";
  }
}

export class HttpError extends Error {
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(statusCode: number, message: string, details?: unknown) {
    super(message);
    this.statusCode = statusCode;
    this.details = details;
  }
}

export function badRequest(message: string, details?: unknown): HttpError {
  return new HttpError(400, message, details);
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
