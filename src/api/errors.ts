import type { NextFunction, Request, Response } from "express";
import multer from "multer";
import type { Logger } from "pino";
import { ZodError } from "zod";
import type { FieldError } from "../types/contracts.js";

export class HttpError extends Error {
  constructor(
    public readonly status: number,
    message: string
  ) {
    super(message);
    this.name = "HttpError";
  }
}

export function zodDetails(err: ZodError): Array<FieldError & { type: string }> {
  return err.issues.map((i) => ({
    field: i.path.length ? i.path.join(".") : "body",
    message: i.message,
    type: i.code
  }));
}

/** Maps a failed service result onto its status code and body. */
export function sendFailure(
  res: Response,
  out: { error: "not_found" } | { error: "validation_failed"; details: FieldError[] },
  resource: string
): void {
  if (out.error === "not_found") {
    res.status(404).json({ error: `${resource} not found` });
    return;
  }
  res.status(400).json({ error: "Validation failed", details: out.details });
}

// body-parser tags its errors with a `type` such as entity.parse.failed
function bodyParserType(err: unknown): string | undefined {
  if (!(err instanceof Error) || !("type" in err)) return undefined;
  return typeof err.type === "string" ? err.type : undefined;
}

export function notFound(_req: Request, res: Response): void {
  res.status(404).json({ error: "Not found" });
}

export function errorHandler(log: Logger) {
  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    if (err instanceof ZodError) {
      res.status(422).json({ error: "Validation failed", details: zodDetails(err) });
      return;
    }

    if (err instanceof HttpError) {
      res.status(err.status).json({ error: err.message });
      return;
    }

    if (err instanceof multer.MulterError) {
      res.status(400).json({ error: err.message });
      return;
    }

    const parseType = bodyParserType(err);
    if (parseType === "entity.parse.failed") {
      res.status(422).json({
        error: "Validation failed",
        details: [{ field: "body", message: "Malformed JSON body", type: "json_invalid" }]
      });
      return;
    }
    if (parseType === "entity.too.large") {
      res.status(413).json({ error: "Request body too large" });
      return;
    }

    log.error({ err, method: req.method, path: req.path }, "http: unhandled error");
    res.status(500).json({ error: "Internal server error" });
  };
}
