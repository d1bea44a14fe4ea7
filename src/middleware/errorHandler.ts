import type { NextFunction, Request, Response } from "express";
import { AppError } from "../utils/errors";
import { logError } from "../utils/logger";

function statusOf(err: unknown): number {
  if (err instanceof AppError) return err.status;
  // body-parser marks its errors with a client status
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return 500;
}

export function notFound(_req: Request, res: Response) {
  res.status(404).json({ detail: "Not Found" });
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  const status = statusOf(err);
  const message = err instanceof Error ? err.message : "";

  logError("request_error", {
    route: req.originalUrl,
    status,
    code: err instanceof AppError ? err.code : undefined,
    errorMessage: message,
    errorStack: err instanceof Error ? err.stack : undefined,
  });

  res.status(status).json({
    detail: status < 500 || err instanceof AppError ? message || "Request failed" : "Internal server error",
  });
}
