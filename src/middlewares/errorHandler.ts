import type { Request, Response, NextFunction } from "express";
import logger from "../config/logger";

export function notFoundHandler(_req: Request, res: Response) {
  res.status(404).json({ message: "Not Found", code: "NOT_FOUND" });
}

// Express recognises error middleware by its four-argument signature.
export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction) {
  logger.error({ err, request_id: req.requestId, method: req.method, path: req.originalUrl }, "unhandled_error");
  if (res.headersSent) {
    next(err);
    return;
  }
  res.status(500).json({
    message: "Internal Server Error",
    code: "INTERNAL_SERVER_ERROR",
    requestId: req.requestId,
  });
}
