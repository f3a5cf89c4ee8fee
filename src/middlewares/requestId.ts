import crypto from "node:crypto";
import type { Request, Response, NextFunction } from "express";
import { z } from "zod";

// Only short token-like ids are honoured; anything else gets a fresh UUID.
const incomingRequestIdSchema = z
  .string()
  .trim()
  .min(1)
  .max(128)
  .regex(/^[\w.:-]+$/);

export function requestIdMiddleware(req: Request, res: Response, next: NextFunction) {
  const incoming = incomingRequestIdSchema.safeParse(req.get("x-request-id"));
  const id = incoming.success ? incoming.data : crypto.randomUUID();
  req.requestId = id;
  res.setHeader("x-request-id", id);
  next();
}
