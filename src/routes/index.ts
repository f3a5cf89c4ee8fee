import { Router } from "express";
import type { IngestService } from "../lib/ingest";
import { createUpdateRouter } from "./update";

export function createRoutes(ingest: IngestService): Router {
  const router = Router();

  router.use("/update", createUpdateRouter(ingest));

  router.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  return router;
}
