import { Router, type Request, type Response, type NextFunction } from "express";
import type { IngestFailureReason, IngestService } from "../lib/ingest";

const STATUS_BY_REASON: Record<IngestFailureReason, number> = {
  empty_name: 404,
  unsupported_kind: 400,
  invalid_value: 400,
  storage_failure: 500,
};

type UpdateTarget = { kind: string; name: string; value: string };

const MALFORMED_ESCAPE_RE = /%(?![0-9a-fA-F]{2})/;
const ESCAPE_SPLIT_RE = /(%[0-9a-fA-F]{2})/;
const ESCAPE_RE = /^%[0-9a-fA-F]{2}$/;

// Decodes escapes to raw bytes; bytes that are not valid UTF-8 read as U+FFFD.
// Only a truncated or non-hex escape is rejected.
function unescapePath(path: string): string | null {
  if (MALFORMED_ESCAPE_RE.test(path)) return null;
  const chunks = path
    .split(ESCAPE_SPLIT_RE)
    .map((part) => (ESCAPE_RE.test(part) ? Buffer.from([parseInt(part.slice(1), 16)]) : Buffer.from(part, "utf8")));
  return Buffer.concat(chunks).toString("utf8");
}

// Expected path below the mount point: /<kind>/<name>/<value>
function decodeUpdatePath(path: string): UpdateTarget | null {
  const decoded = unescapePath(path.replace(/^\//, ""));
  if (decoded === null) return null;
  const parts = decoded.split("/");
  if (parts.length !== 3) return null;
  const [kind = "", name = "", value = ""] = parts;
  return { kind, name, value };
}

export function createUpdateRouter(ingest: IngestService): Router {
  const router = Router();

  router.use(async (req: Request, res: Response, next: NextFunction) => {
    if (req.method !== "POST") {
      res.setHeader("Allow", "POST");
      res.status(405).json({ message: "Method not allowed. Use POST.", code: "METHOD_NOT_ALLOWED" });
      return;
    }

    const target = decodeUpdatePath(req.path);
    if (!target) {
      res.status(400).json({
        message: "Invalid URL format. Expected /update/<kind>/<name>/<value>.",
        code: "BAD_PATH",
      });
      return;
    }

    try {
      const result = await ingest.apply(target.kind, target.name, target.value);
      if (!result.ok) {
        res.status(STATUS_BY_REASON[result.reason]).json({
          message: result.message,
          code: result.reason.toUpperCase(),
        });
        return;
      }
      res.status(200).end();
    } catch (err) {
      next(err);
    }
  });

  return router;
}
