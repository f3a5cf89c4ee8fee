import express from "express";
import helmet from "helmet";
import type { IngestService } from "./lib/ingest";
import { createRoutes } from "./routes";
import { requestIdMiddleware } from "./middlewares/requestId";
import { httpLoggerMiddleware } from "./middlewares/httpLogger";
import { errorHandler, notFoundHandler } from "./middlewares/errorHandler";

export type AppDeps = {
  ingest: IngestService;
};

export function createApp({ ingest }: AppDeps) {
  const app = express();

  app.disable("x-powered-by");
  // Update responses carry no cacheable payload.
  app.set("etag", false);

  // request_id baseline: attach id early, always return it in headers
  app.use(requestIdMiddleware);
  // structured baseline logs
  app.use(httpLoggerMiddleware);
  app.use(helmet());

  app.use(createRoutes(ingest));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
