import http from "http";
import { createApp } from "./app";
import env from "./config/env";
import logger from "./config/logger";
import { IngestService } from "./lib/ingest";
import { MemStorage } from "./lib/metricStore";

const store = new MemStorage();
const ingest = new IngestService(store);
const app = createApp({ ingest });

const httpServer = http.createServer(app);

httpServer.on("error", (err) => {
  logger.fatal({ err, host: env.HOST, port: env.PORT }, "Failed to start server");
  process.exit(1);
});

httpServer.listen(env.PORT, env.HOST, () => {
  logger.info(`Server listening on http://${env.HOST}:${env.PORT}`);
});

function shutdown(signal: NodeJS.Signals) {
  httpServer.close(() => {
    logger.info(`${signal} received: shutting down gracefully`);
    process.exit(0);
  });
}

process.on("SIGTERM", shutdown);
process.on("SIGINT", shutdown);
