import pino from "pino";
import env from "./env";

const logger = pino({
  level: env.NODE_ENV === "test" ? "silent" : env.LOG_LEVEL,
  base: { service: "metrics-ingest" },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export default logger;
