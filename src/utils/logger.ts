import pino from "pino";

// stdout 留给 CLI 输出，日志统一写 stderr
export const logger = pino(
  {
    level: process.env.LOG_LEVEL || "info",
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.destination(2)
);
