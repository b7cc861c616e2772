import pino from "pino";

const pretty =
  process.env.NODE_ENV !== "production" && process.env.NODE_ENV !== "test"
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname"
        }
      }
    : undefined;

export const logger = pino(
  {
    level: process.env.LOG_LEVEL ?? "info"
  },
  pretty ? pino.transport(pretty) : undefined
);
