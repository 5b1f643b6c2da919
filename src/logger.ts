import pino from "pino";

// stdout carries MCP traffic; logs always go to stderr.
export const logger = pino(
  {
    name: "python-packages",
    level: process.env.LOG_LEVEL ?? "info",
  },
  pino.destination(2),
);
