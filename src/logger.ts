import pino from "pino";

// stdout carries the MCP stdio transport, so every log line goes to stderr.
export const logger = pino(
  {
    name: "account-lockdown",
    level: process.env.LOG_LEVEL ?? "info",
  },
  pino.destination(2),
);
