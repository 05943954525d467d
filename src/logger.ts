import pino from "pino";

/**
 * Root logger. Writes JSON lines to stderr: stdout carries the MCP stdio
 * transport and must stay clean.
 */
export const logger = pino(
  {
    name: "contract-rag",
    level: process.env.LOG_LEVEL?.trim() || "info",
    timestamp: pino.stdTimeFunctions.isoTime,
    base: { pid: process.pid },
  },
  pino.destination(2),
);

export type Logger = pino.Logger;

/** Child logger tagged with the emitting component. */
export function componentLogger(component: string): Logger {
  return logger.child({ component });
}
