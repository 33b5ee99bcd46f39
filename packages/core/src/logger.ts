/**
 * Structured logging for the research engine
 *
 * Uses pino, the same logger Fastify runs on, so the backend can hand its
 * request logger to the supervisor and both write to one stream.
 */

import pino from "pino";

/**
 * Minimal logger contract accepted by the engine.
 * Satisfied by a pino logger and by Fastify's `app.log`.
 */
export type Logger = pino.BaseLogger & {
  child(bindings: pino.Bindings): Logger;
};

function resolveLevel(): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  // Keep test output readable
  return process.env.VITEST ? "silent" : "info";
}

/**
 * Root engine logger
 */
export const logger: Logger = pino({
  name: "research-engine",
  level: resolveLevel(),
});

/**
 * Create a child logger carrying the given bindings
 */
export function createLogger(
  bindings: pino.Bindings,
  parent: Logger = logger
): Logger {
  return parent.child(bindings);
}
