import Fastify, { type FastifyServerOptions } from "fastify";
import fastifyCors from "@fastify/cors";
import fastifyRateLimit from "@fastify/rate-limit";
import type { ResearchRunner } from "@company-research/core";
import errors from "./plugins/errors";
import rl from "./plugins/rate-limit";
import research from "./plugins/research";
import researchRoutes from "./routes/research";

export interface BuildAppOptions {
  supervisor?: ResearchRunner;
  logger?: FastifyServerOptions["logger"];
}

// Structured logging with request context bodies redacted: job descriptions
// can carry personal details.
function defaultLogger(): FastifyServerOptions["logger"] {
  return {
    level: process.env.LOG_LEVEL || "info",
    redact: {
      paths: ["body.context", "req.body.context"],
      censor: "[REDACTED]",
    },
  };
}

export async function buildApp(options: BuildAppOptions = {}) {
  const app = Fastify({
    logger: options.logger ?? defaultLogger(),
    bodyLimit: 1048576,
  });

  await app.register(fastifyCors, {
    origin: true,
    allowedHeaders: ["Content-Type", "Accept", "Origin", "X-Requested-With"],
    methods: ["GET", "POST", "OPTIONS"],
  });

  // Registration order matters: errors first for consistent error shaping
  await app.register(errors);
  await app.register(fastifyRateLimit, { global: false });
  await app.register(rl);
  await app.register(research, { supervisor: options.supervisor });

  await app.register(researchRoutes, { prefix: "/api/v1/research" });

  app.get("/healthz", async (_req, rep) => {
    return rep.send({ ok: true });
  });

  return app;
}
