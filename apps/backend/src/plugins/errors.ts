import fp from "fastify-plugin";
import type { FastifyError, FastifyInstance } from "fastify";
import { InvalidRequestError } from "@company-research/core";

// Shapes every uncaught error as `{ error: { code, message, detail? } }`.
// `detail` is only sent outside production.
export default fp(async (app: FastifyInstance) => {
  app.setErrorHandler((err: FastifyError, req, rep) => {
    const isDev = process.env.NODE_ENV !== "production";

    if (err.validation || err instanceof InvalidRequestError) {
      return rep.status(400).send({
        error: { code: "invalid_request", message: err.message },
      });
    }

    if (err.statusCode === 429) {
      return rep.status(429).send({
        error: { code: "rate_limited", message: err.message },
      });
    }

    const status =
      err.statusCode && err.statusCode >= 400 && err.statusCode < 500
        ? err.statusCode
        : 500;
    if (status >= 500) {
      req.log.error({ detail: err.message }, `${req.method} ${req.url} failed`);
    }

    return rep.status(status).send({
      error: {
        code: status >= 500 ? "internal_error" : "request_error",
        message: status >= 500 ? "Internal server error" : err.message,
        ...(isDev && status >= 500 ? { detail: err.message } : {}),
      },
    });
  });

  app.setNotFoundHandler((req, rep) => {
    return rep.status(404).send({
      error: { code: "not_found", message: `Route ${req.method} ${req.url} not found` },
    });
  });
});
