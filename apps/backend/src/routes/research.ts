import type { FastifyPluginAsync } from "fastify";
import {
  InvalidRequestError,
  MAX_CONTEXT_LENGTH,
  MAX_ROLE_TITLE_LENGTH,
  MAX_SUBJECT_LENGTH,
  type NewResearchRequest,
} from "@company-research/core";

const researchBodySchema = {
  type: "object",
  required: ["subject"],
  additionalProperties: false,
  properties: {
    subject: { type: "string", minLength: 1, maxLength: MAX_SUBJECT_LENGTH },
    roleTitle: { type: ["string", "null"], maxLength: MAX_ROLE_TITLE_LENGTH },
    context: { type: ["string", "null"], maxLength: MAX_CONTEXT_LENGTH },
  },
} as const;

// Research routes: one synchronous research run per POST. The run is
// bounded by the supervisor deadline, so the request is too.
const routes: FastifyPluginAsync = async (app) => {
  const research = app.research;

  app.get("/healthz", async (_req, rep) => {
    return rep.send({ ok: true });
  });

  app.post<{ Body: NewResearchRequest }>(
    "/",
    {
      schema: { body: researchBodySchema },
      preHandler: [app.rlPerRoute(5)],
    },
    async (req, rep) => {
      const startedAt = Date.now();
      try {
        const outcome = await research.run(req.body);
        req.log.info(
          {
            subject: outcome.report.request.subject,
            statuses: outcome.statuses,
            invocations: outcome.invocations,
          },
          "Research completed"
        );

        return rep.status(200).send({
          success: true,
          data: {
            report: outcome.report,
            statuses: outcome.statuses,
          },
          processingTimeMs: Date.now() - startedAt,
        });
      } catch (err) {
        if (err instanceof InvalidRequestError) {
          return rep.status(400).send({
            error: { code: "invalid_request", message: err.message },
          });
        }
        const isDev = process.env.NODE_ENV !== "production";
        const detail = err instanceof Error ? err.message : String(err);
        req.log.error({ detail }, "/research failed");
        return rep.status(500).send({
          error: {
            code: "internal_error",
            message: "Research failed",
            ...(isDev ? { detail } : {}),
          },
        });
      }
    }
  );
};

export default routes;
