import fp from "fastify-plugin";
import {
  createResearchSupervisor,
  type ResearchRunner,
} from "@company-research/core";

declare module "fastify" {
  interface FastifyInstance {
    research: ResearchRunner;
  }
}

export interface ResearchPluginOptions {
  supervisor?: ResearchRunner; // Injected in tests; built from env otherwise
}

// Decorates the app with the research supervisor shared by every request.
export default fp<ResearchPluginOptions>(async (app, opts) => {
  if (opts.supervisor) {
    app.decorate("research", opts.supervisor);
    return;
  }

  const braveKey = process.env.BRAVE_SEARCH_API_KEY;
  if (!braveKey) {
    throw new Error("Missing required API keys BRAVE_SEARCH_API_KEY");
  }

  const openaiKey = process.env.OPENAI_API_KEY;
  if (!openaiKey) {
    app.log.warn("OPENAI_API_KEY not set, using template planning and markdown reports");
  }

  app.decorate(
    "research",
    createResearchSupervisor({
      braveApiKey: braveKey,
      openaiApiKey: openaiKey,
      logger: app.log,
    })
  );
});
