import fp from "fastify-plugin";
import type { FastifyInstance } from "fastify";
import type {} from "@fastify/rate-limit";

declare module "fastify" {
  interface FastifyInstance {
    rlPerRoute: (max: number) => ReturnType<FastifyInstance["rateLimit"]>;
  }
}

// Per-route limiter: `{ preHandler: [app.rlPerRoute(5)] }` allows five
// requests per client per minute. Requires @fastify/rate-limit registered
// with `global: false`.
export default fp(
  async (app: FastifyInstance) => {
    app.decorate("rlPerRoute", (max: number) =>
      app.rateLimit({ max, timeWindow: "1 minute" })
    );
  },
  { dependencies: ["@fastify/rate-limit"] }
);
