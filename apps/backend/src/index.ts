import "dotenv/config";
import { buildApp } from "./app";

const app = await buildApp();

const port = Number(process.env.PORT || 8080);

// Startup log to aid operational visibility
app.log.info(
  {
    env: process.env.NODE_ENV || "development",
    port,
    llm: Boolean(process.env.OPENAI_API_KEY),
  },
  "Starting research API server"
);

try {
  await app.listen({ host: "0.0.0.0", port });
} catch (err) {
  app.log.error(err, "Failed to start server");
  process.exit(1);
}
