import Fastify from "fastify";
import { registerRoutes } from "./routes.js";
import { loadConfig, type AppConfig } from "./config.js";
import { createLlmClient, loadModels, type LlmClient } from "../llm/index.js";

type ServerOptions = {
  config?: AppConfig;
  llmClient?: LlmClient;
  logger?: boolean;
};

// Build the Fastify app and register routes.
export function buildServer(options: ServerOptions = {}) {
  const config = options.config ?? loadConfig();
  const app = Fastify({
    logger: options.logger === false ? false : { level: config.logLevel }
  });

  const models = loadModels();
  const llmClient =
    options.llmClient ??
    createLlmClient({
      provider: "vertex",
      project: config.gcp.project,
      region: config.gcp.region,
      accessToken: config.gcp.accessToken,
      baseUrl: config.gcp.baseUrl
    });

  app.setErrorHandler((error, req, reply) => {
    // Client errors raised by Fastify itself (bad JSON, media type, body size).
    const status = error.statusCode ?? 500;
    if (status >= 400 && status < 500) {
      reply.code(status).send({ error: error.code ?? "bad_request" });
      return;
    }
    req.log.error({ err: error }, "request_failed");
    reply.code(500).send({ error: "internal_error" });
  });

  registerRoutes(app, { llmClient, models });

  return app;
}

// Start the HTTP server on the configured port.
export async function startServer() {
  const config = loadConfig();
  const app = buildServer({ config });
  await app.listen({ port: config.port, host: config.host });
}
