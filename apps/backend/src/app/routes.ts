import type { FastifyInstance } from "fastify";
import { listModels, type LlmClient, type ModelRegistry } from "../llm/index.js";
import * as syllabusPresenter from "../presenters/syllabusPresenter.js";

type RouteDeps = {
  llmClient: LlmClient;
  models: ModelRegistry;
};

// Register HTTP routes and wire them to presenters.
export function registerRoutes(app: FastifyInstance, deps: RouteDeps) {
  app.get("/api/health", async () => ({ ok: true }));

  app.get("/api/models", async () => listModels(deps.models));

  app.get("/api/syllabus/options", async () => syllabusPresenter.getSyllabusOptions());

  app.post("/api/syllabus", async (req, reply) => {
    const res = await syllabusPresenter.generateSyllabus(deps.llmClient, deps.models, req.body, req.log);
    reply.code(res.status);
    return res.body;
  });
}
