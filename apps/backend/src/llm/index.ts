// LLM module: Vertex AI Gemini client and response assembly

import type { LlmClient } from "./types.js";
import { createVertexClient } from "./vertexClient.js";

export type {
  ContentPart,
  GenerationConfig,
  LlmClient,
  ModelHandle,
  ModelKey,
  ModelRegistry,
  ModelResponse,
  PromptRequest,
  ResponseChunk,
  SafetyThresholds
} from "./types.js";
export { assemble, readChunkText } from "./assembler.js";
export { ProviderError, ResponseBlockedError, ResponseShapeError } from "./errors.js";
export {
  DEFAULT_GENERATION_CONFIG,
  SAFETY_THRESHOLDS,
  getModelName,
  listModels,
  loadModels
} from "./models.js";

export type LlmConfig = {
  provider: "vertex";
  project: string;
  region: string;
  accessToken?: string;
  baseUrl?: string;
};

// Create an LLM client based on config
export function createLlmClient(config: LlmConfig): LlmClient {
  return createVertexClient({
    project: config.project,
    region: config.region,
    accessToken: config.accessToken,
    baseUrl: config.baseUrl
  });
}
