import { DEFAULT_GENERATION_CONFIG, SAFETY_THRESHOLDS, loadModels } from "../../src/llm/index.js";
import type { LlmClient, ModelResponse, PromptRequest, ResponseChunk } from "../../src/llm/index.js";

export const models = loadModels();

export function textChunk(...texts: string[]): ResponseChunk {
  return { candidates: [{ content: { role: "model", parts: texts.map((text) => ({ text })) } }] };
}

export async function* streamOf(chunks: ResponseChunk[]): AsyncGenerator<ResponseChunk> {
  for (const chunk of chunks) yield chunk;
}

export function promptRequest(streaming: boolean): PromptRequest {
  return {
    model: models.flash,
    contents: "Write a syllabus",
    config: DEFAULT_GENERATION_CONFIG,
    safety: SAFETY_THRESHOLDS,
    streaming
  };
}

// In-process stand-in for the Vertex client that records every request.
export function fakeLlmClient(respond: (req: PromptRequest) => ModelResponse | Promise<ModelResponse>) {
  const requests: PromptRequest[] = [];
  const client: LlmClient = {
    async generate(req) {
      requests.push(req);
      return respond(req);
    }
  };
  return { client, requests };
}
