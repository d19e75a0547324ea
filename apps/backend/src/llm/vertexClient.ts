import { z } from "zod";
import { ProviderError } from "./errors.js";
import { ResponseChunkSchema } from "./types.js";
import type { ContentPart, LlmClient, ModelResponse, PromptRequest, ResponseChunk } from "./types.js";

const API_VERSION = "v1";

const ErrorBodySchema = z.object({
  error: z.object({ code: z.number().optional(), message: z.string() })
});

export type VertexClientOptions = {
  project: string;
  region: string;
  accessToken?: string;
  baseUrl?: string;
};

// Build a Vertex generateContent payload from a prompt request.
export function buildVertexPayload(req: PromptRequest) {
  const parts: ContentPart[] =
    typeof req.contents === "string" ? [{ text: req.contents }] : req.contents;

  const generationConfig: Record<string, number> = { temperature: req.config.temperature };
  if (req.config.maxOutputTokens !== undefined) {
    generationConfig.maxOutputTokens = req.config.maxOutputTokens;
  }

  return {
    contents: [{ role: "user", parts }],
    generationConfig,
    safetySettings: Object.entries(req.safety).map(([category, threshold]) => ({
      category,
      threshold
    }))
  };
}

// Anything that is not a generateContent payload becomes an empty chunk.
function toChunk(data: unknown): ResponseChunk {
  const parsed = ResponseChunkSchema.safeParse(data);
  return parsed.success ? parsed.data : {};
}

function parseJson(data: string): unknown {
  try {
    return JSON.parse(data);
  } catch {
    return undefined;
  }
}

// An error event ends the stream; anything else is a (possibly empty) chunk.
function parseEvent(data: string): ResponseChunk {
  const parsed = parseJson(data);
  const error = ErrorBodySchema.safeParse(parsed);
  if (error.success) throw new ProviderError(error.data.error.message, error.data.error.code);
  return toChunk(parsed);
}

// Turn a text/event-stream body into one chunk per `data:` line.
export async function* readSseChunks(body: ReadableStream<Uint8Array>): AsyncGenerator<ResponseChunk> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = "";
  let finished = false;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        finished = true;
        break;
      }

      buffer += decoder.decode(value, { stream: true });
      const lines = buffer.split(/\r?\n/);
      buffer = lines.pop() ?? "";

      for (const line of lines) {
        if (line.startsWith("data:")) yield parseEvent(line.slice(5).trim());
      }
    }

    buffer += decoder.decode();
    if (buffer.startsWith("data:")) yield parseEvent(buffer.slice(5).trim());
  } finally {
    // Stopped early: close the HTTP body.
    if (!finished) await reader.cancel();
    reader.releaseLock();
  }
}

async function readErrorMessage(response: Response): Promise<string> {
  const data: unknown = await response.json().catch(() => ({}));
  const parsed = ErrorBodySchema.safeParse(data);
  return parsed.success ? parsed.data.error.message : `vertex_error_${response.status}`;
}

// Create an LLM client that calls Vertex AI's generateContent endpoints.
export function createVertexClient(options: VertexClientOptions): LlmClient {
  const baseUrl = options.baseUrl ?? `https://${options.region}-aiplatform.googleapis.com`;

  return {
    async generate(req: PromptRequest): Promise<ModelResponse> {
      const method = req.streaming ? "streamGenerateContent?alt=sse" : "generateContent";
      const url =
        `${baseUrl}/${API_VERSION}/projects/${encodeURIComponent(options.project)}` +
        `/locations/${encodeURIComponent(options.region)}/${req.model.resourceName}:${method}`;

      const headers: Record<string, string> = { "Content-Type": "application/json" };
      if (options.accessToken) headers.Authorization = `Bearer ${options.accessToken}`;

      const response = await fetch(url, {
        method: "POST",
        headers,
        body: JSON.stringify(buildVertexPayload(req))
      });

      if (!response.ok) {
        throw new ProviderError(await readErrorMessage(response), response.status);
      }

      if (!req.streaming) {
        const data: unknown = await response.json();
        return { streaming: false, response: toChunk(data) };
      }

      if (!response.body) throw new ProviderError("vertex_empty_stream", response.status);
      const body = response.body;
      return { streaming: true, stream: readSseChunks(body), cancel: () => body.cancel() };
    }
  };
}
