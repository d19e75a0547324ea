import { ResponseBlockedError, ResponseShapeError } from "./errors.js";
import type { ModelResponse, PromptRequest, ResponseChunk } from "./types.js";

export type ChunkText =
  | { ok: true; text: string }
  | { ok: false; reason: "no_candidates" | "no_parts" | "no_text" };

// Read the text payload of the first candidate, joining all of its text parts.
export function readChunkText(chunk: ResponseChunk): ChunkText {
  const candidate = chunk.candidates?.[0];
  if (!candidate) return { ok: false, reason: "no_candidates" };

  const parts = candidate.content?.parts;
  if (!parts || parts.length === 0) return { ok: false, reason: "no_parts" };

  const texts = parts.flatMap((part) => (typeof part.text === "string" ? [part.text] : []));
  if (texts.length === 0) return { ok: false, reason: "no_text" };

  return { ok: true, text: texts.join("") };
}

function blockReason(chunk: ResponseChunk): string | undefined {
  return chunk.promptFeedback?.blockReason ?? chunk.candidates?.[0]?.finishReason;
}

// Collapse a provider response into one string; a streamed chunk without text counts as "".
export async function assemble(request: PromptRequest, response: ModelResponse): Promise<string> {
  if (request.streaming !== response.streaming) {
    if (response.streaming) await response.cancel?.();
    throw new ResponseShapeError(request.streaming);
  }

  if (!response.streaming) {
    const result = readChunkText(response.response);
    if (!result.ok) throw new ResponseBlockedError(blockReason(response.response));
    return result.text;
  }

  const pieces: string[] = [];
  for await (const chunk of response.stream) {
    const result = readChunkText(chunk);
    pieces.push(result.ok ? result.text : "");
  }
  return pieces.join(" ");
}
