import type { FastifyBaseLogger } from "fastify";
import {
  ProviderError,
  ResponseBlockedError,
  SAFETY_THRESHOLDS,
  assemble,
  getModelName
} from "../llm/index.js";
import type { ContentPart, GenerationConfig, LlmClient, ModelRegistry, PromptRequest } from "../llm/index.js";
import { MalformedStorageUriError, getStorageUrl } from "../services/storageUrlService.js";
import { SYLLABUS_OPTIONS, buildSyllabusPrompt } from "../services/syllabusPromptService.js";
import { SyllabusFormSchema, type SyllabusResult } from "../types.js";

// Syllabi favour variety over determinism; no output cap.
export const SYLLABUS_GENERATION_CONFIG: GenerationConfig = Object.freeze({ temperature: 0.95 });

type PresenterResult = { status: number; body: SyllabusResult | { error: string } };

export function getSyllabusOptions() {
  return SYLLABUS_OPTIONS;
}

// Validate the questionnaire, ask the model for a syllabus and assemble the answer.
export async function generateSyllabus(
  llmClient: LlmClient,
  models: ModelRegistry,
  body: unknown,
  log: FastifyBaseLogger
): Promise<PresenterResult> {
  const parsed = SyllabusFormSchema.safeParse(body);
  if (!parsed.success) {
    return { status: 400, body: { error: "invalid_request" } };
  }
  const form = parsed.data;

  let references: SyllabusResult["references"];
  try {
    references = form.references.map((ref) => ({ uri: ref.uri, url: getStorageUrl(ref.uri) }));
  } catch (err) {
    if (err instanceof MalformedStorageUriError) {
      return { status: 400, body: { error: "malformed_storage_uri" } };
    }
    throw err;
  }

  const prompt = buildSyllabusPrompt(form);
  const contents: string | ContentPart[] =
    form.references.length === 0
      ? prompt
      : [
          { text: prompt },
          ...form.references.map((ref) => ({ fileData: { mimeType: ref.mimeType, fileUri: ref.uri } }))
        ];

  const model = models[form.model];
  const request: PromptRequest = {
    model,
    contents,
    config: SYLLABUS_GENERATION_CONFIG,
    safety: SAFETY_THRESHOLDS,
    streaming: form.stream
  };

  log.info({ model: model.id, streaming: request.streaming, references: references.length }, "syllabus_requested");

  try {
    const response = await llmClient.generate(request);
    const syllabus = await assemble(request, response);

    return {
      status: 200,
      body: {
        syllabus,
        prompt,
        model: getModelName(model),
        parameters: { ...request.config },
        references
      }
    };
  } catch (err) {
    if (err instanceof ResponseBlockedError) {
      log.warn({ model: model.id, reason: err.reason }, "syllabus_blocked");
      return { status: 422, body: { error: "response_blocked" } };
    }
    if (err instanceof ProviderError) {
      log.error({ model: model.id, status: err.status }, err.message);
      return { status: 502, body: { error: err.message } };
    }
    throw err;
  }
}
