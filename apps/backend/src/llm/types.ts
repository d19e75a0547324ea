// Provider types for Gemini on Vertex AI

import { z } from "zod";

export type ModelKey = "flash" | "pro";

export type ModelHandle = Readonly<{
  key: ModelKey;
  id: string;
  resourceName: string;
}>;

export type ModelRegistry = Readonly<Record<ModelKey, ModelHandle>>;

export type GenerationConfig = Readonly<{
  temperature: number;
  maxOutputTokens?: number;
}>;

export type HarmCategory =
  | "HARM_CATEGORY_HARASSMENT"
  | "HARM_CATEGORY_HATE_SPEECH"
  | "HARM_CATEGORY_SEXUALLY_EXPLICIT"
  | "HARM_CATEGORY_DANGEROUS_CONTENT";

export type HarmBlockThreshold =
  | "BLOCK_LOW_AND_ABOVE"
  | "BLOCK_MEDIUM_AND_ABOVE"
  | "BLOCK_ONLY_HIGH"
  | "BLOCK_NONE";

export type SafetyThresholds = Readonly<Record<HarmCategory, HarmBlockThreshold>>;

export type ContentPart =
  | { text: string }
  | { fileData: { mimeType: string; fileUri: string } };

export type PromptRequest = {
  model: ModelHandle;
  contents: string | ContentPart[];
  config: GenerationConfig;
  safety: SafetyThresholds;
  streaming: boolean;
};

// One generateContent payload; streamed chunks share the same shape.
export const ResponseChunkSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            role: z.string().optional(),
            parts: z.array(z.object({ text: z.string().optional() })).optional()
          })
          .optional(),
        finishReason: z.string().optional()
      })
    )
    .optional(),
  promptFeedback: z.object({ blockReason: z.string().optional() }).optional(),
  usageMetadata: z
    .object({
      promptTokenCount: z.number().optional(),
      candidatesTokenCount: z.number().optional()
    })
    .optional(),
  modelVersion: z.string().optional()
});
export type ResponseChunk = z.infer<typeof ResponseChunkSchema>;

export type ModelResponse =
  | { streaming: false; response: ResponseChunk }
  | { streaming: true; stream: AsyncIterable<ResponseChunk>; cancel?: () => Promise<void> };

export interface LlmClient {
  generate(req: PromptRequest): Promise<ModelResponse>;
}
