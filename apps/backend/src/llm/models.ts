import type {
  GenerationConfig,
  ModelHandle,
  ModelKey,
  ModelRegistry,
  SafetyThresholds
} from "./types.js";

const MODEL_PATH_PREFIX = "publishers/google/models/";

export const MODEL_IDS: Readonly<Record<ModelKey, string>> = {
  flash: "gemini-1.5-flash",
  pro: "gemini-1.5-pro"
};

export const DEFAULT_GENERATION_CONFIG: GenerationConfig = Object.freeze({
  temperature: 0.1,
  maxOutputTokens: 2048
});

export const SAFETY_THRESHOLDS: SafetyThresholds = Object.freeze({
  HARM_CATEGORY_HARASSMENT: "BLOCK_ONLY_HIGH",
  HARM_CATEGORY_HATE_SPEECH: "BLOCK_ONLY_HIGH",
  HARM_CATEGORY_SEXUALLY_EXPLICIT: "BLOCK_ONLY_HIGH",
  HARM_CATEGORY_DANGEROUS_CONTENT: "BLOCK_ONLY_HIGH"
});

function createHandle(key: ModelKey): ModelHandle {
  const id = MODEL_IDS[key];
  return Object.freeze({ key, id, resourceName: `${MODEL_PATH_PREFIX}${id}` });
}

// Build the model handles once at startup; callers pass the registry down.
export function loadModels(): ModelRegistry {
  return Object.freeze({
    flash: createHandle("flash"),
    pro: createHandle("pro")
  });
}

// Display label for a model, e.g. `gemini-1.5-pro`.
export function getModelName(model: Pick<ModelHandle, "resourceName">): string {
  const name = model.resourceName.startsWith(MODEL_PATH_PREFIX)
    ? model.resourceName.slice(MODEL_PATH_PREFIX.length)
    : model.resourceName;
  return `\`${name}\``;
}

export function listModels(registry: ModelRegistry): Array<{ key: ModelKey; label: string }> {
  return [registry.flash, registry.pro].map((model) => ({
    key: model.key,
    label: getModelName(model)
  }));
}
