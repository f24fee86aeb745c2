import type { CompletionClient } from "./types";
import { DEFAULT_MODEL_ID, GeminiCompletionClient, getGeminiApiKey } from "./gemini";

const VALID_PROVIDERS = ["gemini"] as const;
type ProviderName = (typeof VALID_PROVIDERS)[number];

function isProviderName(value: string): value is ProviderName {
  return (VALID_PROVIDERS as readonly string[]).includes(value);
}

export function getProviderName(env: NodeJS.ProcessEnv = process.env): ProviderName {
  const raw = env.LLM_PROVIDER?.toLowerCase().trim() || "gemini";
  if (isProviderName(raw)) {
    return raw;
  }
  throw new Error(
    `Invalid LLM_PROVIDER="${raw}". Must be one of: ${VALID_PROVIDERS.join(", ")}`
  );
}

/** Builds the completion client once at startup; callers inject it. */
export function createCompletionClient(env: NodeJS.ProcessEnv = process.env): CompletionClient {
  const provider = getProviderName(env);
  switch (provider) {
    case "gemini":
      return new GeminiCompletionClient(getGeminiApiKey(env), env.GEMINI_MODEL || DEFAULT_MODEL_ID);
  }
}

export { ModelCallError } from "./types";
export type { CompletionClient, CompletionRequest } from "./types";
