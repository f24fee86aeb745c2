import { extractJson } from "./json-extract";
import type { CompletionClient } from "./llm-providers/types";
import type { JsonObject } from "./types";

export const REPAIR_SYSTEM_PROMPT = "You are a JSON fixer. You always output VALID JSON only.";
export const REPAIR_MAX_TOKENS = 900;

export function buildRepairPrompt(rawText: string): string {
  return (
    "Your previous response was not valid JSON.\n" +
    "Here is the content:\n" +
    "----------------\n" +
    `${rawText}\n` +
    "----------------\n\n" +
    "Now respond with ONLY valid JSON. No explanations, no comments, no markdown."
  );
}

/**
 * Asks the model to rewrite an unparsable response as strict JSON.
 * Best effort: a failed call resolves to null like an unparsable answer.
 */
export async function repairJson(client: CompletionClient, rawText: string): Promise<JsonObject | null> {
  let fixedRaw: string;
  try {
    fixedRaw = await client.complete({
      system: REPAIR_SYSTEM_PROMPT,
      user: buildRepairPrompt(rawText),
      temperature: 0,
      maxTokens: REPAIR_MAX_TOKENS,
    });
  } catch (error) {
    console.error("[json-repair] repair call failed:", error instanceof Error ? error.message : String(error));
    return null;
  }

  console.log(`[json-repair] got ${fixedRaw.length} chars back`);
  return extractJson(fixedRaw);
}
