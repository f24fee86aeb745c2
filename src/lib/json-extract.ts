import { isJsonObject, type JsonObject } from "./types";

const FENCE_MARKERS = /```json|```/g;
const LINE_COMMENT = /\/\/.*/g;
const BLOCK_COMMENT = /\/\*[\s\S]*?\*\//g;
const JSON_FENCE_BLOCK = /```json([\s\S]*?)```/g;

// Regex based: a string value holding "//" or "/*" gets cut as well.
export function stripJsonComments(text: string): string {
  return text.replace(LINE_COMMENT, "").replace(BLOCK_COMMENT, "").trim();
}

/** First `{...}` span whose braces balance, or null if none closes. */
export function findBalancedJsonSnippet(text: string): string | null {
  const start = text.indexOf("{");
  if (start === -1) return null;

  let depth = 0;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (ch === "{") {
      depth++;
    } else if (ch === "}") {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }
  return null;
}

function tryParseCandidate(candidate: string): JsonObject | null {
  const trimmed = candidate.trim();
  if (!trimmed) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(stripJsonComments(trimmed));
  } catch {
    return null;
  }
  return isJsonObject(parsed) ? parsed : null;
}

/**
 * Pulls a JSON object out of a model response that may carry prose,
 * markdown fences or comments around it. Returns null when nothing parses.
 */
export function extractJson(text: string | null | undefined): JsonObject | null {
  if (!text) return null;

  const unfenced = text.replace(FENCE_MARKERS, "").trim();
  const direct = tryParseCandidate(unfenced);
  if (direct) return direct;

  const snippet = findBalancedJsonSnippet(unfenced);
  if (snippet) {
    const parsed = tryParseCandidate(snippet);
    if (parsed) return parsed;
  }

  for (const match of text.matchAll(JSON_FENCE_BLOCK)) {
    const parsed = tryParseCandidate(match[1]);
    if (parsed) return parsed;
  }

  return null;
}
