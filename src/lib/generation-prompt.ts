/**
 * Prompt text for recipe generation. The system prompt is fixed; the user
 * prompt is rebuilt on every attempt from the request context.
 */

import { buildRestrictionNote } from "./dietary";
import type { InventoryItem, PreviousRecipe } from "./types";

export const ALLOWED_UNITS = ["grams", "kg", "ml", "l", "pieces"] as const;

export const RECIPE_GENERATION_SYSTEM_PROMPT = `You are a helpful cooking assistant.
You MUST reply with ONE VALID JSON object only.
Rules:
- Never output text before or after the JSON.
- Never wrap JSON with \`\`\`json or any markdown.
- Never use comments like // or /* */ inside JSON.
- Allowed units: ${ALLOWED_UNITS.join(", ")}.
- Use ONLY ingredients from the provided inventory.
- Schema example:
{
  "recipes": [
    {
      "title": "string",
      "ingredients": [ {"name": "string", "quantity": 100, "unit": "grams"} ],
      "instructions": ["step 1", "step 2"]
    }
  ]
}
`;

export interface PromptContext {
  userMessage: string;
  inventory: InventoryItem[];
  dietary: string[];
  allergies: string[];
  spices: string[];
  ratingSummary: string;
  recipeCount: number;
  previousRecipe?: PreviousRecipe | null;
}

export function buildSystemPrompt(): string {
  return RECIPE_GENERATION_SYSTEM_PROMPT;
}

export function formatInventoryItem(item: InventoryItem): string {
  if (typeof item === "string") return item;
  const { name, quantity, unit } = item;
  return quantity && unit ? `${quantity} ${unit} ${name}`.trim() : String(name);
}

export function buildPreferenceSummary(dietary: string[], allergies: string[]): string {
  const parts = [
    dietary.length ? `dietary restrictions: ${dietary.join(", ")}` : "",
    allergies.length ? `allergies: ${allergies.join(", ")}` : "",
  ].filter(Boolean);
  return parts.join("; ") || "no special preferences";
}

export function buildUserPrompt(ctx: PromptContext): string {
  const inventoryText = ctx.inventory.map(formatInventoryItem).join(", ");
  const preferenceText = buildPreferenceSummary(ctx.dietary, ctx.allergies);
  const spicesText = ctx.spices.length ? ctx.spices.join(", ") : "no specific spices available";

  const previous = ctx.previousRecipe;
  // An empty previous recipe is no follow-up at all.
  let prompt = previous && Object.keys(previous).length > 0
    ? `User previously received this recipe: ${previous.title || "Unnamed"}.\n` +
      `User now says: ${ctx.userMessage}\n`
    : `User message: ${ctx.userMessage}\n`;

  prompt +=
    `Available ingredients: ${inventoryText}\n` +
    `User preferences: ${preferenceText}.\n` +
    `Available spices: ${spicesText}\n` +
    `${buildRestrictionNote(ctx.dietary)}\n` +
    `${ctx.ratingSummary}\n` +
    `Please return up to ${ctx.recipeCount} recipes in the JSON schema described.`;

  return prompt;
}

const CREATIVE_KEYWORDS = ["surprise", "different"];

export function pickTemperature(userMessage: string): number {
  const lower = userMessage.toLowerCase();
  return CREATIVE_KEYWORDS.some((word) => lower.includes(word)) ? 0.7 : 0.4;
}
