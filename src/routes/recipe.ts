import { Router } from "express";
import type { AuthRequest } from "../lib/auth-types";
import { isGenerationError, isJsonObject, type InventoryItem, type PreviousRecipe } from "../lib/types";
import { DEFAULT_RECIPE_COUNT, type GenerateRequest, type RecipeGenerator } from "../lib/recipe-generator";

export const MAX_RECIPE_COUNT = 5;

export type ParsedBody =
  | { ok: true; value: Omit<GenerateRequest, "userId"> }
  | { ok: false; error: string };

function toStringList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.map((v) => String(v).trim()).filter(Boolean);
}

function toInventoryItem(value: unknown): InventoryItem | null {
  if (typeof value === "string") return value.trim() || null;
  if (!isJsonObject(value) || typeof value.name !== "string" || !value.name.trim()) return null;

  const item: InventoryItem = { name: value.name.trim() };
  if (typeof value.quantity === "number" || typeof value.quantity === "string") item.quantity = value.quantity;
  if (typeof value.unit === "string") item.unit = value.unit;
  return item;
}

export function parseGenerateBody(body: unknown): ParsedBody {
  if (!isJsonObject(body)) {
    return { ok: false, error: "Request body must be a JSON object" };
  }

  const { ingredients, message, preferences, previousRecipe, count } = body;

  if (!Array.isArray(ingredients)) {
    return { ok: false, error: "ingredients must be an array" };
  }
  if (typeof message !== "string" || !message.trim()) {
    return { ok: false, error: "message is required" };
  }

  const inventory = ingredients
    .map(toInventoryItem)
    .filter((item): item is InventoryItem => item !== null);

  const prefs = isJsonObject(preferences) ? preferences : {};
  const dietary = toStringList(prefs.dietary).map((d) => d.toLowerCase());
  const allergies = toStringList(prefs.allergies);

  let previous: PreviousRecipe | null = null;
  if (isJsonObject(previousRecipe) && Object.keys(previousRecipe).length > 0) {
    const kept: PreviousRecipe = {};
    for (const [key, value] of Object.entries(previousRecipe)) {
      if (key !== "title") kept[key] = value;
      else if (typeof value === "string") kept.title = value;
    }
    previous = kept;
  }

  const recipeCount =
    typeof count === "number" && Number.isFinite(count)
      ? Math.min(Math.max(Math.trunc(count), 1), MAX_RECIPE_COUNT)
      : DEFAULT_RECIPE_COUNT;

  return {
    ok: true,
    value: {
      inventory,
      userMessage: message.trim(),
      preferences: { dietary, allergies },
      previousRecipe: previous,
      recipeCount,
    },
  };
}

export function createRecipeRouter(generate: RecipeGenerator): Router {
  const router = Router();

  // POST /api/recipe/generate
  router.post("/generate", async (req: AuthRequest, res) => {
    const parsed = parseGenerateBody(req.body);
    if (!parsed.ok) {
      res.status(400).json({ error: parsed.error });
      return;
    }
    if (!req.uid) {
      res.status(401).json({ error: "Missing or invalid authorization header" });
      return;
    }

    try {
      const result = await generate({ userId: req.uid, ...parsed.value });
      if (isGenerationError(result)) {
        console.error("Recipe generation gave up:", result.error);
      }
      res.json(result);
    } catch (error) {
      console.error("Recipe generation error:", {
        error,
        message: error instanceof Error ? error.message : String(error),
      });
      res.status(500).json({ error: "Failed to generate recipes" });
    }
  });

  return router;
}
