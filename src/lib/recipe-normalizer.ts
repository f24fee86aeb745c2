import { isJsonObject, type IngredientEntry, type JsonObject, type NormalizedRecipe } from "./types";

export const UNTITLED_RECIPE = "Untitled recipe";

// Empty strings, lists and objects count as missing, like zero and false.
function isPresent(value: unknown): boolean {
  if (Array.isArray(value)) return value.length > 0;
  if (isJsonObject(value)) return Object.keys(value).length > 0;
  return Boolean(value);
}

function firstPresent(recipe: JsonObject, keys: string[]): unknown {
  for (const key of keys) {
    if (isPresent(recipe[key])) return recipe[key];
  }
  return undefined;
}

// Plain decimals only; Number() would also take "0x10" or "0b1".
const DECIMAL_TOKEN = /^[-+]?(\d+\.?\d*|\.\d+)(e[-+]?\d+)?$/i;

function isNumericToken(token: string): boolean {
  return DECIMAL_TOKEN.test(token);
}

function stringify(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "object" && value !== null) return JSON.stringify(value);
  return String(value);
}

/**
 * Coerces the ingredients field into a list. Lists pass through untouched;
 * a `{ name: quantity }` map becomes one entry per key.
 */
export function normalizeIngredientStructure(raw: unknown): unknown[] {
  if (Array.isArray(raw)) {
    return raw;
  }
  if (!isJsonObject(raw)) {
    return [];
  }

  return Object.entries(raw).map(([name, rawQty]) => {
    const entry: IngredientEntry = { name };
    if (typeof rawQty === "number") {
      entry.quantity = rawQty;
    } else if (typeof rawQty === "string") {
      const parts = rawQty.split(/\s+/).filter(Boolean);
      if (parts.length >= 2 && isNumericToken(parts[0])) {
        entry.quantity = Number(parts[0]);
        entry.unit = parts[1];
      } else {
        entry.quantity = rawQty;
      }
    } else if (rawQty !== undefined && rawQty !== null) {
      entry.quantity = stringify(rawQty);
    }
    return entry;
  });
}

export function normalizeInstructions(raw: unknown): string[] {
  if (typeof raw === "string") return [raw];
  if (Array.isArray(raw)) return raw.map(stringify);
  return [stringify(raw)];
}

/** Picks the list of candidate recipes out of whatever shape the model used. */
export function unwrapRecipes(parsed: JsonObject): unknown[] {
  if (isJsonObject(parsed.recipe)) {
    return [parsed.recipe];
  }
  if (!Array.isArray(parsed.recipes)) {
    return [parsed];
  }
  return parsed.recipes;
}

export function normalizeRecipe(raw: JsonObject): NormalizedRecipe {
  const title = firstPresent(raw, ["title", "name", "recipe_name"]);
  return {
    ...raw,
    title: title === undefined ? UNTITLED_RECIPE : stringify(title),
    ingredients: normalizeIngredientStructure(raw.ingredients ?? []),
    instructions: normalizeInstructions(firstPresent(raw, ["instructions", "steps"]) ?? []),
  };
}

export function normalizeRecipes(parsed: JsonObject): NormalizedRecipe[] {
  return unwrapRecipes(parsed).filter(isJsonObject).map(normalizeRecipe);
}
