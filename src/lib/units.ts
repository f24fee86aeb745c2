import { isJsonObject, type IngredientEntry, type NormalizedRecipe, type Recipe } from "./types";

const UNIT_MAP: Record<string, string> = {
  g: "grams",
  gr: "grams",
  gram: "grams",
  grams: "grams",
  kg: "kg",
  kgs: "kg",
  kilogram: "kg",
  kilograms: "kg",
  ml: "ml",
  milliliter: "ml",
  milliliters: "ml",
  millilitre: "ml",
  millilitres: "ml",
  l: "l",
  liter: "l",
  liters: "l",
  litre: "l",
  litres: "l",
  piece: "pieces",
  pieces: "pieces",
  pc: "pieces",
  pcs: "pieces",
  each: "pieces",
  unit: "pieces",
  units: "pieces",
};

export function canonicalUnit(unit: string): string {
  const lower = unit.trim().toLowerCase();
  return UNIT_MAP[lower] ?? lower;
}

function parseAmount(raw: string): number | null {
  if (raw.includes("/")) {
    const [num, denom] = raw.split("/").map(Number);
    const value = num / denom;
    return Number.isFinite(value) ? value : null;
  }
  const value = parseFloat(raw);
  return Number.isFinite(value) ? value : null;
}

export function parseQuantity(str: string): { quantity: number; unit: string } | null {
  const match = str.trim().match(/^(\d+\/\d+|\d+(?:\.\d+)?)\s*(.*)$/);
  if (!match) return null;

  const quantity = parseAmount(match[1]);
  if (quantity === null) return null;

  return { quantity, unit: match[2].trim() };
}

// Round away float noise from the gram/ml scale-up.
function round(value: number): number {
  return Math.round(value * 1000) / 1000;
}

function scaleUp(entry: IngredientEntry): IngredientEntry {
  if (typeof entry.quantity !== "number" || entry.quantity < 1000) return entry;
  if (entry.unit === "grams") return { ...entry, quantity: round(entry.quantity / 1000), unit: "kg" };
  if (entry.unit === "ml") return { ...entry, quantity: round(entry.quantity / 1000), unit: "l" };
  return entry;
}

export function normalizeIngredient(raw: unknown): IngredientEntry | null {
  if (typeof raw === "string") {
    const name = raw.trim();
    return name ? { name } : null;
  }
  if (!isJsonObject(raw)) return null;

  const name = typeof raw.name === "string" ? raw.name.trim() : "";
  if (!name) return null;

  const entry: IngredientEntry = { name };
  let unit = typeof raw.unit === "string" && raw.unit.trim() ? raw.unit : undefined;

  if (typeof raw.quantity === "number") {
    entry.quantity = raw.quantity;
  } else if (typeof raw.quantity === "string") {
    const parsed = parseQuantity(raw.quantity);
    if (parsed && (parsed.unit === "" || unit === undefined)) {
      entry.quantity = parsed.quantity;
      unit = unit ?? (parsed.unit || undefined);
    } else {
      entry.quantity = raw.quantity;
    }
  }

  if (unit !== undefined) entry.unit = canonicalUnit(unit);
  return scaleUp(entry);
}

/**
 * Default unit normalizer: canonical unit names, numeric quantities and
 * gram/ml amounts of a thousand or more expressed in kg/l. Titles,
 * instructions and recipe count are left alone.
 */
export function normalizeIngredientUnits(recipes: NormalizedRecipe[], _userId: string): Recipe[] {
  return recipes.map((recipe) => ({
    ...recipe,
    ingredients: recipe.ingredients
      .map(normalizeIngredient)
      .filter((entry): entry is IngredientEntry => entry !== null),
  }));
}
