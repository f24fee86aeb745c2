export interface StructuredInventoryItem {
  name: string;
  quantity?: number | string;
  unit?: string;
}

/** A pantry entry: either a bare name or a name with an amount. */
export type InventoryItem = string | StructuredInventoryItem;

export interface UserPreferences {
  dietary: string[];
  allergies: string[];
}

export interface IngredientEntry {
  name: string;
  quantity?: number | string;
  unit?: string;
}

/**
 * A recipe after shape normalization. Ingredient lists the model already
 * returned as a list are kept as-is until unit normalization runs, so an
 * entry may still be a bare string or a loosely shaped object.
 */
export interface NormalizedRecipe {
  title: string;
  ingredients: unknown[];
  instructions: string[];
  [extra: string]: unknown;
}

/** A recipe as handed back to callers. */
export interface Recipe extends NormalizedRecipe {
  ingredients: IngredientEntry[];
}

export interface PreviousRecipe {
  title?: string;
  [extra: string]: unknown;
}

export type JsonObject = Record<string, unknown>;

export interface GenerationSuccess {
  user_id: string;
  recipes: Recipe[];
}

export interface GenerationFailure {
  error: string;
  recipes: [];
}

export type GenerationResult = GenerationSuccess | GenerationFailure;

export type GenerationErrorKind =
  | "NoSafeIngredients"
  | "ModelCallError"
  | "InvalidJSON"
  | "NoValidRecipes"
  | "ExhaustedRetries";

export function isGenerationError(result: GenerationResult): result is GenerationFailure {
  return "error" in result;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
