import { canonicalDietTag, filterInventory } from "./dietary";
import { buildSystemPrompt, buildUserPrompt, pickTemperature, type PromptContext } from "./generation-prompt";
import { extractJson } from "./json-extract";
import { repairJson } from "./json-repair";
import { ModelCallError, type CompletionClient } from "./llm-providers/types";
import { normalizeRecipes } from "./recipe-normalizer";
import type {
  GenerationErrorKind,
  GenerationResult,
  InventoryItem,
  NormalizedRecipe,
  PreviousRecipe,
  Recipe,
  UserPreferences,
} from "./types";

export const MAX_ATTEMPTS = 4;
/** Backoff window between attempts, in milliseconds. */
export const RETRY_DELAY_MS: readonly [number, number] = [600, 1400];
export const GENERATION_MAX_TOKENS = 1100;
export const DEFAULT_RECIPE_COUNT = 3;
export const NO_SAFE_INGREDIENTS_ERROR = "No safe ingredients available.";

type MaybePromise<T> = T | Promise<T>;

export interface GeneratorDeps {
  client: CompletionClient;
  normalizeUnits: (recipes: NormalizedRecipe[], userId: string) => MaybePromise<Recipe[]>;
  getSpicesForUser: (userId: string) => MaybePromise<string[]>;
  summarizeRatingsForPrompt: (userId: string) => MaybePromise<string>;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export interface GenerateRequest {
  userId: string;
  inventory: InventoryItem[];
  userMessage: string;
  preferences: Partial<UserPreferences>;
  previousRecipe?: PreviousRecipe | null;
  recipeCount?: number;
}

export interface AttemptError {
  kind: Exclude<GenerationErrorKind, "NoSafeIngredients" | "ExhaustedRetries">;
  message: string;
}

export type GeneratorState =
  | { kind: "attempting"; attempt: number; lastError: AttemptError | null }
  | { kind: "success"; recipes: NormalizedRecipe[] }
  | { kind: "exhausted"; lastError: AttemptError };

type AttemptOutcome = { ok: true; recipes: NormalizedRecipe[] } | { ok: false; error: AttemptError };

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function backoffDelay(random: () => number = Math.random): number {
  const [min, max] = RETRY_DELAY_MS;
  return min + random() * (max - min);
}

/**
 * Decides where the loop goes after an attempt. Failures move to the next
 * attempt while budget remains and to `exhausted` once it is spent.
 */
export function nextState(attempt: number, outcome: AttemptOutcome): GeneratorState {
  if (outcome.ok) {
    return { kind: "success", recipes: outcome.recipes };
  }
  if (attempt >= MAX_ATTEMPTS) {
    return { kind: "exhausted", lastError: outcome.error };
  }
  return { kind: "attempting", attempt: attempt + 1, lastError: outcome.error };
}

export function exhaustedMessage(stage: string, lastError: AttemptError): string {
  return `${stage} failed after ${MAX_ATTEMPTS} attempts: ${lastError.message}`;
}

export function createRecipeGenerator(deps: GeneratorDeps) {
  const { client } = deps;
  const sleep = deps.sleep ?? defaultSleep;
  const random = deps.random ?? Math.random;

  async function runAttempt(system: string, ctx: PromptContext, temperature: number): Promise<AttemptOutcome> {
    let rawContent: string;
    try {
      rawContent = await client.complete({
        system,
        user: buildUserPrompt(ctx),
        temperature,
        maxTokens: GENERATION_MAX_TOKENS,
      });
    } catch (error) {
      const message =
        error instanceof ModelCallError
          ? error.message
          : `${client.name} API error (${error instanceof Error ? error.message : String(error)})`;
      return { ok: false, error: { kind: "ModelCallError", message } };
    }

    let parsed = extractJson(rawContent);
    if (!parsed) {
      console.log(`[generator] invalid JSON from ${client.name}, trying repair`);
      parsed = await repairJson(client, rawContent);
    }
    if (!parsed) {
      return { ok: false, error: { kind: "InvalidJSON", message: `Invalid JSON returned from ${client.name}` } };
    }

    const recipes = normalizeRecipes(parsed);
    if (recipes.length === 0) {
      return { ok: false, error: { kind: "NoValidRecipes", message: "No valid recipes returned" } };
    }
    return { ok: true, recipes };
  }

  return async function generate(request: GenerateRequest): Promise<GenerationResult> {
    const { userId, inventory, userMessage } = request;
    const recipeCount = request.recipeCount ?? DEFAULT_RECIPE_COUNT;
    const dietary = (request.preferences.dietary ?? []).map(canonicalDietTag);
    const allergies = request.preferences.allergies ?? [];

    const safeInventory = filterInventory(inventory, dietary);
    if (safeInventory.length === 0) {
      return { error: NO_SAFE_INGREDIENTS_ERROR, recipes: [] };
    }
    console.log(`[generator] user ${userId}: ${safeInventory.length}/${inventory.length} inventory items after diet filter`);

    const spices = await deps.getSpicesForUser(userId);
    const ratingSummary = await deps.summarizeRatingsForPrompt(userId);

    const ctx: PromptContext = {
      userMessage,
      inventory: safeInventory,
      dietary,
      allergies,
      spices,
      ratingSummary,
      recipeCount,
      previousRecipe: request.previousRecipe,
    };
    const system = buildSystemPrompt();
    const temperature = pickTemperature(userMessage);

    let state: GeneratorState = { kind: "attempting", attempt: 1, lastError: null };
    while (state.kind === "attempting") {
      const { attempt } = state;
      const t0 = Date.now();
      console.log(`[generator] attempt ${attempt}/${MAX_ATTEMPTS} contacting ${client.name}...`);

      const outcome = await runAttempt(system, ctx, temperature);
      if (!outcome.ok) {
        console.error(`[generator] attempt ${attempt} failed (${outcome.error.kind}): ${outcome.error.message}`);
      }

      state = nextState(attempt, outcome);
      if (state.kind === "attempting") {
        await sleep(backoffDelay(random));
      } else if (state.kind === "success") {
        console.log(`[generator] attempt ${attempt} succeeded in ${Date.now() - t0}ms`);
      }
    }

    if (state.kind === "exhausted") {
      return { error: exhaustedMessage(client.name, state.lastError), recipes: [] };
    }

    const recipes = await deps.normalizeUnits(state.recipes.slice(0, recipeCount), userId);
    recipes.forEach((recipe, i) => {
      console.log(`[generator] ${i + 1}. ${recipe.title} (${String(recipe.difficulty ?? "Unknown")})`);
    });
    return { user_id: userId, recipes };
  };
}

export type RecipeGenerator = ReturnType<typeof createRecipeGenerator>;
