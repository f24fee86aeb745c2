import type { InventoryItem } from "./types";

/** Ingredients removed from the inventory outright for each diet tag. */
export const RESTRICTED: Record<string, ReadonlySet<string>> = {
  vegetarian: new Set(["beef", "pork", "chicken", "turkey", "fish", "shrimp", "lamb", "bacon"]),
  vegan: new Set([
    "beef", "pork", "chicken", "turkey", "fish", "shrimp", "lamb",
    "milk", "cheese", "butter", "yogurt", "cream", "egg", "honey",
  ]),
  "gluten free": new Set([
    "wheat", "barley", "rye", "bread", "pasta", "flour",
    "spaghetti", "noodles", "bulgur", "couscous", "semolina",
  ]),
};

const TAG_ALIASES: Record<string, string> = {
  "gluten-free": "gluten free",
  glutenfree: "gluten free",
};

export function canonicalDietTag(tag: string): string {
  const lower = tag.trim().toLowerCase();
  return TAG_ALIASES[lower] ?? lower;
}

export function inventoryItemName(item: InventoryItem): string {
  return typeof item === "string" ? item.toLowerCase() : String(item.name ?? "").toLowerCase();
}

export function bannedIngredients(dietary: string[]): Set<string> {
  const banned = new Set<string>();
  for (const tag of dietary) {
    const restricted = RESTRICTED[canonicalDietTag(tag)];
    if (!restricted) continue;
    restricted.forEach((name) => banned.add(name));
  }
  return banned;
}

export function filterInventory<T extends InventoryItem>(inventory: T[], dietary: string[]): T[] {
  const banned = bannedIngredients(dietary);
  if (banned.size === 0) return [...inventory];
  return inventory.filter((item) => !banned.has(inventoryItemName(item)));
}

// Notes go out in this order; vegan replaces the vegetarian note.
export function buildRestrictionNote(dietary: string[]): string {
  const tags = new Set(dietary.map(canonicalDietTag));
  const notes: string[] = [];

  if (tags.has("vegan")) {
    notes.push("IMPORTANT: 100 % plant-based – no meat, fish, dairy or eggs. Use tofu/legumes instead.");
  } else if (tags.has("vegetarian")) {
    notes.push("IMPORTANT: No meat or fish. Use plant-based substitutes.");
  }
  if (tags.has("gluten free")) {
    notes.push("IMPORTANT: Must be 100 % gluten-free – no wheat, barley, rye or derivatives.");
  }
  if (tags.has("kosher")) {
    notes.push("IMPORTANT: Keep recipe kosher – no pork/shellfish; do not mix meat with dairy.");
  }
  if (tags.has("halal")) {
    notes.push("IMPORTANT: Keep recipe halal – no pork or alcohol.");
  }
  if (tags.has("keto")) {
    notes.push("IMPORTANT: Keep net carbs very low (< 20 g per serving); moderate protein, high fat.");
  }
  if (tags.has("paleo")) {
    notes.push(
      "IMPORTANT: Paleo – no grains, legumes or processed sugar; focus on meat, fish, vegetables, fruit, nuts."
    );
  }

  return notes.join(" ");
}
