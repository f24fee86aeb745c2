import { describe, it, expect } from "vitest";
import { canonicalUnit, normalizeIngredient, normalizeIngredientUnits, parseQuantity } from "./units";

describe("parseQuantity", () => {
  it("reads decimals, fractions and the trailing unit", () => {
    expect(parseQuantity("1.5 kg")).toEqual({ quantity: 1.5, unit: "kg" });
    expect(parseQuantity("1/2 l")).toEqual({ quantity: 0.5, unit: "l" });
    expect(parseQuantity("300")).toEqual({ quantity: 300, unit: "" });
  });

  it("gives up on text", () => {
    expect(parseQuantity("a pinch")).toBeNull();
  });
});

describe("canonicalUnit", () => {
  it("maps aliases onto the allowed units", () => {
    expect(canonicalUnit("G")).toBe("grams");
    expect(canonicalUnit("Litres")).toBe("l");
    expect(canonicalUnit("pcs")).toBe("pieces");
    expect(canonicalUnit("tbsp")).toBe("tbsp");
  });
});

describe("normalizeIngredient", () => {
  it("turns bare names into entries", () => {
    expect(normalizeIngredient("  basil ")).toEqual({ name: "basil" });
    expect(normalizeIngredient("")).toBeNull();
  });

  it("drops entries without a name", () => {
    expect(normalizeIngredient({ quantity: 2 })).toBeNull();
    expect(normalizeIngredient(12)).toBeNull();
  });

  it("parses string quantities", () => {
    expect(normalizeIngredient({ name: "rice", quantity: "250", unit: "g" })).toEqual({
      name: "rice",
      quantity: 250,
      unit: "grams",
    });
    expect(normalizeIngredient({ name: "milk", quantity: "300 milliliters" })).toEqual({
      name: "milk",
      quantity: 300,
      unit: "ml",
    });
  });

  it("keeps free-text quantities", () => {
    expect(normalizeIngredient({ name: "salt", quantity: "to taste" })).toEqual({ name: "salt", quantity: "to taste" });
    expect(normalizeIngredient({ name: "garlic", quantity: "2 cloves", unit: "pieces" })).toEqual({
      name: "garlic",
      quantity: "2 cloves",
      unit: "pieces",
    });
  });

  it("scales large gram and ml amounts", () => {
    expect(normalizeIngredient({ name: "flour", quantity: 1500, unit: "grams" })).toEqual({
      name: "flour",
      quantity: 1.5,
      unit: "kg",
    });
    expect(normalizeIngredient({ name: "stock", quantity: 1000, unit: "ml" })).toEqual({
      name: "stock",
      quantity: 1,
      unit: "l",
    });
    expect(normalizeIngredient({ name: "sugar", quantity: 999, unit: "grams" })).toEqual({
      name: "sugar",
      quantity: 999,
      unit: "grams",
    });
  });
});

describe("normalizeIngredientUnits", () => {
  it("keeps recipe count, titles and instructions", () => {
    const recipes = [
      { title: "A", ingredients: ["rice", { name: "water", quantity: 2000, unit: "ml" }], instructions: ["Boil"] },
      { title: "B", ingredients: [], instructions: [], difficulty: "easy" },
    ];
    expect(normalizeIngredientUnits(recipes, "user-1")).toEqual([
      {
        title: "A",
        ingredients: [{ name: "rice" }, { name: "water", quantity: 2, unit: "l" }],
        instructions: ["Boil"],
      },
      { title: "B", ingredients: [], instructions: [], difficulty: "easy" },
    ]);
  });
});
