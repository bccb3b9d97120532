import { findRecipeMatches, isRecipeOrder, searchRecipes } from "@/lib/recipe-search";
import type { SearchableRecipe } from "@/lib/recipe-types";

const catalog: SearchableRecipe[] = [
  { name: "Garlic Chicken", ingredientTokens: ["chicken thigh", "garlic", "lemon"] },
  { name: "Beef Stew", ingredientTokens: ["beef", "potato", "onion"] },
  { name: "Chicken Rice", ingredientTokens: ["chicken", "rice", "onion"] },
  { name: "Apple Pie", ingredientTokens: ["apple", "flour", "butter"] },
];

const names = (recipes: SearchableRecipe[]) => recipes.map((recipe) => recipe.name);

describe("searchRecipes", () => {
  it("returns the whole catalog in order for an empty query", () => {
    expect(names(searchRecipes(catalog, []))).toEqual([
      "Garlic Chicken",
      "Beef Stew",
      "Chicken Rice",
      "Apple Pie",
    ]);
  });

  it("keeps recipes where any token matches a single term", () => {
    expect(names(searchRecipes(catalog, ["chicken"]))).toEqual(["Garlic Chicken", "Chicken Rice"]);
    expect(names(searchRecipes(catalog, ["onion"]))).toEqual(["Beef Stew", "Chicken Rice"]);
  });

  it("requires every term to match", () => {
    expect(names(searchRecipes(catalog, ["chicken", "onion"]))).toEqual(["Chicken Rice"]);
    expect(names(searchRecipes(catalog, ["apple", "beef"]))).toEqual([]);
  });

  it("only narrows the results as terms are added", () => {
    const broad = searchRecipes(catalog, ["onion"]);
    const narrow = searchRecipes(catalog, ["onion", "rice"]);

    expect(narrow.every((recipe) => broad.includes(recipe))).toBe(true);
  });

  it("ignores duplicate terms and term order", () => {
    expect(searchRecipes(catalog, ["onion", "chicken", "onion"])).toEqual(
      searchRecipes(catalog, ["chicken", "onion"])
    );
  });

  it("returns the catalog's own recipe objects", () => {
    expect(searchRecipes(catalog, ["apple"])[0]).toBe(catalog[3]);
  });

  it("returns nothing when no recipe has the ingredient", () => {
    expect(searchRecipes(catalog, ["saffron"])).toEqual([]);
  });

  it("treats recipes without tokens as having no ingredients", () => {
    const withBroken: SearchableRecipe[] = [
      ...catalog,
      { name: "Broken", ingredientTokens: null },
      { name: "Missing" },
    ];

    expect(names(searchRecipes(withBroken, []))).toContain("Broken");
    expect(names(searchRecipes(withBroken, ["rice"]))).toEqual(["Chicken Rice"]);
  });
});

describe("searchRecipes with tokens as supplied by callers", () => {
  it("normalizes recipe tokens before matching", () => {
    const loose: SearchableRecipe[] = [{ name: "Roast Breasts", ingredientTokens: ["Chicken Breasts", "2 Lemons"] }];

    expect(names(searchRecipes(loose, ["chicken breast"]))).toEqual(["Roast Breasts"]);
    expect(names(searchRecipes(loose, ["lemon", "chicken"]))).toEqual(["Roast Breasts"]);
    expect(findRecipeMatches(loose, ["lemon"])[0]).toMatchObject({
      matchedTokens: ["2 Lemons"],
      otherTokens: ["Chicken Breasts"],
    });
  });

  it("skips token entries that are not strings", () => {
    const loose: SearchableRecipe[] = JSON.parse(
      '[{ "name": "Odd", "ingredientTokens": [42, { "token": "rice" }, "rice"] }, { "name": "Numbers", "ingredientTokens": [7] }]'
    );

    expect(names(searchRecipes(loose, ["rice"]))).toEqual(["Odd"]);
    expect(searchRecipes(loose, ["7"])).toEqual([]);
    expect(findRecipeMatches(loose, [])[0].otherTokens).toEqual(["rice"]);
  });
});

describe("findRecipeMatches", () => {
  it("reports the tokens each term matched", () => {
    const matches = findRecipeMatches(catalog, ["garlc", "chicken"]);

    expect(matches).toHaveLength(1);
    expect(matches[0]).toEqual({
      recipe: catalog[0],
      fullyMatched: true,
      matchedTokens: ["garlic", "chicken thigh"],
      otherTokens: ["lemon"],
    });
  });

  it("lists every token as other for an empty query", () => {
    const [first] = findRecipeMatches(catalog, []);

    expect(first.matchedTokens).toEqual([]);
    expect(first.otherTokens).toEqual(["chicken thigh", "garlic", "lemon"]);
  });

  it("sorts by name when asked", () => {
    expect(findRecipeMatches(catalog, [], { order: "name" }).map((match) => match.recipe.name)).toEqual([
      "Apple Pie",
      "Beef Stew",
      "Chicken Rice",
      "Garlic Chicken",
    ]);
  });

  it("drops every recipe for a term with no ingredient content", () => {
    expect(findRecipeMatches(catalog, ["chopped"])).toEqual([]);
  });
});

describe("isRecipeOrder", () => {
  it("accepts the supported orders only", () => {
    expect(isRecipeOrder("catalog")).toBe(true);
    expect(isRecipeOrder("name")).toBe(true);
    expect(isRecipeOrder("price")).toBe(false);
  });
});
