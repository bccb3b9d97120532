export type Recipe = {
  id: string;
  name: string;
  /** Path of the source document, relative to the documents directory. */
  documentRef: string;
  rawIngredients: readonly string[];
  /** Normalized, de-duplicated, never empty strings. */
  ingredientTokens: readonly string[];
  /** Always ingredientTokens.length. */
  ingredientCount: number;
};

export type Catalog = readonly Recipe[];

/** The part of a recipe the query engine reads. Tokens may be absent on malformed entries. */
export type SearchableRecipe = {
  name: string;
  ingredientTokens?: readonly string[] | null;
};

export type RecipeOrder = "catalog" | "name";

export type RecipeMatch<T extends SearchableRecipe = Recipe> = {
  recipe: T;
  fullyMatched: boolean;
  /** Recipe tokens that satisfied the query terms, in query order. */
  matchedTokens: string[];
  otherTokens: string[];
};
