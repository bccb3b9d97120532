import { normalizeIngredient } from "@/lib/ingredient-normalizer";
import {
  DEFAULT_SIMILARITY_THRESHOLD,
  findNormalizedMatch,
  toNormalizedCandidates,
  type TermMatchOptions,
} from "@/lib/ingredient-matcher";
import type { RecipeMatch, RecipeOrder, SearchableRecipe } from "@/lib/recipe-types";

export type RecipeSearchOptions = TermMatchOptions & {
  order?: RecipeOrder;
};

const RECIPE_ORDERS: readonly RecipeOrder[] = ["catalog", "name"];

export const isRecipeOrder = (value: string): value is RecipeOrder =>
  RECIPE_ORDERS.some((order) => order === value);

// Loose callers may pass non-array lists or non-string entries; those contribute no tokens.
const readTokens = (recipe: SearchableRecipe): string[] => {
  const tokens: unknown = recipe.ingredientTokens;
  if (!Array.isArray(tokens)) {
    return [];
  }
  return tokens.filter((token): token is string => typeof token === "string");
};

const uniqueTerms = (queryTerms: Iterable<string>) => Array.from(new Set(queryTerms));

const matchRecipe = <T extends SearchableRecipe>(
  recipe: T,
  normalizedTerms: string[],
  threshold: number
): RecipeMatch<T> | null => {
  const tokens = readTokens(recipe);
  const candidates = toNormalizedCandidates(tokens);
  const matched: string[] = [];

  for (const term of normalizedTerms) {
    const candidate = findNormalizedMatch(term, candidates, threshold);
    if (candidate === null) {
      return null;
    }
    if (!matched.includes(candidate.token)) {
      matched.push(candidate.token);
    }
  }

  return {
    recipe,
    fullyMatched: true,
    matchedTokens: matched,
    otherTokens: tokens.filter((token) => !matched.includes(token)),
  };
};

/**
 * Recipes for which every query term matches at least one ingredient token,
 * with the tokens that matched. An empty query matches every recipe.
 */
export function findRecipeMatches<T extends SearchableRecipe>(
  catalog: readonly T[],
  queryTerms: Iterable<string>,
  options: RecipeSearchOptions = {}
): RecipeMatch<T>[] {
  const terms = uniqueTerms(queryTerms);
  const threshold = options.similarityThreshold ?? DEFAULT_SIMILARITY_THRESHOLD;

  const matches: RecipeMatch<T>[] = [];

  if (terms.length === 0) {
    for (const recipe of catalog) {
      matches.push({
        recipe,
        fullyMatched: true,
        matchedTokens: [],
        otherTokens: readTokens(recipe),
      });
    }
  } else {
    const normalizedTerms = terms.map((term) => normalizeIngredient(term));
    for (const recipe of catalog) {
      const match = matchRecipe(recipe, normalizedTerms, threshold);
      if (match) {
        matches.push(match);
      }
    }
  }

  if (options.order === "name") {
    return matches.sort((left, right) => left.recipe.name.localeCompare(right.recipe.name, "en"));
  }

  return matches;
}

/** Conjunctive ingredient filter over the catalog. Keeps catalog order; never throws. */
export function searchRecipes<T extends SearchableRecipe>(
  catalog: readonly T[],
  queryTerms: Iterable<string>,
  options: TermMatchOptions = {}
): T[] {
  return findRecipeMatches(catalog, queryTerms, options).map((match) => match.recipe);
}
