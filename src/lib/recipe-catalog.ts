import { readFile } from "node:fs/promises";
import { z } from "zod";

import { normalizeIngredient } from "@/lib/ingredient-normalizer";
import {
  logRecipeCatalogDiagnostics,
  type IngredientCountMismatch,
  type RejectedCatalogRecord,
} from "@/lib/recipe-catalog-diagnostics";
import { getRecipeCatalogPath } from "@/lib/recipe-finder-config";
import type { Catalog, Recipe } from "@/lib/recipe-types";
import { describeError, logServerPerf } from "@/lib/server-perf";

const catalogRecordSchema = z.object({
  name: z.string().trim().min(1),
  filename: z.string().trim().min(1),
  ingredients_raw: z.array(z.string()).default([]),
  ingredients_normalized: z.array(z.string()).optional(),
  ingredient_count: z.number().int().nonnegative().optional(),
});

type CatalogRecord = z.infer<typeof catalogRecordSchema>;

export type CatalogParseResult = {
  recipes: Recipe[];
  rejected: RejectedCatalogRecord[];
  countMismatches: IngredientCountMismatch[];
};

export const toRecipeSlug = (name: string) => {
  const slug = name
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return slug || "recipe";
};

const claimId = (name: string, used: Set<string>) => {
  const base = toRecipeSlug(name);
  let candidate = base;
  let suffix = 2;
  while (used.has(candidate)) {
    candidate = `${base}-${suffix}`;
    suffix += 1;
  }
  used.add(candidate);
  return candidate;
};

/** Normalized tokens with set semantics, keeping first-seen order. */
export const buildIngredientTokens = (phrases: readonly string[]) => {
  const tokens: string[] = [];
  for (const phrase of phrases) {
    const token = normalizeIngredient(phrase);
    if (token && !tokens.includes(token)) {
      tokens.push(token);
    }
  }
  return tokens;
};

const readRecordName = (value: unknown) => {
  if (value && typeof value === "object" && "name" in value && typeof value.name === "string") {
    return value.name;
  }
  return undefined;
};

const toRecipe = (record: CatalogRecord, id: string): Recipe => {
  const ingredientTokens = Object.freeze(buildIngredientTokens(record.ingredients_normalized ?? []));
  return Object.freeze({
    id,
    name: record.name,
    documentRef: record.filename,
    rawIngredients: Object.freeze([...record.ingredients_raw]),
    ingredientTokens,
    ingredientCount: ingredientTokens.length,
  });
};

/**
 * Validates raw catalog records. Records that fail validation are returned in
 * `rejected` instead of the catalog; the rest keep their storage order.
 */
export function parseCatalogRecords(input: unknown): CatalogParseResult {
  if (!Array.isArray(input)) {
    throw new Error("CATALOG_NOT_ARRAY");
  }

  const recipes: Recipe[] = [];
  const rejected: RejectedCatalogRecord[] = [];
  const countMismatches: IngredientCountMismatch[] = [];
  const usedIds = new Set<string>();

  input.forEach((value: unknown, index) => {
    const parsed = catalogRecordSchema.safeParse(value);
    if (!parsed.success) {
      rejected.push({
        index,
        name: readRecordName(value),
        issues: parsed.error.issues.map((issue) => ({
          path: issue.path.join("."),
          message: issue.message,
        })),
      });
      return;
    }

    const recipe = toRecipe(parsed.data, claimId(parsed.data.name, usedIds));
    const stored = parsed.data.ingredient_count;
    if (stored !== undefined && stored !== recipe.ingredientCount) {
      countMismatches.push({ index, name: recipe.name, stored, actual: recipe.ingredientCount });
    }
    recipes.push(recipe);
  });

  return { recipes, rejected, countMismatches };
}

const readCatalogFile = async (sourcePath: string): Promise<unknown> => {
  let raw: string;
  try {
    raw = await readFile(sourcePath, "utf8");
  } catch (error) {
    throw new Error("CATALOG_READ_FAILED", { cause: error });
  }

  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new Error("CATALOG_INVALID_JSON", { cause: error });
  }
};

export async function loadRecipeCatalog(sourcePath = getRecipeCatalogPath()): Promise<Catalog> {
  const startedAt = Date.now();
  try {
    const { recipes, rejected, countMismatches } = parseCatalogRecords(await readCatalogFile(sourcePath));

    logRecipeCatalogDiagnostics({ sourcePath, loaded: recipes.length, rejected, countMismatches });
    logServerPerf({
      phase: "catalog.load",
      route: "/server/catalog",
      startedAt,
      success: true,
      meta: { result_count: recipes.length, rejected_count: rejected.length },
    });

    return Object.freeze(recipes);
  } catch (error) {
    logServerPerf({
      phase: "catalog.load",
      route: "/server/catalog",
      startedAt,
      success: false,
      meta: { error: describeError(error) },
    });
    throw error;
  }
}

declare global {
  var recipeCatalog: undefined | Promise<Catalog>;
}

let productionCatalog: undefined | Promise<Catalog>;

// Outside production the cache lives on globalThis so dev reloads keep it.
const isProduction = () => process.env.NODE_ENV === "production";

const readCachedCatalog = () => (isProduction() ? productionCatalog : globalThis.recipeCatalog);

const storeCachedCatalog = (catalog: undefined | Promise<Catalog>) => {
  if (isProduction()) {
    productionCatalog = catalog;
  } else {
    globalThis.recipeCatalog = catalog;
  }
};

/** The process-wide catalog, read once. A failed load is not cached. */
export function getRecipeCatalog(): Promise<Catalog> {
  const cached = readCachedCatalog();
  if (cached) {
    return cached;
  }

  const pending: Promise<Catalog> = loadRecipeCatalog().catch((error: unknown) => {
    if (readCachedCatalog() === pending) {
      storeCachedCatalog(undefined);
    }
    throw error;
  });
  storeCachedCatalog(pending);
  return pending;
}

export async function getRecipeById(recipeId: string): Promise<Recipe | null> {
  const catalog = await getRecipeCatalog();
  return catalog.find((recipe) => recipe.id === recipeId) ?? null;
}

export const resetRecipeCatalogCache = () => {
  productionCatalog = undefined;
  globalThis.recipeCatalog = undefined;
};
