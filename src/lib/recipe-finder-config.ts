import path from "node:path";
import { z } from "zod";

import { DEFAULT_SIMILARITY_THRESHOLD } from "@/lib/ingredient-matcher";

const DEFAULT_CATALOG_PATH = "data/recipes_data.json";
const DEFAULT_DOCUMENTS_DIR = "data/documents";

const thresholdSchema = z.coerce.number().gt(0).lte(1);

const resolveFromCwd = (raw: string | undefined, fallback: string) => {
  const value = raw?.trim();
  return path.resolve(process.cwd(), value ? value : fallback);
};

export const getRecipeCatalogPath = () =>
  resolveFromCwd(process.env.RECIPE_CATALOG_PATH, DEFAULT_CATALOG_PATH);

export const getRecipeDocumentsDir = () =>
  resolveFromCwd(process.env.RECIPE_DOCUMENTS_DIR, DEFAULT_DOCUMENTS_DIR);

export const getMatchSimilarityThreshold = () => {
  const raw = process.env.MATCH_SIMILARITY_THRESHOLD;
  if (!raw) {
    return DEFAULT_SIMILARITY_THRESHOLD;
  }

  const parsed = thresholdSchema.safeParse(raw);
  return parsed.success ? parsed.data : DEFAULT_SIMILARITY_THRESHOLD;
};

export const isPerfLoggingEnabled = () => {
  if (process.env.NODE_ENV === "test") {
    return false;
  }

  const raw = process.env.PERF_LOGGING_ENABLED;
  if (!raw) {
    return true;
  }

  return /^(1|true|yes)$/i.test(raw);
};
