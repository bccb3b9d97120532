export type RejectedCatalogRecord = {
  index: number;
  name?: string;
  issues: Array<{ path: string; message: string }>;
};

export type IngredientCountMismatch = {
  index: number;
  name: string;
  stored: number;
  actual: number;
};

type RecipeCatalogDiagnostics = {
  sourcePath: string;
  loaded: number;
  rejected: RejectedCatalogRecord[];
  countMismatches: IngredientCountMismatch[];
};

export const logRecipeCatalogDiagnostics = (payload: RecipeCatalogDiagnostics) => {
  if (payload.rejected.length === 0 && payload.countMismatches.length === 0) {
    return;
  }

  console.warn("[recipe-catalog]", JSON.stringify(payload));
};
