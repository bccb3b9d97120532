import RecipeFinderClient from "@/components/finder/RecipeFinderClient";
import { getRecipeCatalog } from "@/lib/recipe-catalog";
import { getMatchSimilarityThreshold } from "@/lib/recipe-finder-config";
import type { Catalog } from "@/lib/recipe-types";

export const dynamic = "force-dynamic";

export default async function HomePage() {
  let recipes: Catalog = [];
  let loadFailed = false;

  try {
    recipes = await getRecipeCatalog();
  } catch {
    // The load failure is already logged; the notice below covers the page.
    loadFailed = true;
  }

  if (loadFailed || recipes.length === 0) {
    return (
      <div className="rounded-2xl border border-rose-200 bg-rose-50 px-4 py-3 text-sm text-rose-700 dark:border-rose-900/60 dark:bg-rose-950/40 dark:text-rose-200">
        {loadFailed
          ? "Recipe data could not be loaded. Check that the catalog file exists and contains a JSON array."
          : "No recipes loaded. Add records to the catalog file to start searching."}
      </div>
    );
  }

  return <RecipeFinderClient recipes={recipes} similarityThreshold={getMatchSimilarityThreshold()} />;
}
