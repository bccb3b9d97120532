"use client";

import { useMemo, useState } from "react";
import { motion } from "framer-motion";
import IngredientSidebar from "@/components/finder/IngredientSidebar";
import RecipeDocumentPreview from "@/components/finder/RecipeDocumentPreview";
import RecipeMatchCard from "@/components/finder/RecipeMatchCard";
import { finderReducer, initialFinderState, type FinderAction } from "@/lib/finder-view-state";
import { findRecipeMatches } from "@/lib/recipe-search";
import type { Catalog } from "@/lib/recipe-types";

type RecipeFinderClientProps = {
  recipes: Catalog;
  similarityThreshold: number;
};

export default function RecipeFinderClient({ recipes, similarityThreshold }: RecipeFinderClientProps) {
  const [state, setState] = useState(initialFinderState);
  const dispatch = (action: FinderAction) => setState((current) => finderReducer(current, action));
  const { terms, view } = state;

  const matches = useMemo(
    () => findRecipeMatches(recipes, terms, { similarityThreshold }),
    [recipes, terms, similarityThreshold]
  );

  const selected = view.kind === "viewing" ? recipes.find((recipe) => recipe.id === view.recipeId) ?? null : null;

  return (
    <div className="grid gap-8 lg:grid-cols-[320px_1fr]">
      <IngredientSidebar
        terms={terms}
        recipeCount={recipes.length}
        onAdd={(term) => dispatch({ type: "add_term", term })}
        onRemove={(term) => dispatch({ type: "remove_term", term })}
        onClear={() => dispatch({ type: "clear_terms" })}
      />

      {selected ? (
        <RecipeDocumentPreview recipe={selected} onBack={() => dispatch({ type: "back_to_results" })} />
      ) : (
        <section className="space-y-6">
          <div>
            <h1 className="text-3xl font-extrabold tracking-tight text-slate-900 dark:text-slate-100">Matching Recipes</h1>
            <p className="text-slate-500 dark:text-slate-400">
              Recipes that use every ingredient on your list.
            </p>
          </div>

          {terms.length === 0 ? (
            <div className="rounded-2xl border border-sky-100 bg-sky-50 px-4 py-3 text-sm font-medium text-sky-700 dark:border-sky-900/60 dark:bg-sky-950/40 dark:text-sky-200">
              Add ingredients in the sidebar to narrow down the {recipes.length} recipes below.
            </div>
          ) : matches.length === 0 ? (
            <div className="rounded-2xl border border-amber-100 bg-amber-50 px-4 py-3 text-sm text-amber-800 dark:border-amber-900/60 dark:bg-amber-950/40 dark:text-amber-200">
              No recipes found containing all of: <strong>{terms.join(", ")}</strong>. Try removing some ingredients.
            </div>
          ) : (
            <div className="rounded-2xl border border-emerald-100 bg-emerald-50 px-4 py-3 text-sm text-emerald-800 dark:border-emerald-900/60 dark:bg-emerald-950/40 dark:text-emerald-200">
              Found <strong>{matches.length}</strong> recipe{matches.length === 1 ? "" : "s"} with all your ingredients!
            </div>
          )}

          <div className="space-y-4">
            {matches.map((match, index) => (
              <motion.div
                key={match.recipe.id}
                initial={{ opacity: 0, y: 8 }}
                animate={{ opacity: 1, y: 0 }}
                transition={{ duration: 0.3, delay: Math.min(index * 0.05, 0.3), ease: "easeOut" }}
              >
                <RecipeMatchCard
                  match={match}
                  onView={() => dispatch({ type: "select_recipe", recipeId: match.recipe.id })}
                />
              </motion.div>
            ))}
          </div>
        </section>
      )}
    </div>
  );
}
