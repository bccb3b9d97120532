"use client";

import { Check } from "lucide-react";
import type { Recipe, RecipeMatch } from "@/lib/recipe-types";

type RecipeMatchCardProps = {
  match: RecipeMatch<Recipe>;
  onView: () => void;
};

export default function RecipeMatchCard({ match, onView }: RecipeMatchCardProps) {
  const { recipe, matchedTokens, otherTokens } = match;

  return (
    <article className="group flex flex-col gap-4 rounded-3xl border border-slate-200 bg-white p-6 shadow-sm transition-all hover:border-emerald-300 hover:shadow-lg md:flex-row md:items-start md:justify-between dark:border-slate-800 dark:bg-slate-900 dark:hover:border-emerald-400">
      <div className="space-y-3">
        <h3 className="text-lg font-bold tracking-tight text-slate-900 dark:text-slate-100">{recipe.name}</h3>

        <div className="flex flex-wrap gap-1.5">
          {matchedTokens.map((token) => (
            <span
              key={`matched-${token}`}
              className="inline-flex items-center gap-1 rounded-full bg-emerald-100 px-2.5 py-0.5 text-xs font-semibold text-emerald-800 dark:bg-emerald-500/15 dark:text-emerald-200"
            >
              <Check className="h-3 w-3" />
              {token}
            </span>
          ))}
          {otherTokens.map((token) => (
            <span
              key={`other-${token}`}
              className="rounded-full bg-slate-100 px-2.5 py-0.5 text-xs text-slate-500 dark:bg-slate-800 dark:text-slate-400"
            >
              {token}
            </span>
          ))}
        </div>

        <div className="text-xs text-slate-400 dark:text-slate-500">
          {recipe.ingredientCount} ingredient{recipe.ingredientCount === 1 ? "" : "s"}
        </div>
      </div>

      <button
        type="button"
        onClick={onView}
        className="shrink-0 rounded-xl border border-slate-200 bg-white px-4 py-2 text-sm font-semibold text-slate-600 transition-colors group-hover:bg-slate-50 dark:border-slate-700 dark:bg-slate-900 dark:text-slate-300 dark:group-hover:bg-slate-800"
      >
        View Recipe
      </button>
    </article>
  );
}
