"use client";

import { ArrowLeft, BookOpen } from "lucide-react";
import type { Recipe } from "@/lib/recipe-types";

type RecipeDocumentPreviewProps = {
  recipe: Recipe;
  onBack: () => void;
};

export default function RecipeDocumentPreview({ recipe, onBack }: RecipeDocumentPreviewProps) {
  const documentUrl = `/api/recipes/${encodeURIComponent(recipe.id)}/document`;

  return (
    <section className="space-y-6">
      <div className="flex flex-wrap items-center justify-between gap-4">
        <div className="flex items-center gap-3">
          <BookOpen className="h-6 w-6 text-emerald-600 dark:text-emerald-400" strokeWidth={1.8} />
          <h2 className="text-2xl font-extrabold tracking-tight text-slate-900 dark:text-slate-100">{recipe.name}</h2>
        </div>
        <button
          type="button"
          onClick={onBack}
          className="inline-flex items-center gap-2 rounded-xl border border-slate-200 bg-white px-4 py-2 text-sm font-semibold text-slate-600 transition-colors hover:bg-slate-50 dark:border-slate-700 dark:bg-slate-900 dark:text-slate-300 dark:hover:bg-slate-800"
        >
          <ArrowLeft className="h-4 w-4" />
          Back to Results
        </button>
      </div>

      {recipe.rawIngredients.length > 0 ? (
        <details className="rounded-3xl border border-slate-200 bg-white p-5 text-sm dark:border-slate-800 dark:bg-slate-900">
          <summary className="cursor-pointer font-semibold text-slate-700 dark:text-slate-200">Ingredients</summary>
          <ul className="mt-3 list-disc space-y-1 pl-5 text-slate-600 dark:text-slate-300">
            {recipe.rawIngredients.map((line, index) => (
              <li key={`${line}-${index}`}>{line}</li>
            ))}
          </ul>
        </details>
      ) : null}

      <iframe
        src={documentUrl}
        title={recipe.name}
        className="h-[800px] w-full rounded-2xl border border-slate-200 bg-white dark:border-slate-800"
      />
      <a
        href={documentUrl}
        target="_blank"
        rel="noreferrer"
        className="inline-block text-sm font-semibold text-emerald-600 dark:text-emerald-400"
      >
        Open document in a new tab
      </a>
    </section>
  );
}
