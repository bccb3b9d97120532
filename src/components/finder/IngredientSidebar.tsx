"use client";

import { useState, type FormEvent } from "react";
import { AnimatePresence, motion } from "framer-motion";
import { Carrot, Database, Plus, Trash2, X } from "lucide-react";

const QUICK_ADD = [
  "chicken",
  "beef",
  "salmon",
  "pork",
  "rice",
  "pasta",
  "potato",
  "cheese",
  "garlic",
  "onion",
  "tomato",
  "eggs",
];

type IngredientSidebarProps = {
  terms: string[];
  recipeCount: number;
  onAdd: (term: string) => void;
  onRemove: (term: string) => void;
  onClear: () => void;
};

export default function IngredientSidebar({
  terms,
  recipeCount,
  onAdd,
  onRemove,
  onClear,
}: IngredientSidebarProps) {
  const [draft, setDraft] = useState("");

  const handleSubmit = (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    onAdd(draft);
    setDraft("");
  };

  return (
    <aside className="space-y-6 rounded-3xl border border-slate-200 bg-white p-5 shadow-sm dark:border-slate-800 dark:bg-slate-900">
      <div className="flex items-center gap-2">
        <Carrot className="h-5 w-5 text-emerald-600 dark:text-emerald-400" strokeWidth={1.8} />
        <h2 className="text-lg font-bold tracking-tight text-slate-900 dark:text-slate-100">Your Ingredients</h2>
      </div>

      <form onSubmit={handleSubmit} className="space-y-3">
        <label className="text-xs font-semibold uppercase tracking-widest text-slate-400 dark:text-slate-500" htmlFor="new-ingredient">
          Add an ingredient
        </label>
        <input
          id="new-ingredient"
          value={draft}
          onChange={(event) => setDraft(event.target.value)}
          placeholder="e.g., chicken, cheese..."
          className="w-full rounded-xl border border-slate-200 bg-white px-4 py-3 text-sm shadow-sm focus:border-emerald-500 focus:outline-none dark:border-slate-700 dark:bg-slate-950 dark:text-slate-100"
        />
        <div className="grid grid-cols-2 gap-2">
          <button
            type="submit"
            className="inline-flex items-center justify-center gap-1.5 rounded-xl bg-emerald-600 px-4 py-2.5 text-sm font-semibold text-white shadow-lg transition-transform active:scale-95"
          >
            <Plus className="h-4 w-4" />
            Add
          </button>
          <button
            type="button"
            onClick={onClear}
            className="inline-flex items-center justify-center gap-1.5 rounded-xl border border-slate-200 bg-white px-4 py-2.5 text-sm font-semibold text-slate-600 transition-colors hover:bg-slate-50 dark:border-slate-700 dark:bg-slate-900 dark:text-slate-300 dark:hover:bg-slate-800"
          >
            <Trash2 className="h-4 w-4" />
            Clear
          </button>
        </div>
      </form>

      <div className="space-y-2">
        <p className="text-xs font-semibold uppercase tracking-widest text-slate-400 dark:text-slate-500">Quick Add</p>
        <div className="grid grid-cols-3 gap-2">
          {QUICK_ADD.map((ingredient) => (
            <button
              key={ingredient}
              type="button"
              onClick={() => onAdd(ingredient)}
              disabled={terms.includes(ingredient)}
              className="rounded-xl border border-slate-200 bg-slate-50 px-2 py-1.5 text-xs font-semibold text-slate-600 transition hover:border-emerald-300 disabled:opacity-50 dark:border-slate-800 dark:bg-slate-950/60 dark:text-slate-300 dark:hover:border-emerald-400"
            >
              {ingredient}
            </button>
          ))}
        </div>
      </div>

      <div className="border-t border-slate-100 pt-5 dark:border-slate-800">
        {terms.length > 0 ? (
          <ul className="space-y-2">
            <AnimatePresence initial={false}>
              {terms.map((term) => (
                <motion.li
                  key={term}
                  initial={{ opacity: 0, x: -8 }}
                  animate={{ opacity: 1, x: 0 }}
                  exit={{ opacity: 0, x: 8 }}
                  transition={{ duration: 0.2, ease: "easeOut" }}
                  className="flex items-center justify-between rounded-xl bg-emerald-50 px-3 py-2 text-sm font-medium text-emerald-800 dark:bg-emerald-500/10 dark:text-emerald-200"
                >
                  <span>{term}</span>
                  <button
                    type="button"
                    onClick={() => onRemove(term)}
                    aria-label={`Remove ${term}`}
                    className="rounded-full p-1 text-emerald-700 transition-colors hover:bg-emerald-100 dark:text-emerald-300 dark:hover:bg-emerald-500/20"
                  >
                    <X className="h-3.5 w-3.5" />
                  </button>
                </motion.li>
              ))}
            </AnimatePresence>
          </ul>
        ) : (
          <p className="rounded-xl bg-sky-50 px-3 py-2 text-sm text-sky-700 dark:bg-sky-950/40 dark:text-sky-200">
            Add ingredients to search!
          </p>
        )}
      </div>

      <div className="flex items-center gap-3 rounded-2xl bg-gradient-to-br from-emerald-600 to-teal-700 px-4 py-3 text-white">
        <Database className="h-5 w-5 shrink-0" strokeWidth={1.8} />
        <p className="text-sm">
          <span className="font-bold">{recipeCount}</span> recipe{recipeCount === 1 ? "" : "s"} in the database
        </p>
      </div>
    </aside>
  );
}
