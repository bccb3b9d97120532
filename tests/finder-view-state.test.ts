import { finderReducer, initialFinderState, type FinderState } from "@/lib/finder-view-state";

describe("finderReducer", () => {
  it("adds trimmed, lowercased terms once", () => {
    const once = finderReducer(initialFinderState, { type: "add_term", term: "  Chicken " });
    const twice = finderReducer(once, { type: "add_term", term: "chicken" });

    expect(once.terms).toEqual(["chicken"]);
    expect(twice).toBe(once);
  });

  it("ignores blank terms", () => {
    expect(finderReducer(initialFinderState, { type: "add_term", term: "   " })).toBe(initialFinderState);
  });

  it("returns to the results when the term list changes", () => {
    const viewing: FinderState = {
      terms: ["rice", "onion"],
      view: { kind: "viewing", recipeId: "chicken-rice" },
    };

    expect(finderReducer(viewing, { type: "remove_term", term: "rice" })).toEqual({
      terms: ["onion"],
      view: { kind: "searching" },
    });
    expect(finderReducer(viewing, { type: "add_term", term: "garlic" }).view).toEqual({ kind: "searching" });
    expect(finderReducer(viewing, { type: "clear_terms" })).toEqual({ terms: [], view: { kind: "searching" } });
  });

  it("opens and closes a recipe without touching the terms", () => {
    const searching: FinderState = { terms: ["beef"], view: { kind: "searching" } };
    const viewing = finderReducer(searching, { type: "select_recipe", recipeId: "beef-stew" });

    expect(viewing).toEqual({ terms: ["beef"], view: { kind: "viewing", recipeId: "beef-stew" } });
    expect(finderReducer(viewing, { type: "back_to_results" })).toEqual(searching);
  });
});
