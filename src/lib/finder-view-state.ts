export type FinderView = { kind: "searching" } | { kind: "viewing"; recipeId: string };

export type FinderState = {
  terms: string[];
  view: FinderView;
};

export type FinderAction =
  | { type: "add_term"; term: string }
  | { type: "remove_term"; term: string }
  | { type: "clear_terms" }
  | { type: "select_recipe"; recipeId: string }
  | { type: "back_to_results" };

const SEARCHING: FinderView = { kind: "searching" };

export const initialFinderState: FinderState = {
  terms: [],
  view: SEARCHING,
};

export function finderReducer(state: FinderState, action: FinderAction): FinderState {
  switch (action.type) {
    case "add_term": {
      const term = action.term.trim().toLowerCase();
      if (!term || state.terms.includes(term)) {
        return state;
      }
      return { terms: [...state.terms, term], view: SEARCHING };
    }
    case "remove_term":
      return {
        terms: state.terms.filter((term) => term !== action.term),
        view: SEARCHING,
      };
    case "clear_terms":
      return { terms: [], view: SEARCHING };
    case "select_recipe":
      return { ...state, view: { kind: "viewing", recipeId: action.recipeId } };
    case "back_to_results":
      return { ...state, view: SEARCHING };
  }
}
