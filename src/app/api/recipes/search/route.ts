import { NextRequest, NextResponse } from "next/server";
import { getRecipeCatalog } from "@/lib/recipe-catalog";
import { getMatchSimilarityThreshold } from "@/lib/recipe-finder-config";
import { findRecipeMatches, isRecipeOrder } from "@/lib/recipe-search";
import { describeError, logServerPerf } from "@/lib/server-perf";

export const dynamic = "force-dynamic";

export async function GET(request: NextRequest) {
  const startedAt = Date.now();
  const { searchParams } = request.nextUrl;

  const terms = searchParams
    .getAll("ingredient")
    .map((term) => term.trim())
    .filter(Boolean);
  const order = searchParams.get("order") ?? "catalog";

  if (!isRecipeOrder(order)) {
    return NextResponse.json({ error: "invalid_order" }, { status: 400 });
  }

  let catalog;
  try {
    catalog = await getRecipeCatalog();
  } catch (error) {
    logServerPerf({
      phase: "recipes.search",
      route: "/api/recipes/search",
      startedAt,
      success: false,
      meta: { error: describeError(error) },
    });
    return NextResponse.json({ error: "catalog_unavailable" }, { status: 503 });
  }

  const matches = findRecipeMatches(catalog, terms, {
    order,
    similarityThreshold: getMatchSimilarityThreshold(),
  });

  logServerPerf({
    phase: "recipes.search",
    route: "/api/recipes/search",
    startedAt,
    success: true,
    meta: { term_count: terms.length, result_count: matches.length },
  });

  return NextResponse.json({
    total: catalog.length,
    count: matches.length,
    results: matches.map(({ recipe, matchedTokens, otherTokens }) => ({
      id: recipe.id,
      name: recipe.name,
      documentRef: recipe.documentRef,
      ingredientCount: recipe.ingredientCount,
      matchedTokens,
      otherTokens,
    })),
  });
}
