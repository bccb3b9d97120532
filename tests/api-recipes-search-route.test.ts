import { NextRequest } from "next/server";
import { getRecipeCatalog } from "@/lib/recipe-catalog";
import { GET } from "@/app/api/recipes/search/route";
import { makeRecipe } from "./recipe-fixtures";

vi.mock("@/lib/recipe-catalog", () => ({
  getRecipeCatalog: vi.fn(),
}));

const catalog = [
  makeRecipe("garlic-chicken", "Garlic Chicken", ["chicken breast", "garlic"]),
  makeRecipe("tomato-soup", "Tomato Soup", ["tomato", "onion", "vegetable stock"]),
  makeRecipe("chicken-soup", "Chicken Soup", ["chicken", "onion", "carrot"]),
];

const search = (query: string) => GET(new NextRequest(`http://localhost/api/recipes/search${query}`));

describe("GET /api/recipes/search", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.mocked(getRecipeCatalog).mockResolvedValue(catalog);
  });

  it("returns recipes matching every ingredient", async () => {
    const response = await search("?ingredient=chicken&ingredient=onion");
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(body).toEqual({
      total: 3,
      count: 1,
      results: [
        {
          id: "chicken-soup",
          name: "Chicken Soup",
          documentRef: "chicken-soup.txt",
          ingredientCount: 3,
          matchedTokens: ["chicken", "onion"],
          otherTokens: ["carrot"],
        },
      ],
    });
  });

  it("keeps catalog order by default", async () => {
    const body = await (await search("?ingredient=chicken")).json();

    expect(body.results.map((result: { id: string }) => result.id)).toEqual(["garlic-chicken", "chicken-soup"]);
    expect(body.results[0].matchedTokens).toEqual(["chicken breast"]);
  });

  it("returns the whole catalog when no ingredient is given", async () => {
    const body = await (await search("?ingredient=%20%20&order=name")).json();

    expect(body.count).toBe(3);
    expect(body.results.map((result: { name: string }) => result.name)).toEqual([
      "Chicken Soup",
      "Garlic Chicken",
      "Tomato Soup",
    ]);
  });

  it("rejects unknown orders", async () => {
    const response = await search("?order=price");

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: "invalid_order" });
    expect(getRecipeCatalog).not.toHaveBeenCalled();
  });

  it("returns 503 when the catalog cannot be loaded", async () => {
    vi.mocked(getRecipeCatalog).mockRejectedValue(new Error("CATALOG_READ_FAILED"));

    const response = await search("?ingredient=rice");

    expect(response.status).toBe(503);
    expect(await response.json()).toEqual({ error: "catalog_unavailable" });
  });
});
