import path from "node:path";
import { contentTypeFor, readRecipeDocument, resolveDocumentPath } from "@/lib/recipe-documents";

const documentsDir = path.join(process.cwd(), "tests", "fixtures", "documents");

describe("resolveDocumentPath", () => {
  it("resolves references inside the documents directory", () => {
    expect(resolveDocumentPath("garlic-chicken.txt", documentsDir)).toBe(
      path.join(documentsDir, "garlic-chicken.txt")
    );
    expect(resolveDocumentPath("nested/../tomato-soup.txt", documentsDir)).toBe(
      path.join(documentsDir, "tomato-soup.txt")
    );
  });

  it("refuses references that leave the directory", () => {
    expect(resolveDocumentPath("../catalog.json", documentsDir)).toBeNull();
    expect(resolveDocumentPath("/etc/hosts", documentsDir)).toBeNull();
    expect(resolveDocumentPath(".", documentsDir)).toBeNull();
    expect(resolveDocumentPath("  ", documentsDir)).toBeNull();
  });
});

describe("contentTypeFor", () => {
  it("maps known extensions", () => {
    expect(contentTypeFor("recipe.PDF")).toBe("application/pdf");
    expect(contentTypeFor("notes.md")).toBe("text/markdown; charset=utf-8");
    expect(contentTypeFor("archive.bin")).toBe("application/octet-stream");
  });
});

describe("readRecipeDocument", () => {
  it("reads the referenced file", async () => {
    const document = await readRecipeDocument({ documentRef: "garlic-chicken.txt" }, documentsDir);

    expect(document?.fileName).toBe("garlic-chicken.txt");
    expect(document?.contentType).toBe("text/plain; charset=utf-8");
    expect(document?.body.toString("utf8")).toBe("Garlic Chicken\n");
  });

  it("reads files in subdirectories", async () => {
    const document = await readRecipeDocument({ documentRef: "nested/notes.md" }, documentsDir);

    expect(document?.contentType).toBe("text/markdown; charset=utf-8");
  });

  it("returns null for missing files, directories and escaping references", async () => {
    expect(await readRecipeDocument({ documentRef: "missing.txt" }, documentsDir)).toBeNull();
    expect(await readRecipeDocument({ documentRef: "nested" }, documentsDir)).toBeNull();
    expect(await readRecipeDocument({ documentRef: "../catalog.json" }, documentsDir)).toBeNull();
  });
});
