import { readFile } from "node:fs/promises";
import path from "node:path";

import { getRecipeDocumentsDir } from "@/lib/recipe-finder-config";
import type { Recipe } from "@/lib/recipe-types";

export type RecipeDocument = {
  fileName: string;
  contentType: string;
  body: Buffer;
};

const CONTENT_TYPES: Record<string, string> = {
  ".pdf": "application/pdf",
  ".html": "text/html; charset=utf-8",
  ".htm": "text/html; charset=utf-8",
  ".txt": "text/plain; charset=utf-8",
  ".md": "text/markdown; charset=utf-8",
};

export const contentTypeFor = (fileName: string) =>
  CONTENT_TYPES[path.extname(fileName).toLowerCase()] ?? "application/octet-stream";

/** Absolute path of a document reference, or null when it would leave the documents directory. */
export function resolveDocumentPath(documentRef: string, documentsDir = getRecipeDocumentsDir()) {
  const ref = documentRef.trim();
  if (!ref || path.isAbsolute(ref)) {
    return null;
  }

  const root = path.resolve(documentsDir);
  const resolved = path.resolve(root, ref);
  const relative = path.relative(root, resolved);

  if (!relative || relative.split(path.sep)[0] === ".." || path.isAbsolute(relative)) {
    return null;
  }

  return resolved;
}

const isMissingFileError = (error: unknown) =>
  error instanceof Error &&
  "code" in error &&
  (error.code === "ENOENT" || error.code === "EISDIR" || error.code === "ENOTDIR");

export async function readRecipeDocument(
  recipe: Pick<Recipe, "documentRef">,
  documentsDir = getRecipeDocumentsDir()
): Promise<RecipeDocument | null> {
  const documentPath = resolveDocumentPath(recipe.documentRef, documentsDir);
  if (!documentPath) {
    return null;
  }

  try {
    const body = await readFile(documentPath);
    const fileName = path.basename(documentPath);
    return { fileName, contentType: contentTypeFor(fileName), body };
  } catch (error) {
    if (isMissingFileError(error)) {
      return null;
    }
    throw error;
  }
}
