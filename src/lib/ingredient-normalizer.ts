const UNIT_WORDS = new Set([
  "g",
  "gr",
  "gram",
  "kg",
  "kilogram",
  "mg",
  "ml",
  "milliliter",
  "millilitre",
  "l",
  "liter",
  "litre",
  "oz",
  "ounce",
  "lb",
  "lbs",
  "pound",
  "tbsp",
  "tbs",
  "tablespoon",
  "tsp",
  "teaspoon",
  "cup",
  "pint",
  "quart",
  "qt",
  "gallon",
  "clove",
  "pinch",
  "dash",
  "handful",
  "package",
  "pkg",
  "packet",
  "can",
  "tin",
  "jar",
  "bottle",
  "bag",
  "box",
  "carton",
  "container",
  "slice",
  "piece",
  "stick",
  "inch",
  "cm",
  "mm",
  "stalk",
  "bunch",
  "sprig",
  "head",
  "x",
]);

const DESCRIPTOR_WORDS = new Set([
  "a",
  "an",
  "and",
  "or",
  "of",
  "the",
  "to",
  "at",
  "with",
  "for",
  "each",
  "fresh",
  "freshly",
  "optional",
  "taste",
  "about",
  "approx",
  "roughly",
  "finely",
  "thinly",
  "thickly",
  "coarsely",
  "small",
  "medium",
  "large",
  "whole",
  "raw",
  "ripe",
  "extra",
  "virgin",
  "boneless",
  "skinless",
  "halved",
  "quartered",
  "chopped",
  "diced",
  "minced",
  "sliced",
  "peeled",
  "grated",
  "shredded",
  "crushed",
  "ground",
  "sifted",
  "softened",
  "melted",
  "beaten",
  "divided",
  "packed",
  "cubed",
  "rinsed",
  "drained",
]);

const IRREGULAR_PLURALS: Record<string, string> = {
  leaves: "leaf",
  loaves: "loaf",
  halves: "half",
  knives: "knife",
  cookies: "cookie",
  brownies: "brownie",
  mice: "mouse",
  geese: "goose",
  teeth: "tooth",
};

const INVARIANT_WORDS = new Set(["molasses", "swiss", "series", "species", "hummus", "couscous", "asparagus"]);

const QUANTITY_TOKEN = /^\d+(?:g|kg|mg|ml|l|oz|lb|lbs)?$/;

const clean = (value: string) =>
  value
    .toLowerCase()
    .replace(/\([^)]*\)/g, " ")
    .replace(/[^a-z0-9,\s]/g, " ");

/**
 * Suffix heuristic for English plurals. It reduces common forms
 * ("tomatoes", "berries", "radishes", "eggs") and leaves words it does not
 * recognise alone; it is not a dictionary.
 */
export const singularizeWord = (word: string) => {
  const irregular = IRREGULAR_PLURALS[word];
  if (irregular) {
    return irregular;
  }

  if (INVARIANT_WORDS.has(word)) {
    return word;
  }

  if (word.endsWith("ies") && word.length > 4) {
    return `${word.slice(0, -3)}y`;
  }

  if (word.endsWith("oes") && word.length > 4) {
    return word.slice(0, -2);
  }

  if (/(ches|shes|sses|xes|zes)$/.test(word) && word.length > 4) {
    return word.slice(0, -2);
  }

  if (
    word.endsWith("s") &&
    word.length > 3 &&
    !word.endsWith("ss") &&
    !word.endsWith("us") &&
    !word.endsWith("is")
  ) {
    return word.slice(0, -1);
  }

  return word;
};

const isMeasureWord = (word: string) => QUANTITY_TOKEN.test(word) || UNIT_WORDS.has(word);

const stripLeadingMeasureWords = (words: string[]) => {
  let start = 0;
  while (start < words.length && isMeasureWord(words[start])) {
    start += 1;
  }
  return words.slice(start);
};

const normalizeSegment = (segment: string) => {
  const words = segment
    .split(/\s+/)
    .filter(Boolean)
    .map((word) => singularizeWord(word))
    .filter((word) => !DESCRIPTOR_WORDS.has(word));

  return stripLeadingMeasureWords(words).join(" ");
};

/**
 * Maps a free-text ingredient phrase to its canonical token:
 * "1 cup flour, sifted" -> "flour", "2 Large EGGS" -> "egg".
 *
 * Only the first comma-separated segment with content survives, so trailing
 * preparation notes are dropped. Never throws; returns "" when nothing is left.
 * Applying it twice gives the same result as applying it once.
 */
export function normalizeIngredient(phrase: string): string {
  if (typeof phrase !== "string" || !phrase) {
    return "";
  }

  for (const segment of clean(phrase).split(",")) {
    const normalized = normalizeSegment(segment);
    if (normalized) {
      return normalized;
    }
  }

  return "";
}
