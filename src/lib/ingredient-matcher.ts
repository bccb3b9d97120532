import { normalizeIngredient } from "@/lib/ingredient-normalizer";

/**
 * Minimum per-word similarity for a typo to count as a match.
 *
 * One edit in a word of six or more letters passes ("chiken" vs "chicken" is
 * 0.857, "garlc" vs "garlic" 0.833). One edit in a five-letter word does not
 * ("pasta" vs "paste" is 0.8), and unrelated short words stay far below it
 * ("ham" vs "cream" is 0.4). Lower values start pairing distinct ingredients;
 * higher values reject ordinary misspellings.
 */
export const DEFAULT_SIMILARITY_THRESHOLD = 0.82;

export type TermMatchOptions = {
  similarityThreshold?: number;
};

const splitWords = (value: string) => value.split(" ").filter(Boolean);

/** Optimal string alignment distance: Levenshtein plus adjacent transpositions. */
export const editDistance = (a: string, b: string) => {
  const rows = a.length + 1;
  const cols = b.length + 1;
  const matrix: number[][] = Array.from({ length: rows }, (_, row) =>
    Array.from({ length: cols }, (__, col) => (row === 0 ? col : col === 0 ? row : 0))
  );

  for (let row = 1; row < rows; row += 1) {
    for (let col = 1; col < cols; col += 1) {
      const cost = a[row - 1] === b[col - 1] ? 0 : 1;
      let best = Math.min(
        matrix[row - 1][col] + 1,
        matrix[row][col - 1] + 1,
        matrix[row - 1][col - 1] + cost
      );

      if (row > 1 && col > 1 && a[row - 1] === b[col - 2] && a[row - 2] === b[col - 1]) {
        best = Math.min(best, matrix[row - 2][col - 2] + 1);
      }

      matrix[row][col] = best;
    }
  }

  return matrix[a.length][b.length];
};

/** 1 for identical strings, falling towards 0 as the edit distance approaches the longer length. */
export const similarity = (a: string, b: string) => {
  if (a === b) {
    return 1;
  }

  const longest = Math.max(a.length, b.length);
  return 1 - editDistance(a, b) / longest;
};

const wordsAreClose = (queryWord: string, candidateWord: string, threshold: number) =>
  queryWord === candidateWord || similarity(queryWord, candidateWord) >= threshold;

/**
 * Compares two already-normalized values. Callers that hold raw phrases should
 * go through {@link termMatches} instead.
 */
export const normalizedTermMatches = (
  term: string,
  candidate: string,
  threshold = DEFAULT_SIMILARITY_THRESHOLD
) => {
  if (!term || !candidate) {
    return false;
  }

  if (term === candidate || candidate.includes(term)) {
    return true;
  }

  const termWords = splitWords(term);
  const candidateWords = splitWords(candidate);

  // "basil leaf" has basil: the query may carry extra descriptive words.
  if (candidateWords.every((word) => termWords.includes(word))) {
    return true;
  }

  return termWords.every((termWord) =>
    candidateWords.some((candidateWord) => wordsAreClose(termWord, candidateWord, threshold))
  );
};

/** A candidate token paired with its normalized form. */
export type NormalizedCandidate = {
  token: string;
  normalized: string;
};

export const toNormalizedCandidates = (tokens: Iterable<string>): NormalizedCandidate[] =>
  Array.from(tokens, (token) => ({ token, normalized: normalizeIngredient(token) }));

export const findNormalizedMatch = (
  term: string,
  candidates: Iterable<NormalizedCandidate>,
  threshold = DEFAULT_SIMILARITY_THRESHOLD
): NormalizedCandidate | null => {
  if (!term) {
    return null;
  }

  for (const candidate of candidates) {
    if (normalizedTermMatches(term, candidate.normalized, threshold)) {
      return candidate;
    }
  }

  return null;
};

/** First candidate that the query term matches, or null. Both sides are normalized first. */
export function findMatchingToken(
  queryTerm: string,
  candidateTokens: Iterable<string>,
  options: TermMatchOptions = {}
): string | null {
  const match = findNormalizedMatch(
    normalizeIngredient(queryTerm),
    toNormalizedCandidates(candidateTokens),
    options.similarityThreshold ?? DEFAULT_SIMILARITY_THRESHOLD
  );
  return match ? match.token : null;
}

export function termMatches(
  queryTerm: string,
  candidateTokens: Iterable<string>,
  options: TermMatchOptions = {}
): boolean {
  return findMatchingToken(queryTerm, candidateTokens, options) !== null;
}
