import levenshtein from 'fast-levenshtein';

export const normalizeName = (name: string) =>
  name
    .toLowerCase()
    .replace(/[_\s.:-]/g, '')
    .trim();

export const nameSimilarity = (a: string, b: string) => {
  const na = normalizeName(a);
  const nb = normalizeName(b);
  if (!na || !nb) return 0;
  const dist = levenshtein.get(na, nb);
  const maxLen = Math.max(na.length, nb.length) || 1;
  return 1 - dist / maxLen;
};

export const dot = (a: readonly number[], b: readonly number[]) => {
  let s = 0;
  for (let i = 0; i < a.length; i++) s += a[i] * b[i];
  return s;
};

export const norm = (a: readonly number[]) => {
  const d = dot(a, a);
  return d > 0 ? Math.sqrt(d) : 1e-9;
};

/** 1 − cosine similarity; 0 for identical directions, up to 2 for opposite ones. */
export const cosineDistance = (a: readonly number[], b: readonly number[]) => 1 - dot(a, b) / (norm(a) * norm(b));

export const euclideanDistance = (a: readonly number[], b: readonly number[]) => {
  let s = 0;
  for (let i = 0; i < a.length; i++) {
    const d = a[i] - b[i];
    s += d * d;
  }
  return Math.sqrt(s);
};

/**
 * Maps a raw distance to a [0,1] relevance score. Distances up to 1 (cosine-like metrics)
 * convert linearly; larger ones (unbounded metrics such as Euclidean) decay as 1/(1+d).
 */
export const normalizeRelevance = (distance: number) => {
  if (!Number.isFinite(distance)) return 0;
  const relevance = distance > 1 ? 1 / (1 + distance) : 1 - distance;
  return Math.max(0, Math.min(1, relevance));
};
