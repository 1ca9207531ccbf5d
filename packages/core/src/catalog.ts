import type { CatalogEntry, PatternCatalog, RankedPattern, RhythmFingerprint } from './types.js';

/** Order-independent key for a rhythm fingerprint. `''` is the empty measure. */
export const canonicalKey = (fingerprint: RhythmFingerprint): string =>
  [...new Set(fingerprint)].sort((a, b) => a - b).join(',');

export const patternFromKey = (key: string): number[] => (key === '' ? [] : key.split(',').map(Number));

export const emptyCatalog = (): PatternCatalog => new Map<string, CatalogEntry>();

/** Partial catalog for one piece: occurrences count measures, support counts the piece once. */
export const catalogFromPiece = (pieceId: string, fingerprints: readonly RhythmFingerprint[]): PatternCatalog => {
  const catalog = new Map<string, CatalogEntry>();
  const pieces: ReadonlySet<string> = new Set([pieceId]);
  for (const fingerprint of fingerprints) {
    const key = canonicalKey(fingerprint);
    const existing = catalog.get(key);
    catalog.set(key, {
      pattern: patternFromKey(key),
      occurrences: (existing?.occurrences ?? 0) + 1,
      pieces,
    });
  }
  return catalog;
};

const mergeEntries = (a: CatalogEntry, b: CatalogEntry): CatalogEntry => ({
  pattern: [...a.pattern],
  occurrences: a.occurrences + b.occurrences,
  pieces: new Set([...a.pieces, ...b.pieces]),
});

/** Pointwise sum of occurrences and union of piece sets. Neither input is modified. */
export const mergeCatalogs = (a: PatternCatalog, b: PatternCatalog): PatternCatalog => {
  const merged = new Map<string, CatalogEntry>(a);
  for (const [key, entry] of b) {
    const existing = merged.get(key);
    merged.set(key, existing ? mergeEntries(existing, entry) : entry);
  }
  return merged;
};

export const mergeAllCatalogs = (catalogs: readonly PatternCatalog[]): PatternCatalog =>
  catalogs.reduce<PatternCatalog>((acc, catalog) => mergeCatalogs(acc, catalog), emptyCatalog());

const compareLexicographic = (a: readonly number[], b: readonly number[]): number => {
  const length = Math.min(a.length, b.length);
  for (let index = 0; index < length; index += 1) {
    const delta = (a[index] ?? 0) - (b[index] ?? 0);
    if (delta !== 0) return delta;
  }
  return a.length - b.length;
};

export const comparePatterns = (a: RankedPattern, b: RankedPattern): number =>
  b.support - a.support ||
  b.occurrences - a.occurrences ||
  a.pattern.length - b.pattern.length ||
  compareLexicographic(a.pattern, b.pattern);

/** Most widely shared patterns first; ties fall back to occurrences, size, then contents. */
export const rankPatterns = (catalog: PatternCatalog): RankedPattern[] =>
  [...catalog.values()]
    .map((entry) => ({
      pattern: [...entry.pattern],
      support: entry.pieces.size,
      occurrences: entry.occurrences,
      pieces: [...entry.pieces].sort(),
    }))
    .sort(comparePatterns);

export const catalogPieceCount = (catalog: PatternCatalog): number => {
  const pieces = new Set<string>();
  for (const entry of catalog.values()) {
    for (const piece of entry.pieces) pieces.add(piece);
  }
  return pieces.size;
};
