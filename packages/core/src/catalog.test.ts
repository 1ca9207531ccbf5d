import { describe, expect, it } from 'vitest';
import {
  canonicalKey,
  catalogFromPiece,
  catalogPieceCount,
  createCatalogDocument,
  emptyCatalog,
  mergeAllCatalogs,
  mergeCatalogs,
  patternFromKey,
  rankPatterns,
  serializeCatalog,
} from './index.js';

describe('corpus aggregator', () => {
  it('keys fingerprints independently of insertion order', () => {
    expect(canonicalKey([8, 0, 4])).toBe('0,4,8');
    expect(canonicalKey([])).toBe('');
    expect(patternFromKey('0,4,8')).toEqual([0, 4, 8]);
    expect(patternFromKey('')).toEqual([]);
  });

  it('counts measures as occurrences and pieces as support', () => {
    const x = catalogFromPiece('X', [[0, 8]]);
    const y = catalogFromPiece('Y', [[0, 8], [8, 0]]);
    const merged = mergeCatalogs(x, y);
    const entry = merged.get('0,8');
    expect(entry?.occurrences).toBe(3);
    expect([...(entry?.pieces ?? [])].sort()).toEqual(['X', 'Y']);
    expect(y.get('0,8')?.pieces.size).toBe(1);
  });

  it('leaves its inputs untouched when merging', () => {
    const x = catalogFromPiece('X', [[0]]);
    const y = catalogFromPiece('Y', [[0]]);
    mergeCatalogs(x, y);
    expect(x.get('0')?.occurrences).toBe(1);
    expect([...(x.get('0')?.pieces ?? [])]).toEqual(['X']);
    expect(mergeCatalogs(emptyCatalog(), x).get('0')?.occurrences).toBe(1);
  });

  it('ranks by support, occurrences, size, then contents', () => {
    const catalog = mergeAllCatalogs([
      catalogFromPiece('p1', [[0], [0, 8], [0, 8]]),
      catalogFromPiece('p2', [[0, 8], [4]]),
      catalogFromPiece('p3', [[4], [0, 4, 8, 12], [0, 4]]),
      catalogFromPiece('p4', [[0, 2]]),
    ]);
    expect(rankPatterns(catalog)).toEqual([
      { pattern: [0, 8], support: 2, occurrences: 3, pieces: ['p1', 'p2'] },
      { pattern: [4], support: 2, occurrences: 2, pieces: ['p2', 'p3'] },
      { pattern: [0], support: 1, occurrences: 1, pieces: ['p1'] },
      { pattern: [0, 2], support: 1, occurrences: 1, pieces: ['p4'] },
      { pattern: [0, 4], support: 1, occurrences: 1, pieces: ['p3'] },
      { pattern: [0, 4, 8, 12], support: 1, occurrences: 1, pieces: ['p3'] },
    ]);
    expect(catalogPieceCount(catalog)).toBe(4);
  });

  it('serializes the ranked catalog', () => {
    const catalog = mergeAllCatalogs([catalogFromPiece('a.mid', [[0], []]), catalogFromPiece('b.mid', [[0]])]);
    expect(createCatalogDocument(catalog, 1)).toEqual({
      pieces: 2,
      uniquePatterns: 2,
      patterns: [{ pattern: [0], support: 2, occurrences: 2, pieces: ['a.mid', 'b.mid'] }],
    });
    expect(JSON.parse(serializeCatalog(catalog))).toEqual({
      pieces: 2,
      uniquePatterns: 2,
      patterns: [
        { pattern: [0], support: 2, occurrences: 2, pieces: ['a.mid', 'b.mid'] },
        { pattern: [], support: 1, occurrences: 1, pieces: ['a.mid'] },
      ],
    });
  });
});
