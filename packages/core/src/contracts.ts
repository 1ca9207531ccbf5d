import { rankPatterns, catalogPieceCount } from './catalog.js';
import type { PatternCatalog, PieceAnalysis, RankedPattern } from './types.js';

export interface PieceMetadata {
  phrasal: {
    rhythmic: { pattern: string };
    melodic: { pattern: string };
  };
}

export const createPieceMetadata = (analysis: PieceAnalysis): PieceMetadata => ({
  phrasal: {
    rhythmic: { pattern: analysis.rhythm.form.text },
    melodic: { pattern: analysis.melody.form.text },
  },
});

export const serializePieceMetadata = (document: PieceMetadata | Record<string, unknown>): string =>
  `${JSON.stringify(document, null, 2)}\n`;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** Replaces `phrasal` in an existing side-file document and keeps every other key. */
export const mergePieceMetadata = (existingRaw: string | undefined, metadata: PieceMetadata): Record<string, unknown> => {
  if (existingRaw === undefined || existingRaw.trim() === '') {
    return { ...metadata };
  }
  const existing: unknown = JSON.parse(existingRaw);
  if (!isRecord(existing)) {
    throw new Error('Existing metadata must be a JSON object.');
  }
  return { ...existing, phrasal: metadata.phrasal };
};

export interface CatalogDocument {
  pieces: number;
  uniquePatterns: number;
  patterns: RankedPattern[];
}

export const createCatalogDocument = (catalog: PatternCatalog, top?: number): CatalogDocument => {
  const ranked = rankPatterns(catalog);
  return {
    pieces: catalogPieceCount(catalog),
    uniquePatterns: ranked.length,
    patterns: top === undefined ? ranked : ranked.slice(0, top),
  };
};

export const serializeCatalog = (catalog: PatternCatalog, top?: number): string =>
  `${JSON.stringify(createCatalogDocument(catalog, top), null, 2)}\n`;
