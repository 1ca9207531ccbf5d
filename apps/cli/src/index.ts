import { readdir, readFile, stat, writeFile } from 'node:fs/promises';
import { join, relative, sep } from 'node:path';
import {
  analyzePiece,
  catalogFromPiece,
  catalogPieceCount,
  createPieceMetadata,
  emptyCatalog,
  mergeAllCatalogs,
  mergePieceMetadata,
  rankPatterns,
  serializeCatalog,
  serializePieceMetadata,
  type PatternCatalog,
  type PieceAnalysis,
} from '@formscan/core';
import { decodeMidi } from '@formscan/midi';
import {
  renderCorpusHtml,
  renderCorpusSummary,
  renderPieceReport,
  type CorpusReportModel,
  type PieceRow,
} from '@formscan/report';
import type { CliOptions } from './options.js';

export type NotificationLevel = 'success' | 'error' | 'info';

export interface Notification {
  id: string;
  level: NotificationLevel;
  message: string;
}

export interface CorpusIo {
  readFile: (path: string) => Promise<Uint8Array>;
  /** Resolves `undefined` when the file does not exist. */
  readTextIfExists: (path: string) => Promise<string | undefined>;
  writeFile: (path: string, data: string) => Promise<void>;
  isDirectory: (path: string) => Promise<boolean>;
  write: (line: string) => void;
  writeError: (line: string) => void;
}

const isMissingFileError = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

export const nodeIo: CorpusIo = {
  readFile: async (path) => await readFile(path),
  readTextIfExists: async (path) => {
    try {
      return await readFile(path, 'utf8');
    } catch (error) {
      if (isMissingFileError(error)) {
        return undefined;
      }
      throw error;
    }
  },
  writeFile: async (path, data) => {
    await writeFile(path, data, 'utf8');
  },
  isDirectory: async (path) => {
    try {
      return (await stat(path)).isDirectory();
    } catch (error) {
      if (isMissingFileError(error)) {
        return false;
      }
      throw error;
    }
  },
  write: (line) => {
    process.stdout.write(`${line}\n`);
  },
  writeError: (line) => {
    process.stderr.write(`${line}\n`);
  },
};

const MIDI_EXTENSION = /\.midi?$/i;

/** Every `.mid`/`.midi` file below `directory`, sorted by path. */
export const discoverMidiFiles = async (directory: string): Promise<string[]> => {
  const entries = await readdir(directory, { withFileTypes: true });
  const nested = await Promise.all(
    entries.map(async (entry): Promise<string[]> => {
      const path = join(directory, entry.name);
      if (entry.isDirectory()) {
        return await discoverMidiFiles(path);
      }
      return entry.isFile() && MIDI_EXTENSION.test(entry.name) ? [path] : [];
    }),
  );
  return nested.flat().sort();
};

export const metadataPathFor = (path: string): string => `${path}.meta.json`;

const pieceLabel = (directory: string, path: string): string => relative(directory, path).split(sep).join('/');

interface OutcomeBase {
  path: string;
  label: string;
}

/** `error` is set when the existing side-file could not be read or the new one written. */
export interface MetadataWrite {
  path: string;
  error?: string;
}

export type FileOutcome =
  | (OutcomeBase & {
      status: 'analyzed';
      analysis: PieceAnalysis;
      catalog: PatternCatalog;
      warnings: string[];
      metadata?: MetadataWrite;
    })
  | (OutcomeBase & { status: 'skipped'; analysis: PieceAnalysis; reason: string; warnings: string[] })
  | (OutcomeBase & { status: 'failed'; message: string });

const persistMetadata = async (path: string, analysis: PieceAnalysis, io: CorpusIo): Promise<MetadataWrite> => {
  try {
    const document = mergePieceMetadata(await io.readTextIfExists(path), createPieceMetadata(analysis));
    await io.writeFile(path, serializePieceMetadata(document));
    return { path };
  } catch (error) {
    return { path, error: error instanceof Error ? error.message : 'Unknown metadata error.' };
  }
};

/** A side-file failure leaves the piece analyzed; only decoding and analysis errors fail it. */
export const analyzeFile = async (
  path: string,
  options: Pick<CliOptions, 'directory' | 'metadata' | 'track'>,
  io: CorpusIo,
): Promise<FileOutcome> => {
  const label = pieceLabel(options.directory, path);
  try {
    const decoded = decodeMidi(await io.readFile(path), { track: options.track, source: label });
    const analysis = analyzePiece(decoded.events, decoded.ppqn);
    if (analysis.measureCount === 0) {
      const reason = analysis.issues.some((issue) => issue.code === 'RESOLUTION_INVALID')
        ? 'Unusable time division.'
        : 'No note events to analyze.';
      return { status: 'skipped', path, label, analysis, reason, warnings: decoded.warnings };
    }

    const catalog = catalogFromPiece(label, analysis.measures.map((measure) => measure.rhythm));
    if (!options.metadata) {
      return { status: 'analyzed', path, label, analysis, catalog, warnings: decoded.warnings };
    }

    const metadata = await persistMetadata(metadataPathFor(path), analysis, io);
    return { status: 'analyzed', path, label, analysis, catalog, warnings: decoded.warnings, metadata };
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown analysis error.';
    return { status: 'failed', path, label, message };
  }
};

export interface CorpusRun {
  exitCode: number;
  files: string[];
  outcomes: FileOutcome[];
  catalog: PatternCatalog;
  notifications: Notification[];
}

const chunk = <T>(items: readonly T[], size: number): T[][] =>
  Array.from({ length: Math.ceil(items.length / size) }, (_, index) => items.slice(index * size, index * size + size));

const toPieceRow = (outcome: FileOutcome): PieceRow => {
  switch (outcome.status) {
    case 'analyzed':
      return {
        label: outcome.label,
        status: 'analyzed',
        measureCount: outcome.analysis.measureCount,
        rhythmicForm: outcome.analysis.rhythm.form.text,
        melodicForm: outcome.analysis.melody.form.text,
      };
    case 'skipped':
      return { label: outcome.label, status: 'skipped', measureCount: 0, rhythmicForm: '', melodicForm: '', detail: outcome.reason };
    default:
      return { label: outcome.label, status: 'failed', measureCount: 0, rhythmicForm: '', melodicForm: '', detail: outcome.message };
  }
};

export const createReportModel = (
  options: Pick<CliOptions, 'directory' | 'top'>,
  run: Pick<CorpusRun, 'outcomes' | 'catalog' | 'notifications'>,
): CorpusReportModel => {
  const ranked = rankPatterns(run.catalog);
  return {
    title: 'Rhythm pattern corpus report',
    directory: options.directory,
    pieceCount: catalogPieceCount(run.catalog),
    uniquePatterns: ranked.length,
    patterns: ranked.slice(0, options.top),
    pieces: run.outcomes.map(toPieceRow),
    notifications: run.notifications.map((notification) => ({ level: notification.level, message: notification.message })),
  };
};

/**
 * Analyzes every MIDI file below `options.directory`, `options.concurrency` files at a
 * time. Per-file failures become error notifications and the batch continues.
 */
export const runCorpus = async (options: CliOptions, io: CorpusIo = nodeIo): Promise<CorpusRun> => {
  const notifications: Notification[] = [];
  const notify = (level: NotificationLevel, message: string): void => {
    notifications.push({ id: `notification_${notifications.length + 1}`, level, message });
    if (level === 'error') {
      io.writeError(`Error: ${message}`);
    } else {
      io.write(message);
    }
  };

  if (!(await io.isDirectory(options.directory))) {
    notify('error', `${options.directory} is not a valid directory`);
    return { exitCode: 1, files: [], outcomes: [], catalog: emptyCatalog(), notifications };
  }

  const files = await discoverMidiFiles(options.directory);
  if (!files.length) {
    notify('info', `No MIDI files found in ${options.directory}`);
    return { exitCode: 0, files, outcomes: [], catalog: emptyCatalog(), notifications };
  }

  notify('info', `Found ${files.length} MIDI file${files.length === 1 ? '' : 's'}`);
  if (options.verbose) {
    files.forEach((file) => io.write(`  - ${pieceLabel(options.directory, file)}`));
  }

  const outcomes: FileOutcome[] = [];
  for (const batch of chunk(files, options.concurrency)) {
    outcomes.push(...(await Promise.all(batch.map((file) => analyzeFile(file, options, io)))));
  }

  for (const outcome of outcomes) {
    if (outcome.status === 'failed') {
      notify('error', `Could not analyze ${outcome.label}: ${outcome.message}`);
      continue;
    }
    io.write(renderPieceReport(outcome.label, outcome.analysis, { verbose: options.verbose }));
    outcome.warnings.forEach((warning) => notify('info', `${outcome.label}: ${warning}`));
    outcome.analysis.issues.forEach((issue) => notify('info', `${outcome.label}: ${issue.message}`));
    if (outcome.status === 'skipped') {
      notify('info', `Skipped ${outcome.label}: ${outcome.reason}`);
    } else if (outcome.metadata?.error !== undefined) {
      notify('error', `Could not write ${outcome.metadata.path}: ${outcome.metadata.error}`);
    } else if (outcome.metadata) {
      notify('success', `Wrote ${outcome.metadata.path}`);
    }
  }

  const catalog = mergeAllCatalogs(
    outcomes.flatMap((outcome) => (outcome.status === 'analyzed' ? [outcome.catalog] : [])),
  );
  io.write(renderCorpusSummary(catalog, catalogPieceCount(catalog), options.top));

  if (options.catalogPath) {
    await io.writeFile(options.catalogPath, serializeCatalog(catalog));
    notify('success', `Wrote pattern catalog to ${options.catalogPath}`);
  }
  if (options.reportPath) {
    // The report lists every notification raised up to this point.
    await io.writeFile(options.reportPath, renderCorpusHtml(createReportModel(options, { outcomes, catalog, notifications })));
    notify('success', `Wrote HTML report to ${options.reportPath}`);
  }

  return { exitCode: 0, files, outcomes, catalog, notifications };
};
