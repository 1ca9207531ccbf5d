import { describe, expect, it } from 'vitest';
import { analyzePiece, catalogFromPiece, eventsFromMeasures, mergeAllCatalogs, rankPatterns } from '@formscan/core';

import { renderCorpusHtml, renderCorpusSummary, renderPieceReport } from './index.js';

const RULE = '='.repeat(80);

describe('@formscan/report', () => {
  it('prints a piece report with forms, range, density and sections', () => {
    const analysis = analyzePiece(eventsFromMeasures(128, [[0, 4, 8, 12], [0, 2, 8, 12], [0, 4, 8, 12]]), 128);
    expect(renderPieceReport('etude.mid', analysis).split('\n')).toEqual([
      RULE,
      'Processing: etude.mid',
      RULE,
      'Measures: 3',
      'Rhythmic and melodic patterns match exactly: ABA',
      'Note range: C4 to C4',
      'Rhythmic density: 4.00 onsets per measure',
      'Overall melodic form: ABA',
      'Sections:',
      '  A: measure 1',
      '  B: measure 2',
      '  A: measure 3',
    ]);
  });

  it('shows both forms when they differ and adds per-measure detail when verbose', () => {
    const analysis = analyzePiece(eventsFromMeasures(128, [[0, 4], [[0, 62], [4, 60]]]), 128);
    const lines = renderPieceReport('duet.mid', analysis, { verbose: true }).split('\n');
    expect(lines).toContain('Rhythmic and melodic patterns differ:');
    expect(lines).toContain('  Rhythmic: AA');
    expect(lines).toContain('  Melodic:  AB');
    expect(lines).toContain('Measure 1: [1] .  +  . [2] .  +  .  3  .  +  .  4  .  +  . ');
    expect(lines).toContain('  Melody: Beat 1 C4, Beat 2 C4');
    expect(lines).toContain('  Melody: Beat 1 D4, Beat 2 C4');
    expect(lines).toContain('  60 (C4): 3 times');
    expect(lines).toContain('  62 (D4): 1 time');
    expect(lines).toContain('  B: measure 2');
  });

  it('notes when a piece has nothing to analyze', () => {
    expect(renderPieceReport('empty.mid', analyzePiece([], 96)).split('\n').at(-1)).toBe('No note events to analyze');
  });

  it('summarizes the top corpus patterns', () => {
    const catalog = mergeAllCatalogs([catalogFromPiece('a.mid', [[0], []]), catalogFromPiece('b.mid', [[0]])]);
    expect(renderCorpusSummary(catalog, 2, 1).split('\n')).toEqual([
      RULE,
      'Corpus: 2 pieces, 2 unique rhythm patterns',
      'Top 1:',
      '  1. [1] .  +  .  2  .  +  .  3  .  +  .  4  .  +  .  support 2, occurrences 2',
    ]);
    expect(renderCorpusSummary(mergeAllCatalogs([]), 0, 5).split('\n').slice(1)).toEqual([
      'Corpus: 0 pieces, 0 unique rhythm patterns',
      'No rhythm patterns.',
    ]);
  });

  it('renders an escaped html corpus report with grids, chart and piece table', () => {
    const catalog = mergeAllCatalogs([catalogFromPiece('a.mid', [[0, 4], [0, 2]]), catalogFromPiece('b.mid', [[0, 4]])]);
    const html = renderCorpusHtml({
      title: 'Corpus <Etudes>',
      directory: '/music & more',
      pieceCount: 2,
      uniquePatterns: 2,
      patterns: rankPatterns(catalog),
      pieces: [
        { label: 'a.mid', status: 'analyzed', measureCount: 2, rhythmicForm: 'AB', melodicForm: 'AB' },
        { label: 'b.mid', status: 'analyzed', measureCount: 1, rhythmicForm: 'A', melodicForm: 'A' },
        { label: 'c "broken".mid', status: 'failed', measureCount: 0, rhythmicForm: '', melodicForm: '', detail: 'Bad <header>' },
      ],
      notifications: [{ level: 'error', message: 'Failed to analyze c "broken".mid' }],
    });

    expect(html).toContain('<!doctype html>');
    expect(html).toContain('<title>Corpus &lt;Etudes&gt;</title>');
    expect(html).toContain('/music &amp; more');
    expect(html).toContain('<div class="stat-card"><dt>Files</dt><dd>3</dd></div>');
    expect(html).toContain('<div class="stat-card"><dt>Measures</dt><dd>3</dd></div>');
    expect(html).toContain('aria-label="Pattern 1: positions 0, 4"');
    expect(html).toContain('class="cell struck beat" data-position="4"');
    expect(html).toContain('class="cell struck" data-position="2"');
    expect(html).toContain('class="cell beat" data-position="8"');
    expect(html).toContain('<figcaption>#1 · support 2 · occurrences 2</figcaption>');
    expect(html).toContain('<g class="bar" data-rank="1"><rect x="4" y="0" width="28" height="120" rx="3" />');
    expect(html).toContain('<g class="bar" data-rank="2"><rect x="40" y="60" width="28" height="60" rx="3" />');
    expect(html).toContain('<td><code>AB</code></td>');
    expect(html).toContain('<td>c &quot;broken&quot;.mid</td>');
    expect(html).toContain('<td colspan="2" class="detail">Bad &lt;header&gt;</td>');
    expect(html).toContain('<li class="notification error">Failed to analyze c &quot;broken&quot;.mid</li>');
  });

  it('draws pattern cells past the sixteenth as overflow cells', () => {
    const html = renderCorpusHtml({
      title: 'Coarse',
      directory: '.',
      pieceCount: 1,
      uniquePatterns: 1,
      patterns: rankPatterns(catalogFromPiece('coarse.mid', [[0, 17]])),
      pieces: [],
      notifications: [],
    });
    expect(html).toContain('<svg viewBox="0 0 396 32" class="pattern-grid"');
    expect(html).toContain('class="cell beat overflow" data-position="16"');
    expect(html).toContain('class="cell struck overflow" data-position="17"');
    expect(html).toContain('class="cell" data-position="15"');
  });

  it('falls back to empty states', () => {
    const html = renderCorpusHtml({
      title: 'Empty',
      directory: '.',
      pieceCount: 0,
      uniquePatterns: 0,
      patterns: [],
      pieces: [],
      notifications: [],
    });
    expect(html).toContain('No rhythm patterns found.');
    expect(html).toContain('No MIDI files.');
    expect(html).toContain('No notifications.');
    expect(html).not.toContain('class="support-chart"');
  });
});
