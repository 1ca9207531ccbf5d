import {
  beatLabel,
  createCatalogDocument,
  gridLength,
  mostFrequentPitches,
  noteName,
  renderRhythmGrid,
  SUBDIVISIONS_PER_BEAT,
  SUBDIVISIONS_PER_MEASURE,
  type PatternCatalog,
  type PieceAnalysis,
  type RankedPattern,
  type Section,
} from '@formscan/core';

export type ReportNotificationLevel = 'success' | 'error' | 'info';

export interface ReportNotification {
  level: ReportNotificationLevel;
  message: string;
}

export interface PieceReportOptions {
  verbose?: boolean;
}

const RULE = '='.repeat(80);

const plural = (count: number, noun: string): string => `${count} ${noun}${count === 1 ? '' : 's'}`;

const describeSection = (section: Section): string =>
  section.length === 1
    ? `  ${section.label}: measure ${section.startMeasure}`
    : `  ${section.label}: measures ${section.startMeasure}-${section.endMeasure} (${section.length})`;

const measureDetail = (analysis: PieceAnalysis): string[] =>
  analysis.measures.flatMap((measure) => {
    const melody = measure.melody.map(([position, pitch]) => `${beatLabel(position)} ${noteName(pitch)}`);
    return [
      `Measure ${measure.index + 1}: ${renderRhythmGrid(measure.rhythm)}`,
      `  Melody: ${melody.length ? melody.join(', ') : 'rest'}`,
    ];
  });

export const renderPieceReport = (label: string, analysis: PieceAnalysis, options: PieceReportOptions = {}): string => {
  const lines = [RULE, `Processing: ${label}`, RULE];
  if (analysis.measureCount === 0) {
    lines.push('No note events to analyze');
    return lines.join('\n');
  }

  lines.push(`Measures: ${analysis.measureCount}`);
  if (options.verbose) {
    lines.push(...measureDetail(analysis), 'Most frequent notes:');
    lines.push(
      ...mostFrequentPitches(analysis.measures).map(
        ({ pitch, count }) => `  ${pitch} (${noteName(pitch)}): ${plural(count, 'time')}`,
      ),
    );
  }

  if (analysis.formsCoincide) {
    lines.push(`Rhythmic and melodic patterns match exactly: ${analysis.rhythm.form.text}`);
  } else {
    lines.push(
      'Rhythmic and melodic patterns differ:',
      `  Rhythmic: ${analysis.rhythm.form.text}`,
      `  Melodic:  ${analysis.melody.form.text}`,
    );
  }

  if (analysis.notesRange) {
    lines.push(`Note range: ${noteName(analysis.notesRange.min)} to ${noteName(analysis.notesRange.max)}`);
  }
  lines.push(`Rhythmic density: ${analysis.rhythmicDensity.toFixed(2)} onsets per measure`);
  lines.push(`Overall melodic form: ${analysis.overallForm}`);
  lines.push('Sections:', ...analysis.sections.map(describeSection));
  return lines.join('\n');
};

export const renderCorpusSummary = (catalog: PatternCatalog, pieceCount: number, top: number): string => {
  const document = createCatalogDocument(catalog, top);
  const lines = [
    RULE,
    `Corpus: ${plural(pieceCount, 'piece')}, ${plural(document.uniquePatterns, 'unique rhythm pattern')}`,
  ];
  if (!document.patterns.length) {
    lines.push('No rhythm patterns.');
    return lines.join('\n');
  }
  lines.push(`Top ${document.patterns.length}:`);
  document.patterns.forEach((entry, index) => {
    lines.push(
      `${String(index + 1).padStart(3)}. ${renderRhythmGrid(entry.pattern)} support ${entry.support}, occurrences ${entry.occurrences}`,
    );
  });
  return lines.join('\n');
};

export interface PieceRow {
  label: string;
  status: 'analyzed' | 'skipped' | 'failed';
  measureCount: number;
  rhythmicForm: string;
  melodicForm: string;
  /** Failure or skip reason. */
  detail?: string;
}

export interface CorpusReportModel {
  title: string;
  directory: string;
  pieceCount: number;
  uniquePatterns: number;
  patterns: RankedPattern[];
  pieces: PieceRow[];
  notifications: ReportNotification[];
}

const escapeHtml = (value: string): string =>
  value
    .replaceAll('&', '&amp;')
    .replaceAll('<', '&lt;')
    .replaceAll('>', '&gt;')
    .replaceAll('"', '&quot;')
    .replaceAll("'", '&#39;');

const notificationClass = (level: ReportNotificationLevel): string => {
  switch (level) {
    case 'success':
      return 'notification success';
    case 'error':
      return 'notification error';
    default:
      return 'notification info';
  }
};

const renderStats = (model: CorpusReportModel): string => {
  const measures = model.pieces.reduce((total, piece) => total + piece.measureCount, 0);
  const stats = [
    { label: 'Files', value: String(model.pieces.length) },
    { label: 'Analyzed', value: String(model.pieceCount) },
    { label: 'Measures', value: String(measures) },
    { label: 'Unique patterns', value: String(model.uniquePatterns) },
  ];
  return `<dl class="stats-grid">${stats
    .map((stat) => `<div class="stat-card"><dt>${escapeHtml(stat.label)}</dt><dd>${escapeHtml(stat.value)}</dd></div>`)
    .join('')}</dl>`;
};

const renderNotifications = (notifications: ReportNotification[]): string => {
  if (!notifications.length) {
    return '<p class="empty-state">No notifications.</p>';
  }

  return `<ul class="notification-list">${notifications
    .map((notification) => `<li class="${notificationClass(notification.level)}">${escapeHtml(notification.message)}</li>`)
    .join('')}</ul>`;
};

const CELL = 22;

const renderPatternGrid = (entry: RankedPattern, rank: number): string => {
  const struck = new Set(entry.pattern);
  const length = gridLength(entry.pattern);
  const cells = Array.from({ length }, (_, position) => {
    const beatStart = position % SUBDIVISIONS_PER_BEAT === 0;
    const overflow = position >= SUBDIVISIONS_PER_MEASURE;
    const classes = ['cell', struck.has(position) ? 'struck' : '', beatStart ? 'beat' : '', overflow ? 'overflow' : '']
      .filter(Boolean)
      .join(' ');
    return `<rect x="${position * CELL + 2}" y="4" width="${CELL - 4}" height="24" rx="4" class="${classes}" data-position="${position}" />`;
  }).join('');
  const positions = entry.pattern.length ? entry.pattern.join(', ') : 'none';
  return `<figure class="pattern"><svg viewBox="0 0 ${length * CELL} 32" class="pattern-grid" role="img" aria-label="Pattern ${rank}: positions ${positions}">${cells}</svg><figcaption>#${rank} · support ${entry.support} · occurrences ${entry.occurrences}</figcaption></figure>`;
};

const renderPatterns = (patterns: RankedPattern[]): string => {
  if (!patterns.length) {
    return '<p class="empty-state">No rhythm patterns found.</p>';
  }
  return `<div class="pattern-list">${patterns.map((entry, index) => renderPatternGrid(entry, index + 1)).join('')}</div>`;
};

const BAR_WIDTH = 28;
const CHART_HEIGHT = 120;

const renderSupportChart = (patterns: RankedPattern[], pieceCount: number): string => {
  if (!patterns.length || pieceCount === 0) {
    return '';
  }
  const bars = patterns
    .map((entry, index) => {
      const height = Math.round((entry.support / pieceCount) * CHART_HEIGHT);
      const x = index * (BAR_WIDTH + 8) + 4;
      return `<g class="bar" data-rank="${index + 1}"><rect x="${x}" y="${CHART_HEIGHT - height}" width="${BAR_WIDTH}" height="${height}" rx="3" /><text x="${x + BAR_WIDTH / 2}" y="${CHART_HEIGHT + 14}">${index + 1}</text></g>`;
    })
    .join('');
  const width = patterns.length * (BAR_WIDTH + 8) + 8;
  return `<svg viewBox="0 0 ${width} ${CHART_HEIGHT + 20}" class="support-chart" role="img" aria-label="Files containing each of the top ${patterns.length} patterns">${bars}</svg>`;
};

const renderPieceTable = (pieces: PieceRow[]): string => {
  if (!pieces.length) {
    return '<p class="empty-state">No MIDI files.</p>';
  }
  const rows = pieces
    .map((piece) => {
      const forms =
        piece.status === 'analyzed'
          ? `<td><code>${escapeHtml(piece.rhythmicForm)}</code></td><td><code>${escapeHtml(piece.melodicForm)}</code></td>`
          : `<td colspan="2" class="detail">${escapeHtml(piece.detail ?? piece.status)}</td>`;
      return `<tr class="piece ${piece.status}"><td>${escapeHtml(piece.label)}</td><td>${piece.measureCount}</td>${forms}</tr>`;
    })
    .join('');
  return `<table class="piece-table"><thead><tr><th>File</th><th>Measures</th><th>Rhythmic form</th><th>Melodic form</th></tr></thead><tbody>${rows}</tbody></table>`;
};

export const renderCorpusHtml = (model: CorpusReportModel): string => `<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1" />
    <title>${escapeHtml(model.title)}</title>
    <style>
      :root {
        color-scheme: dark;
        --bg: #09090f;
        --panel: #141422;
        --text: #f6f7ff;
        --muted: #b1b7d9;
        --accent: #6ee7ff;
        font-family: Inter, ui-sans-serif, system-ui, -apple-system, Segoe UI, Roboto, sans-serif;
      }

      * { box-sizing: border-box; }
      body { margin: 0; background: var(--bg); color: var(--text); padding: 1rem; }
      main { width: min(1100px, 100%); margin: 0 auto; display: grid; gap: 1rem; }
      section { background: var(--panel); border: 1px solid #313755; border-radius: 14px; padding: 0.9rem; }
      h1 { margin: 0; font-size: clamp(1.1rem, 2.3vw, 1.6rem); }
      h2 { margin: 0; font-size: 0.86rem; letter-spacing: 0.06em; text-transform: uppercase; color: var(--muted); }
      .subhead { color: var(--muted); margin: 0.4rem 0 0; }
      .stats-grid { margin: 0.7rem 0 0; padding: 0; display: grid; grid-template-columns: repeat(auto-fit, minmax(130px, 1fr)); gap: 0.55rem; }
      .stat-card { background: #171d35; border: 1px solid #374167; border-radius: 12px; padding: 0.65rem; }
      .stat-card dt { font-size: 0.74rem; color: var(--muted); margin-bottom: 0.3rem; }
      .stat-card dd { margin: 0; font-size: 1.1rem; font-weight: 700; }
      .pattern-list { display: grid; gap: 0.6rem; margin-top: 0.7rem; }
      .pattern { margin: 0; }
      .pattern-grid { width: min(360px, 100%); }
      .cell { fill: #171d35; stroke: #374167; }
      .cell.beat { stroke: #6b7bb8; }
      .cell.struck { fill: var(--accent); }
      .cell.overflow { stroke: #d9822b; stroke-dasharray: 3 2; }
      .support-chart { width: 100%; max-width: 480px; margin-top: 0.7rem; }
      .bar rect { fill: var(--accent); }
      .bar text { fill: var(--muted); font-size: 10px; text-anchor: middle; }
      .piece-table { width: 100%; border-collapse: collapse; margin-top: 0.7rem; }
      .piece-table th, .piece-table td { text-align: left; padding: 0.35rem 0.5rem; border-bottom: 1px solid #2f3452; }
      .piece.failed .detail { color: #fb7185; }
      .piece.skipped .detail { color: var(--muted); }
      .notification-list { list-style: none; margin: 0.7rem 0 0; padding: 0; display: grid; gap: 0.45rem; }
      .notification { border-radius: 10px; padding: 0.65rem 0.75rem; border: 1px solid transparent; }
      .notification.info { background: rgb(96 165 250 / 16%); border-color: rgb(125 211 252 / 40%); }
      .notification.success { background: rgb(52 211 153 / 16%); border-color: rgb(167 243 208 / 40%); }
      .notification.error { background: rgb(251 113 133 / 16%); border-color: rgb(251 113 133 / 35%); }
      .empty-state { margin: 0.9rem 0 0; color: var(--muted); font-style: italic; }
    </style>
  </head>
  <body>
    <main>
      <header>
        <h1>${escapeHtml(model.title)}</h1>
        <p class="subhead">${escapeHtml(model.directory)}</p>
      </header>
      <section>
        <h2>Corpus</h2>
        ${renderStats(model)}
      </section>
      <section>
        <h2>Top rhythm patterns</h2>
        ${renderPatterns(model.patterns)}
        ${renderSupportChart(model.patterns, model.pieceCount)}
      </section>
      <section>
        <h2>Pieces</h2>
        ${renderPieceTable(model.pieces)}
      </section>
      <section>
        <h2>Notifications</h2>
        ${renderNotifications(model.notifications)}
      </section>
    </main>
  </body>
</html>
`;
