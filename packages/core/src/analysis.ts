import { extractFingerprints, melodyEquals, rhythmEquals } from './fingerprints.js';
import { describeForm, extractSections, formsCoincide, sequenceForm } from './form.js';
import { groupMeasures } from './grouping.js';
import { createGrid, isUsableResolution } from './model.js';
import { buildTimeline, pitchRange } from './timeline.js';
import type { NoteEvent, PieceAnalysis, PhrasalAnalysis, ValidationIssue } from './types.js';
import { validateNoteEvents } from './validation.js';

const emptyPhrasal = (): PhrasalAnalysis => ({ groups: [], form: { ordinals: [], labels: [], text: '' } });

export const emptyAnalysis = (issues: ValidationIssue[] = []): PieceAnalysis => ({
  measureCount: 0,
  rhythm: emptyPhrasal(),
  melody: emptyPhrasal(),
  formsCoincide: true,
  sections: [],
  overallForm: '',
  notesRange: null,
  rhythmicDensity: 0,
  onsetCount: 0,
  measures: [],
  issues,
});

/**
 * Single-piece pipeline: timeline, grid, fingerprints, groups, forms and sections.
 * Never throws for data-shape problems; they come back as `issues` and an empty result.
 */
export const analyzePiece = (events: readonly NoteEvent[], ppqn: number): PieceAnalysis => {
  const issues = validateNoteEvents(events, ppqn);
  if (!isUsableResolution(ppqn) || events.length === 0) {
    return emptyAnalysis(issues);
  }

  const timeline = buildTimeline(events);
  const measures = extractFingerprints(timeline, createGrid(ppqn));
  if (measures.length === 0) {
    return emptyAnalysis(issues);
  }

  const rhythmGroups = groupMeasures(
    measures.map((measure) => measure.rhythm),
    rhythmEquals,
  );
  const melodyGroups = groupMeasures(
    measures.map((measure) => measure.melody),
    melodyEquals,
  );
  const rhythmForm = sequenceForm(rhythmGroups, measures.length);
  const melodyForm = sequenceForm(melodyGroups, measures.length);
  const sections = extractSections(melodyForm);

  return {
    measureCount: measures.length,
    rhythm: { groups: rhythmGroups, form: rhythmForm },
    melody: { groups: melodyGroups, form: melodyForm },
    formsCoincide: formsCoincide(rhythmForm, melodyForm),
    sections,
    overallForm: describeForm(sections),
    notesRange: pitchRange(timeline),
    rhythmicDensity: timeline.onsetCount / measures.length,
    onsetCount: timeline.onsetCount,
    measures,
    issues,
  };
};
