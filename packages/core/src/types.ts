export type Tick = number;
export type MidiPitch = number;

export interface NoteEvent {
  kind: 'on' | 'off';
  pitch: MidiPitch;
  deltaTicks: Tick;
}

export interface NoteSpan {
  pitch: MidiPitch;
  startTick: Tick;
  endTick?: Tick;
}

export interface Timeline {
  onsetsByTick: Map<Tick, MidiPitch[]>;
  onsetTicks: Tick[];
  onsetCount: number;
  spans: Map<MidiPitch, NoteSpan[]>;
}

export interface Grid {
  ppqn: number;
  measureLengthTicks: Tick;
  subdivisionTicks: Tick;
  subdivisionsPerMeasure: 16;
}

export interface GridPosition {
  measureIndex: number;
  subdivision: number;
}

export type RhythmFingerprint = readonly number[];

export type MelodyOnset = readonly [position: number, pitch: MidiPitch];

export type MelodyFingerprint = readonly MelodyOnset[];

export interface MeasureFingerprints {
  index: number;
  rhythm: RhythmFingerprint;
  melody: MelodyFingerprint;
}

export interface PatternGroup {
  ordinal: number;
  label: string;
  measures: number[];
}

export interface FormSequence {
  ordinals: number[];
  labels: string[];
  text: string;
}

export interface Section {
  label: string;
  startMeasure: number;
  endMeasure: number;
  length: number;
}

export interface PhrasalAnalysis {
  groups: PatternGroup[];
  form: FormSequence;
}

export interface ValidationIssue {
  code:
    | 'EVENT_UNMATCHED_OFF'
    | 'EVENT_INVALID_PITCH'
    | 'EVENT_INVALID_DELTA'
    | 'RESOLUTION_INVALID'
    | 'RESOLUTION_TRUNCATED';
  message: string;
  eventIndex?: number;
}

export interface PieceAnalysis {
  measureCount: number;
  rhythm: PhrasalAnalysis;
  melody: PhrasalAnalysis;
  formsCoincide: boolean;
  sections: Section[];
  overallForm: string;
  notesRange: { min: MidiPitch; max: MidiPitch } | null;
  rhythmicDensity: number;
  onsetCount: number;
  measures: MeasureFingerprints[];
  issues: ValidationIssue[];
}

export interface CatalogEntry {
  pattern: number[];
  occurrences: number;
  pieces: ReadonlySet<string>;
}

export type PatternCatalog = ReadonlyMap<string, CatalogEntry>;

export interface RankedPattern {
  pattern: number[];
  support: number;
  occurrences: number;
  pieces: string[];
}
