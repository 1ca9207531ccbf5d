import { Midi } from 'tonal';
import { SUBDIVISIONS_PER_BEAT, SUBDIVISIONS_PER_MEASURE } from './model.js';
import type { MeasureFingerprints, MidiPitch, RhythmFingerprint } from './types.js';

export const noteName = (pitch: MidiPitch): string => Midi.midiToNoteName(pitch, { sharps: true });

const SUBDIVISION_SUFFIX = ['', '+', '&', 'a'] as const;

export const beatLabel = (position: number): string => {
  const beat = Math.floor(position / SUBDIVISIONS_PER_BEAT) + 1;
  return `Beat ${beat}${SUBDIVISION_SUFFIX[position % SUBDIVISIONS_PER_BEAT] ?? ''}`;
};

const cellMarker = (position: number): string => {
  if (position % SUBDIVISIONS_PER_BEAT === 0) return String(position / SUBDIVISIONS_PER_BEAT + 1);
  return position % 2 === 0 ? '+' : '.';
};

/** Sixteen cells, plus any cells past the measure that a truncated resolution produced. */
export const gridLength = (rhythm: RhythmFingerprint): number =>
  Math.max(SUBDIVISIONS_PER_MEASURE, ...rhythm.map((position) => position + 1));

/** `[1] .  +  . [2] …`: struck cells are bracketed, quarter cells carry the beat number. */
export const renderRhythmGrid = (rhythm: RhythmFingerprint): string => {
  const struck = new Set(rhythm);
  return Array.from({ length: gridLength(rhythm) }, (_, position) => {
    const marker = cellMarker(position);
    return struck.has(position) ? `[${marker}]` : ` ${marker} `;
  }).join('');
};

export interface PitchCount {
  pitch: MidiPitch;
  count: number;
}

export const mostFrequentPitches = (measures: readonly MeasureFingerprints[], limit = 5): PitchCount[] => {
  const counts = new Map<MidiPitch, number>();
  for (const measure of measures) {
    for (const [, pitch] of measure.melody) counts.set(pitch, (counts.get(pitch) ?? 0) + 1);
  }
  return [...counts.entries()]
    .map(([pitch, count]) => ({ pitch, count }))
    .sort((a, b) => b.count - a.count || a.pitch - b.pitch)
    .slice(0, limit);
};
