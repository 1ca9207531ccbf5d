import { countMeasures, quantizeTick } from './model.js';
import { maxOnsetTick } from './timeline.js';
import type { Grid, MeasureFingerprints, MelodyFingerprint, MelodyOnset, RhythmFingerprint, Timeline } from './types.js';

const compareOnsets = (a: MelodyOnset, b: MelodyOnset): number => a[0] - b[0] || a[1] - b[1];

export const extractFingerprints = (timeline: Timeline, grid: Grid): MeasureFingerprints[] => {
  const measureCount = countMeasures(grid, maxOnsetTick(timeline));
  const positions = Array.from({ length: measureCount }, () => new Set<number>());
  const melodies = Array.from({ length: measureCount }, (): MelodyOnset[] => []);

  for (const tick of timeline.onsetTicks) {
    const { measureIndex, subdivision } = quantizeTick(grid, tick);
    positions[measureIndex]?.add(subdivision);
    const pitches = [...(timeline.onsetsByTick.get(tick) ?? [])].sort((a, b) => a - b);
    for (const pitch of pitches) {
      melodies[measureIndex]?.push([subdivision, pitch]);
    }
  }

  return positions.map((cells, index) => ({
    index,
    rhythm: [...cells].sort((a, b) => a - b),
    melody: (melodies[index] ?? []).sort(compareOnsets),
  }));
};

export const rhythmEquals = (a: RhythmFingerprint, b: RhythmFingerprint): boolean =>
  a.length === b.length && a.every((position, index) => position === b[index]);

export const melodyEquals = (a: MelodyFingerprint, b: MelodyFingerprint): boolean =>
  a.length === b.length &&
  a.every(([position, pitch], index) => {
    const other = b[index];
    return other !== undefined && other[0] === position && other[1] === pitch;
  });
