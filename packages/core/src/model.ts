import type { Grid, GridPosition, Tick } from './types.js';

export const BEATS_PER_MEASURE = 4;
export const SUBDIVISIONS_PER_BEAT = 4;
export const SUBDIVISIONS_PER_MEASURE = 16;

export const isUsableResolution = (ppqn: number): boolean => Number.isInteger(ppqn) && ppqn > 0;

/**
 * Sixteenth-note grid over 4/4 measures. The meter is assumed, never inferred.
 *
 * `subdivisionTicks` is `floor(ppqn / 4)`, so a resolution that is not a multiple of four
 * drifts slightly against the true sixteenth. That drift is an accepted approximation.
 */
export const createGrid = (ppqn: number): Grid => ({
  ppqn,
  measureLengthTicks: BEATS_PER_MEASURE * ppqn,
  subdivisionTicks: Math.max(1, Math.floor(ppqn / SUBDIVISIONS_PER_BEAT)),
  subdivisionsPerMeasure: SUBDIVISIONS_PER_MEASURE,
});

export const measureIndexOf = (grid: Grid, tick: Tick): number => Math.floor(tick / grid.measureLengthTicks);

export const measureStart = (grid: Grid, measureIndex: number): Tick => measureIndex * grid.measureLengthTicks;

export const quantizeTick = (grid: Grid, tick: Tick): GridPosition => {
  const measureIndex = measureIndexOf(grid, tick);
  const offset = tick - measureStart(grid, measureIndex);
  // Truncated subdivision ticks can place the last ticks of a measure past cell 15.
  return { measureIndex, subdivision: Math.floor(offset / grid.subdivisionTicks) };
};

export const countMeasures = (grid: Grid, maxOnsetTick: Tick | undefined): number =>
  maxOnsetTick === undefined ? 0 : measureIndexOf(grid, maxOnsetTick) + 1;

export const truncatesSubdivisions = (ppqn: number): boolean => ppqn % SUBDIVISIONS_PER_BEAT !== 0;
