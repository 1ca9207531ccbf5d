import type { MidiPitch, NoteEvent, NoteSpan, Tick, Timeline } from './types.js';

const pushOnset = (onsetsByTick: Map<Tick, MidiPitch[]>, tick: Tick, pitch: MidiPitch): void => {
  const pitches = onsetsByTick.get(tick);
  if (pitches) {
    pitches.push(pitch);
    return;
  }
  onsetsByTick.set(tick, [pitch]);
};

const closeLatestOpenSpan = (stack: NoteSpan[] | undefined, tick: Tick): void => {
  if (!stack) return;
  for (let index = stack.length - 1; index >= 0; index -= 1) {
    const span = stack[index];
    if (span && span.endTick === undefined) {
      span.endTick = tick;
      return;
    }
  }
};

/**
 * Converts delta-timed events into absolute onsets and per-pitch spans.
 *
 * The accumulator advances before each event is applied. An off event closes the most
 * recently opened span of its pitch that is still sounding, so a re-struck pitch pairs
 * last-in first-out. Off events with nothing to close are dropped.
 */
export const buildTimeline = (events: readonly NoteEvent[]): Timeline => {
  const onsetsByTick = new Map<Tick, MidiPitch[]>();
  const spans = new Map<MidiPitch, NoteSpan[]>();
  let tick = 0;
  let onsetCount = 0;

  for (const event of events) {
    tick += event.deltaTicks;
    if (event.kind === 'on') {
      pushOnset(onsetsByTick, tick, event.pitch);
      onsetCount += 1;
      const stack = spans.get(event.pitch) ?? [];
      stack.push({ pitch: event.pitch, startTick: tick });
      spans.set(event.pitch, stack);
    } else {
      closeLatestOpenSpan(spans.get(event.pitch), tick);
    }
  }

  return {
    onsetsByTick,
    onsetTicks: [...onsetsByTick.keys()].sort((a, b) => a - b),
    onsetCount,
    spans,
  };
};

export const findUnmatchedOffEvents = (events: readonly NoteEvent[]): number[] => {
  const open = new Map<MidiPitch, number>();
  const unmatched: number[] = [];
  events.forEach((event, index) => {
    const depth = open.get(event.pitch) ?? 0;
    if (event.kind === 'on') {
      open.set(event.pitch, depth + 1);
    } else if (depth === 0) {
      unmatched.push(index);
    } else {
      open.set(event.pitch, depth - 1);
    }
  });
  return unmatched;
};

export const maxOnsetTick = (timeline: Timeline): Tick | undefined => timeline.onsetTicks.at(-1);

export const pitchRange = (timeline: Timeline): { min: MidiPitch; max: MidiPitch } | null => {
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  for (const pitches of timeline.onsetsByTick.values()) {
    for (const pitch of pitches) {
      min = Math.min(min, pitch);
      max = Math.max(max, pitch);
    }
  }
  return Number.isFinite(min) ? { min, max } : null;
};
