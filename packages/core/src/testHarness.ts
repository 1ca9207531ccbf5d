import { SUBDIVISIONS_PER_BEAT, SUBDIVISIONS_PER_MEASURE } from './model.js';
import type { MidiPitch, NoteEvent, Tick } from './types.js';

export interface PlacedNote {
  tick: Tick;
  pitch: MidiPitch;
  durationTicks?: Tick;
}

/**
 * Serializes absolute notes into the delta-timed stream a decoder would produce.
 * At equal ticks, releases come before attacks.
 */
export const eventsFromNotes = (notes: readonly PlacedNote[], defaultDurationTicks = 1): NoteEvent[] => {
  const timed = notes.flatMap((note) => [
    { tick: note.tick, kind: 'on' as const, pitch: note.pitch },
    { tick: note.tick + (note.durationTicks ?? defaultDurationTicks), kind: 'off' as const, pitch: note.pitch },
  ]);
  timed.sort((a, b) => a.tick - b.tick || (a.kind === b.kind ? 0 : a.kind === 'off' ? -1 : 1));

  let previous = 0;
  return timed.map((event) => {
    const deltaTicks = event.tick - previous;
    previous = event.tick;
    return { kind: event.kind, pitch: event.pitch, deltaTicks };
  });
};

/**
 * One measure per entry: each entry lists struck sixteenth positions, either bare (played
 * on `pitch`) or as `[position, pitch]` pairs.
 */
export const eventsFromMeasures = (
  ppqn: number,
  measures: ReadonlyArray<ReadonlyArray<number | readonly [number, MidiPitch]>>,
  pitch: MidiPitch = 60,
): NoteEvent[] => {
  const subdivisionTicks = Math.floor(ppqn / SUBDIVISIONS_PER_BEAT);
  const notes = measures.flatMap((cells, measureIndex) =>
    cells.map((cell): PlacedNote => {
      const [position, notePitch]: readonly [number, MidiPitch] = typeof cell === 'number' ? [cell, pitch] : cell;
      return {
        tick: (measureIndex * SUBDIVISIONS_PER_MEASURE + position) * subdivisionTicks,
        pitch: notePitch,
      };
    }),
  );
  return eventsFromNotes(notes, subdivisionTicks);
};
