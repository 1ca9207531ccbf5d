import { parseMidi, type MidiData, type MidiEvent } from 'midi-file';
import type { NoteEvent } from '@formscan/core';

export interface DecodeOptions {
  /** Track to read, 0-based. */
  track?: number;
  /** Names the source in error messages. */
  source?: string;
}

export interface DecodedMidi {
  format: number;
  trackCount: number;
  /** Ticks per quarter note; 0 when the file uses SMPTE time division. */
  ppqn: number;
  trackName?: string;
  events: NoteEvent[];
  warnings: string[];
}

export class MidiDecodeError extends Error {
  readonly source: string;

  constructor(source: string, message: string) {
    super(`${source}: ${message}`);
    this.name = 'MidiDecodeError';
    this.source = source;
  }
}

const readMidi = (bytes: Uint8Array, source: string): MidiData => {
  try {
    return parseMidi(bytes);
  } catch (error) {
    // midi-file throws plain strings for malformed chunks.
    const message = error instanceof Error ? error.message : typeof error === 'string' ? error : 'Unreadable MIDI data.';
    throw new MidiDecodeError(source, message);
  }
};

const toNoteEvent = (event: MidiEvent, deltaTicks: number): NoteEvent | undefined => {
  if (event.type === 'noteOn') {
    return { kind: event.velocity === 0 ? 'off' : 'on', pitch: event.noteNumber, deltaTicks };
  }
  if (event.type === 'noteOff') {
    return { kind: 'off', pitch: event.noteNumber, deltaTicks };
  }
  return undefined;
};

/**
 * Reduces one track of a standard MIDI file to note on/off events. Time carried by
 * meta, controller and other non-note events is folded into the next note's delta.
 */
export const decodeMidi = (bytes: Uint8Array, options: DecodeOptions = {}): DecodedMidi => {
  const source = options.source ?? 'midi';
  const trackIndex = options.track ?? 0;
  const midi = readMidi(bytes, source);
  const track = midi.tracks[trackIndex];
  if (!Number.isInteger(trackIndex) || trackIndex < 0 || track === undefined) {
    throw new MidiDecodeError(
      source,
      `Track ${trackIndex} not found (file has ${midi.tracks.length} track${midi.tracks.length === 1 ? '' : 's'}).`,
    );
  }

  const warnings: string[] = [];
  const ppqn = midi.header.ticksPerBeat ?? 0;
  if (midi.header.ticksPerBeat === undefined) {
    warnings.push('SMPTE time division detected; PPQ expected.');
  }
  if (midi.header.format === 2) {
    warnings.push(`Format 2 holds independent sequences; only track ${trackIndex} is analyzed.`);
  }

  let trackName: string | undefined;
  let carried = 0;
  const events: NoteEvent[] = [];
  for (const event of track) {
    const deltaTicks = carried + event.deltaTime;
    const note = toNoteEvent(event, deltaTicks);
    if (note) {
      events.push(note);
      carried = 0;
      continue;
    }
    carried = deltaTicks;
    if (event.type === 'trackName' && trackName === undefined) {
      trackName = event.text;
    }
  }

  if (events.length === 0 && midi.tracks.length > 1) {
    warnings.push(`Track ${trackIndex} has no note events; other tracks are not analyzed.`);
  }

  return {
    format: midi.header.format,
    trackCount: midi.tracks.length,
    ppqn,
    ...(trackName === undefined ? {} : { trackName }),
    events,
    warnings,
  };
};
