import { describe, expect, it } from 'vitest';
import { analyzePiece } from '../../core/src/index.js';
import { decodeMidi, MidiDecodeError } from '../src/index.js';

const ascii = (text: string): number[] => [...text].map((char) => char.charCodeAt(0));

const header = (format: number, trackCount: number, division: [number, number]): number[] => [
  ...ascii('MThd'), 0, 0, 0, 6, 0, format, 0, trackCount, ...division,
];

const trackChunk = (body: number[]): number[] => [...ascii('MTrk'), 0, 0, 0, body.length, ...body];

const END_OF_TRACK = [0x00, 0xff, 0x2f, 0x00];

// Format 0 at 128 PPQ: two quarter notes, with a controller change between attack and release.
const leadSheet = new Uint8Array([
  ...header(0, 1, [0x00, 0x80]),
  ...trackChunk([
    0x00, 0xff, 0x03, 0x04, ...ascii('Lead'),
    0x00, 0x90, 60, 100,
    0x40, 0xb0, 64, 127,
    0x40, 0x80, 60, 0,
    0x00, 0x90, 62, 100,
    0x81, 0x00, 62, 0, // running status, velocity 0
    ...END_OF_TRACK,
  ]),
]);

// Format 1 at 480 PPQ: a conductor track followed by one note track.
const withConductor = new Uint8Array([
  ...header(1, 2, [0x01, 0xe0]),
  ...trackChunk([0x00, 0xff, 0x51, 0x03, 0x07, 0xa1, 0x20, ...END_OF_TRACK]),
  ...trackChunk([0x00, 0x90, 64, 80, 0x83, 0x60, 64, 0, ...END_OF_TRACK]),
]);

describe('midi decoding', () => {
  it('reduces a track to note events and folds non-note deltas forward', () => {
    const decoded = decodeMidi(leadSheet);
    expect(decoded).toEqual({
      format: 0,
      trackCount: 1,
      ppqn: 128,
      trackName: 'Lead',
      events: [
        { kind: 'on', pitch: 60, deltaTicks: 0 },
        { kind: 'off', pitch: 60, deltaTicks: 128 },
        { kind: 'on', pitch: 62, deltaTicks: 0 },
        { kind: 'off', pitch: 62, deltaTicks: 128 },
      ],
      warnings: [],
    });
  });

  it('feeds decoded events straight into piece analysis', () => {
    const decoded = decodeMidi(leadSheet);
    const analysis = analyzePiece(decoded.events, decoded.ppqn);
    expect(analysis.measureCount).toBe(1);
    expect(analysis.measures[0]?.rhythm).toEqual([0, 4]);
    expect(analysis.measures[0]?.melody).toEqual([[0, 60], [4, 62]]);
  });

  it('reads the requested track and warns when the default one has no notes', () => {
    const conductor = decodeMidi(withConductor);
    expect(conductor.events).toEqual([]);
    expect(conductor.warnings).toEqual(['Track 0 has no note events; other tracks are not analyzed.']);

    const notes = decodeMidi(withConductor, { track: 1 });
    expect(notes.ppqn).toBe(480);
    expect(notes.trackCount).toBe(2);
    expect(notes.events).toEqual([
      { kind: 'on', pitch: 64, deltaTicks: 0 },
      { kind: 'off', pitch: 64, deltaTicks: 480 },
    ]);
    expect(notes.warnings).toEqual([]);
  });

  it('reports SMPTE division as an unusable resolution', () => {
    const smpte = new Uint8Array([...header(0, 1, [0xe7, 0x28]), ...trackChunk([0x00, 0x90, 60, 90, ...END_OF_TRACK])]);
    const decoded = decodeMidi(smpte);
    expect(decoded.ppqn).toBe(0);
    expect(decoded.warnings).toEqual(['SMPTE time division detected; PPQ expected.']);
  });

  it('fails with a decode error that names its source', () => {
    expect(() => decodeMidi(leadSheet, { source: 'song.mid', track: 2 })).toThrow(
      'song.mid: Track 2 not found (file has 1 track).',
    );

    let caught: unknown;
    try {
      decodeMidi(new Uint8Array([1, 2, 3]), { source: 'broken.mid' });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(MidiDecodeError);
    expect(caught instanceof MidiDecodeError ? caught.source : undefined).toBe('broken.mid');
  });
});
