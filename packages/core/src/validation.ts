import { isUsableResolution, truncatesSubdivisions } from './model.js';
import { findUnmatchedOffEvents } from './timeline.js';
import type { NoteEvent, ValidationIssue } from './types.js';

const isMidiPitch = (pitch: number): boolean => Number.isInteger(pitch) && pitch >= 0 && pitch <= 127;

const isDeltaTicks = (delta: number): boolean => Number.isInteger(delta) && delta >= 0;

export const validateResolution = (ppqn: number): ValidationIssue[] => {
  if (!isUsableResolution(ppqn)) {
    return [{ code: 'RESOLUTION_INVALID', message: `Resolution ${ppqn} is not a positive integer; nothing to analyze.` }];
  }
  if (truncatesSubdivisions(ppqn)) {
    return [
      {
        code: 'RESOLUTION_TRUNCATED',
        message: `Resolution ${ppqn} is not divisible by 4; sixteenth positions are approximate.`,
      },
    ];
  }
  return [];
};

export const validateNoteEvents = (events: readonly NoteEvent[], ppqn: number): ValidationIssue[] => {
  const issues: ValidationIssue[] = [...validateResolution(ppqn)];

  events.forEach((event, eventIndex) => {
    if (!isMidiPitch(event.pitch)) {
      issues.push({ code: 'EVENT_INVALID_PITCH', message: `Pitch ${event.pitch} is outside 0..127.`, eventIndex });
    }
    if (!isDeltaTicks(event.deltaTicks)) {
      issues.push({
        code: 'EVENT_INVALID_DELTA',
        message: `Delta ${event.deltaTicks} is not a non-negative integer.`,
        eventIndex,
      });
    }
  });

  for (const eventIndex of findUnmatchedOffEvents(events)) {
    const pitch = events[eventIndex]?.pitch;
    issues.push({ code: 'EVENT_UNMATCHED_OFF', message: `Note off for pitch ${pitch} has no sounding note.`, eventIndex });
  }

  return issues;
};
