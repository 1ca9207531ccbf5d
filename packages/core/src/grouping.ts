import { ordinalToLabel } from './labels.js';
import type { PatternGroup } from './types.js';

export type FingerprintEquality<T> = (a: T, b: T) => boolean;

/**
 * Partitions measure indices into classes of exactly equal fingerprints.
 *
 * Groups are opened in order of their lowest member and numbered from 0 in that order, so
 * the first measure always belongs to group 0 and a group's ordinal never exceeds the
 * number of groups opened before it.
 */
export const groupMeasures = <T>(fingerprints: readonly T[], equals: FingerprintEquality<T>): PatternGroup[] => {
  const visited = new Array<boolean>(fingerprints.length).fill(false);
  const groups: PatternGroup[] = [];

  fingerprints.forEach((defining, index) => {
    if (visited[index]) return;
    const ordinal = groups.length;
    const measures = [index];
    visited[index] = true;
    for (let candidate = index + 1; candidate < fingerprints.length; candidate += 1) {
      const fingerprint = fingerprints[candidate];
      if (!visited[candidate] && fingerprint !== undefined && equals(defining, fingerprint)) {
        measures.push(candidate);
        visited[candidate] = true;
      }
    }
    groups.push({ ordinal, label: ordinalToLabel(ordinal), measures });
  });

  return groups;
};

export const groupOrdinalsByMeasure = (groups: readonly PatternGroup[], measureCount: number): number[] => {
  const ordinals = new Array<number>(measureCount).fill(-1);
  for (const group of groups) {
    for (const measure of group.measures) {
      ordinals[measure] = group.ordinal;
    }
  }
  return ordinals;
};
