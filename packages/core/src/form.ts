import { groupOrdinalsByMeasure } from './grouping.js';
import { ordinalToLabel, renderForm } from './labels.js';
import type { FormSequence, PatternGroup, Section } from './types.js';

export const sequenceForm = (groups: readonly PatternGroup[], measureCount: number): FormSequence => {
  const ordinals = groupOrdinalsByMeasure(groups, measureCount);
  return {
    ordinals,
    labels: ordinals.map(ordinalToLabel),
    text: renderForm(ordinals),
  };
};

export const formsCoincide = (a: FormSequence, b: FormSequence): boolean =>
  a.ordinals.length === b.ordinals.length && a.ordinals.every((ordinal, index) => ordinal === b.ordinals[index]);

/** Maximal runs of one label, reported with 1-indexed measure numbers. */
export const extractSections = (form: FormSequence): Section[] => {
  const sections: Section[] = [];
  form.labels.forEach((label, index) => {
    const current = sections.at(-1);
    if (current && current.label === label) {
      current.endMeasure = index + 1;
      current.length += 1;
      return;
    }
    sections.push({ label, startMeasure: index + 1, endMeasure: index + 1, length: 1 });
  });
  return sections;
};

export const describeForm = (sections: readonly Section[]): string => {
  const labels = sections.map((section) => section.label);
  return labels.some((label) => label.length > 1) ? labels.join(' ') : labels.join('');
};
