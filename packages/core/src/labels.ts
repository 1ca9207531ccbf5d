const ALPHABET_SIZE = 26;
const CODE_A = 65;

/** Spreadsheet-style column labels: A…Z, AA…ZZ, AAA… */
export const ordinalToLabel = (ordinal: number): string => {
  if (!Number.isInteger(ordinal) || ordinal < 0) {
    throw new RangeError(`Label ordinal must be a non-negative integer, got ${ordinal}.`);
  }
  let value = ordinal + 1;
  let label = '';
  while (value > 0) {
    const remainder = (value - 1) % ALPHABET_SIZE;
    label = String.fromCharCode(CODE_A + remainder) + label;
    value = Math.floor((value - 1) / ALPHABET_SIZE);
  }
  return label;
};

export const labelToOrdinal = (label: string): number => {
  if (!/^[A-Z]+$/.test(label)) {
    throw new RangeError(`Invalid label "${label}".`);
  }
  let value = 0;
  for (const char of label) {
    value = value * ALPHABET_SIZE + (char.charCodeAt(0) - CODE_A + 1);
  }
  return value - 1;
};

/**
 * Joins labels into form text. Single-letter labels concatenate (`AABA`); once any label
 * needs two letters the labels are space separated so the text still splits back into
 * one label per measure.
 */
export const renderForm = (ordinals: readonly number[]): string => {
  const labels = ordinals.map(ordinalToLabel);
  const overflow = ordinals.some((ordinal) => ordinal >= ALPHABET_SIZE);
  return labels.join(overflow ? ' ' : '');
};

export const splitForm = (text: string): string[] => {
  const trimmed = text.trim();
  if (trimmed === '') return [];
  return trimmed.includes(' ') ? trimmed.split(/\s+/) : [...trimmed];
};
