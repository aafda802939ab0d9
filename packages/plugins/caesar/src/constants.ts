export const ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';
export const ALPHABET_SIZE = 26;

// Most frequent letter of English plaintext; the frequency strategy aligns the ciphertext's top letter with it.
export const ANCHOR_LETTER = 'E';
export const MIN_FREQUENCY_LETTERS = 5;

// Lower than any real score so shift 0 always becomes the first best.
export const SCORE_SENTINEL = -1;

export const COMMON_WORDS: ReadonlySet<string> = new Set([
  'THE', 'BE', 'TO', 'OF', 'AND',
  'A', 'IN', 'THAT', 'HAVE', 'I',
  'IT', 'FOR', 'NOT', 'ON', 'WITH',
  'HE', 'AS', 'YOU', 'DO', 'AT',
]);

export const WORD_HIT_SCORE = 1;
export const SPACE_RATIO_MIN = 0.1;
export const SPACE_RATIO_MAX = 0.25;
export const SPACE_BONUS = 2;
