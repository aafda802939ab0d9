import {
  COMMON_WORDS,
  SPACE_BONUS,
  SPACE_RATIO_MAX,
  SPACE_RATIO_MIN,
  WORD_HIT_SCORE,
} from './constants';

export type Scorer = (text: string) => number;

/**
 * How much `text` looks like English: one point per common word, plus a flat
 * bonus when literal spaces make up between 10% and 25% of the characters.
 */
export const scoreText: Scorer = (text) => {
  let score = 0;
  for (const token of text.toUpperCase().split(/\s+/)) {
    const word = token.replace(/[^A-Z]/g, '');
    if (word && COMMON_WORDS.has(word)) score += WORD_HIT_SCORE;
  }

  const chars = Array.from(text);
  if (chars.length > 0) {
    const spaces = chars.filter((ch) => ch === ' ').length;
    const ratio = spaces / chars.length;
    if (ratio > SPACE_RATIO_MIN && ratio < SPACE_RATIO_MAX) score += SPACE_BONUS;
  }
  return score;
};
