import quoteFile from './data/quotes.json';
import { ALPHABET_SIZE } from './constants';
import { lettersOnly } from './frequency';
import { encode } from './shift';
import type { CaesarData } from './plugin';

export type CaesarDifficulty = 'short' | 'medium' | 'long';
export type RandomSource = () => number;

const QUOTES: readonly string[] = quoteFile.quotes;

function pick<T>(items: readonly T[], random: RandomSource): T {
  return items[Math.floor(random() * items.length)];
}

function inBand(quote: string, diff: 'short' | 'medium'): boolean {
  const letters = lettersOnly(quote).length;
  return diff === 'short' ? letters <= 40 : letters > 40 && letters <= 90;
}

/** A shift in 1..25; 0 would leave the text readable. */
export function pickShift(random: RandomSource = Math.random): number {
  return 1 + Math.floor(random() * (ALPHABET_SIZE - 1));
}

function pickPlaintext(diff: CaesarDifficulty, random: RandomSource): string {
  if (diff !== 'long') {
    const pool = QUOTES.filter((q) => inBand(q, diff));
    return pick(pool.length ? pool : QUOTES, random);
  }
  // Long puzzles chain 3-4 distinct quotes.
  const rest = QUOTES.slice();
  const k = Math.floor(random() * 2) + 3;
  const picks: string[] = [];
  for (let i = 0; i < k && rest.length > 0; i++) {
    const idx = Math.floor(random() * rest.length);
    picks.push(rest[idx]);
    rest.splice(idx, 1);
  }
  return picks.join(' ');
}

export function generateCaesar(diff: CaesarDifficulty = 'medium', random: RandomSource = Math.random): CaesarData {
  const plaintext = pickPlaintext(diff, random);
  return { ciphertext: encode(plaintext, pickShift(random)), plaintext };
}
