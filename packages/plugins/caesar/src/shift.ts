import { ALPHABET_SIZE } from './constants';

const UPPER_A = 65;
const UPPER_Z = 90;
const LOWER_A = 97;
const LOWER_Z = 122;

/** Reduce any integer shift into 0..25. Fractions are truncated toward zero first. */
export function normalizeShift(shift: number): number {
  const s = Math.trunc(shift) % ALPHABET_SIZE;
  return s < 0 ? s + ALPHABET_SIZE : s;
}

function rotate(code: number, base: number, shift: number): string {
  return String.fromCharCode(base + ((code - base + shift) % ALPHABET_SIZE));
}

/**
 * Rotate every ASCII letter of `text` forward by `shift`, keeping its case.
 * Anything else (digits, punctuation, non-ASCII) passes through as is.
 */
export function shiftText(text: string, shift: number): string {
  const s = normalizeShift(shift);
  if (s === 0) return text;
  const out: string[] = [];
  for (const ch of text) {
    const code = ch.charCodeAt(0);
    if (code >= UPPER_A && code <= UPPER_Z) out.push(rotate(code, UPPER_A, s));
    else if (code >= LOWER_A && code <= LOWER_Z) out.push(rotate(code, LOWER_A, s));
    else out.push(ch);
  }
  return out.join('');
}

export function encode(plaintext: string, shift: number): string {
  return shiftText(plaintext, shift);
}

/** Undo `encode(_, shift)`: the same rotation with the complementary shift. */
export function decodeWithShift(ciphertext: string, shift: number): string {
  return shiftText(ciphertext, (ALPHABET_SIZE - normalizeShift(shift)) % ALPHABET_SIZE);
}
