import { ALPHABET, ALPHABET_SIZE, ANCHOR_LETTER, MIN_FREQUENCY_LETTERS, SCORE_SENTINEL } from './constants';
import { frequencyOrder, letterFrequencies, lettersOnly } from './frequency';
import { scoreText, type Scorer } from './scorer';
import { decodeWithShift, normalizeShift } from './shift';

export type CrackResult = { plaintext: string; shift: number };
export type ShiftCandidate = CrackResult & { score: number };

export type StrategyComparison = {
  bruteForce: CrackResult;
  frequency: CrackResult;
  agree: boolean;
};

export interface BreakerOptions {
  /** Below this many letters the frequency strategy falls back to brute force. */
  minLetters?: number;
  /** Plaintext letter the most frequent ciphertext letter is assumed to stand for. */
  anchor?: string;
  score?: Scorer;
}

function allShifts(): number[] {
  return Array.from({ length: ALPHABET_SIZE }, (_, s) => s);
}

function evaluate(ciphertext: string, shift: number, score: Scorer): ShiftCandidate {
  const plaintext = decodeWithShift(ciphertext, shift);
  return { plaintext, shift, score: score(plaintext) };
}

// First-seen wins on equal scores: a later candidate must be strictly better.
function bestOf(ciphertext: string, shifts: number[], score: Scorer): CrackResult {
  let best: ShiftCandidate = { plaintext: '', shift: 0, score: SCORE_SENTINEL };
  for (const shift of shifts) {
    const candidate = evaluate(ciphertext, shift, score);
    if (candidate.score > best.score) best = candidate;
  }
  return { plaintext: best.plaintext, shift: best.shift };
}

export function breakBruteForce(ciphertext: string, options: BreakerOptions = {}): CrackResult {
  return bestOf(ciphertext, allShifts(), options.score ?? scoreText);
}

/**
 * Shift that turns the most frequent ciphertext letter into the anchor letter,
 * or null when the text has fewer letters than `minLetters`.
 */
export function preferredShift(ciphertext: string, options: BreakerOptions = {}): number | null {
  const letters = lettersOnly(ciphertext);
  if (letters.length < (options.minLetters ?? MIN_FREQUENCY_LETTERS)) return null;
  const [top] = frequencyOrder(letterFrequencies(letters));
  if (top === undefined) return null;
  const anchor = (options.anchor ?? ANCHOR_LETTER).toUpperCase();
  return normalizeShift(ALPHABET.indexOf(top) - ALPHABET.indexOf(anchor));
}

function priorityOrder(preferred: number): number[] {
  const placed = new Array<boolean>(ALPHABET_SIZE).fill(false);
  const order = [preferred];
  placed[preferred] = true;
  for (const shift of allShifts()) {
    if (placed[shift]) continue;
    placed[shift] = true;
    order.push(shift);
  }
  return order;
}

/** Every shift exactly once, the frequency-preferred one (if any) first. */
export function candidateShifts(ciphertext: string, options: BreakerOptions = {}): number[] {
  const preferred = preferredShift(ciphertext, options);
  return preferred === null ? allShifts() : priorityOrder(preferred);
}

export function breakFrequencyAnalysis(ciphertext: string, options: BreakerOptions = {}): CrackResult {
  const preferred = preferredShift(ciphertext, options);
  if (preferred === null) return breakBruteForce(ciphertext, options);
  return bestOf(ciphertext, priorityOrder(preferred), options.score ?? scoreText);
}

/** All 26 decodings, highest score first; ties keep ascending shift order. */
export function rankShifts(ciphertext: string, options: BreakerOptions = {}): ShiftCandidate[] {
  const score = options.score ?? scoreText;
  return allShifts()
    .map((shift) => evaluate(ciphertext, shift, score))
    .sort((a, b) => b.score - a.score || a.shift - b.shift);
}

export function compareStrategies(ciphertext: string, options: BreakerOptions = {}): StrategyComparison {
  const bruteForce = breakBruteForce(ciphertext, options);
  const frequency = breakFrequencyAnalysis(ciphertext, options);
  return { bruteForce, frequency, agree: bruteForce.shift === frequency.shift };
}
