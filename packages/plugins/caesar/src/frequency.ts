import { ALPHABET } from './constants';

export type Letter = string;
export type FrequencyTable = Map<Letter, number>;

export function lettersOnly(text: string): string {
  return text.replace(/[^A-Za-z]/g, '');
}

/** Counts of A-Z after uppercasing; letters that never occur are left out. */
export function letterFrequencies(text: string): FrequencyTable {
  const table: FrequencyTable = new Map();
  for (const ch of text.toUpperCase()) {
    if (!ALPHABET.includes(ch)) continue;
    table.set(ch, (table.get(ch) ?? 0) + 1);
  }
  return table;
}

/** Most frequent first; equal counts fall back to alphabetical order. */
export function frequencyOrder(table: FrequencyTable): Letter[] {
  return Array.from(table.entries())
    .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
    .map(([letter]) => letter);
}
