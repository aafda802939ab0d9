import { describe, test, expect } from 'vitest'
import {
  breakBruteForce,
  breakFrequencyAnalysis,
  candidateShifts,
  compareStrategies,
  preferredShift,
  rankShifts,
} from '../src/breaker'
import { encode } from '../src/shift'

// "THE QUICK BROWN FOX" under shift 7
const FOX = 'AOL XBPJR IYVDU MVE'
const ALL = Array.from({ length: 26 }, (_, s) => s)
const flat = () => 0

describe('breakBruteForce', () => {
  test('recovers a shifted sentence', () => {
    expect(encode('THE QUICK BROWN FOX', 7)).toBe(FOX)
    expect(breakBruteForce(FOX)).toEqual({ plaintext: 'THE QUICK BROWN FOX', shift: 7 })
  })

  test('keeps lowercase ciphertext lowercase', () => {
    expect(breakBruteForce('aol xbpjr iyvdu mve')).toEqual({ plaintext: 'the quick brown fox', shift: 7 })
  })

  test('first shift wins on equal scores', () => {
    expect(breakBruteForce('HHHHH', { score: flat })).toEqual({ plaintext: 'HHHHH', shift: 0 })
  })

  test('empty ciphertext returns shift 0', () => {
    expect(breakBruteForce('')).toEqual({ plaintext: '', shift: 0 })
  })
})

describe('preferredShift', () => {
  test('aligns the most frequent letter with E', () => {
    expect(preferredShift('HHHHH')).toBe(3)
    expect(preferredShift(FOX)).toBe(17)
  })

  test('honours minLetters and anchor options', () => {
    expect(preferredShift('HHHH')).toBeNull()
    expect(preferredShift('HHHH', { minLetters: 4 })).toBe(3)
    expect(preferredShift('HHHHH', { anchor: 't' })).toBe(14)
  })
})

describe('candidateShifts', () => {
  test('puts the preferred shift first and lists every shift once', () => {
    expect(candidateShifts('HHHHH')).toEqual([3, 0, 1, 2, ...ALL.slice(4)])
  })

  test('a preferred shift of 0 is not listed twice', () => {
    const order = candidateShifts('EEEEE xyz')
    expect(order).toEqual(ALL)
  })

  test('short text keeps ascending order', () => {
    expect(candidateShifts('AB!')).toEqual(ALL)
  })
})

describe('breakFrequencyAnalysis', () => {
  test('finds the same shift as brute force', () => {
    expect(breakFrequencyAnalysis(FOX)).toEqual({ plaintext: 'THE QUICK BROWN FOX', shift: 7 })
  })

  test('falls back to brute force below five letters', () => {
    expect(breakFrequencyAnalysis('AB!')).toEqual(breakBruteForce('AB!'))
    expect(breakFrequencyAnalysis('AB!')).toEqual({ plaintext: 'AB!', shift: 0 })
    expect(breakFrequencyAnalysis('')).toEqual({ plaintext: '', shift: 0 })
  })

  test('ties go to the preferred shift', () => {
    expect(breakFrequencyAnalysis('HHHHH', { score: flat })).toEqual({ plaintext: 'EEEEE', shift: 3 })
  })
})

describe('rankShifts', () => {
  test('ranks every shift, best first', () => {
    const ranked = rankShifts(FOX)
    expect(ranked).toHaveLength(26)
    expect(ranked[0]).toEqual({ plaintext: 'THE QUICK BROWN FOX', shift: 7, score: 3 })
    expect(new Set(ranked.map((c) => c.shift)).size).toBe(26)
  })

  test('equal scores stay in shift order', () => {
    expect(rankShifts('HHHHH', { score: flat }).map((c) => c.shift)).toEqual(ALL)
  })
})

describe('compareStrategies', () => {
  test('reports agreement', () => {
    const result = compareStrategies(FOX)
    expect(result.agree).toBe(true)
    expect(result.bruteForce.shift).toBe(7)
    expect(result.frequency.shift).toBe(7)
  })

  test('reports disagreement', () => {
    const result = compareStrategies('HHHHH', { score: flat })
    expect(result).toEqual({
      bruteForce: { plaintext: 'HHHHH', shift: 0 },
      frequency: { plaintext: 'EEEEE', shift: 3 },
      agree: false,
    })
  })
})
