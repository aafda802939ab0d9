import { PuzzleParseError, decodeRaw, type Hint, type PuzzlePlugin } from '@cipherlab/engine';
import { useMemo } from 'react';
import { compareStrategies, preferredShift, rankShifts } from './breaker';
import { ALPHABET_SIZE, ANCHOR_LETTER } from './constants';
import { frequencyOrder, letterFrequencies, lettersOnly } from './frequency';
import { decodeWithShift, normalizeShift } from './shift';

export type CaesarData = { ciphertext: string; plaintext?: string };
export type CaesarState = { shift: number };
export type CaesarMove = { shift: number };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isCaesarData(value: unknown): value is CaesarData {
  if (!isRecord(value) || typeof value.ciphertext !== 'string') return false;
  return value.plaintext === undefined || typeof value.plaintext === 'string';
}

export function isCaesarState(value: unknown): value is CaesarState {
  return isRecord(value) && Number.isInteger(value.shift);
}

const normalizeLetters = (s: string) => lettersOnly(s).toUpperCase();

export const CaesarComponent = ({ data, state, onChange }: { data: CaesarData; state: CaesarState; onChange: (next: CaesarState) => void }) => {
  const shift = normalizeShift(state.shift);
  const decoded = useMemo(() => decodeWithShift(data.ciphertext, shift), [data.ciphertext, shift]);
  const step = (delta: number) => onChange({ shift: normalizeShift(shift + delta) });

  return (
    <div className="p-4">
      <div className="rounded-xl border border-white/10 bg-white/[0.03] p-4 shadow-[0_10px_30px_rgba(0,0,0,0.35)] backdrop-blur-sm">
        <div className="mb-2 text-xs uppercase tracking-wider text-white/60">Decoded</div>
        <div className="rounded-md border border-white/10 bg-black/30 p-3 font-mono whitespace-pre-wrap break-words">
          {decoded}
        </div>
        <div className="mt-3 text-xs text-white/60">Ciphertext</div>
        <div className="rounded-md border border-white/10 bg-black/20 p-3 font-mono whitespace-pre-wrap break-words opacity-80">
          {data.ciphertext}
        </div>
      </div>

      <div className="mt-4 flex items-center gap-3 text-sm">
        <button className="rounded border border-white/15 bg-white/[0.06] px-3 py-1 hover:bg-white/[0.08]" onClick={() => step(-1)}>-</button>
        <input
          aria-label="Shift"
          type="range"
          min={0}
          max={ALPHABET_SIZE - 1}
          value={shift}
          onChange={(e) => onChange({ shift: normalizeShift(Number(e.target.value)) })}
          className="flex-1"
        />
        <button className="rounded border border-white/15 bg-white/[0.06] px-3 py-1 hover:bg-white/[0.08]" onClick={() => step(1)}>+</button>
        <span className="w-16 text-right font-mono text-white/80">shift {shift}</span>
      </div>
    </div>
  );
};

export const caesarPlugin: PuzzlePlugin<CaesarData, CaesarState> = {
  type: 'caesar',
  parse(raw) {
    let value: unknown;
    try { value = JSON.parse(decodeRaw(raw)); } catch (e) {
      throw new PuzzleParseError('caesar', e instanceof Error ? e.message : 'invalid JSON');
    }
    if (!isCaesarData(value)) throw new PuzzleParseError('caesar', 'expected { ciphertext: string, plaintext?: string }');
    return value;
  },
  serialize(data) { return JSON.stringify(data); },
  createInitialState() { return { shift: 0 }; },
  render(data, state) { return function Bound({ onChange }: { onChange: (next: CaesarState) => void }) { return <CaesarComponent data={data} state={state} onChange={onChange} />; }; },
  validateMove(_data, _state, move) {
    // any integer is a legal move; it is normalized when applied
    if (!isRecord(move) || !('shift' in move)) return { ok: false, errors: ['move must be { shift: number }'] };
    if (!Number.isInteger(move.shift)) return { ok: false, errors: ['shift must be an integer'] };
    return { ok: true };
  },
  isSolved(data, state) {
    if (!data.plaintext) return false;
    const target = normalizeLetters(data.plaintext);
    return target.length > 0 && normalizeLetters(decodeWithShift(data.ciphertext, state.shift)) === target;
  },
  getHints(data) {
    const counts = letterFrequencies(data.ciphertext);
    const order = frequencyOrder(counts);
    const hints: Hint[] = [{
      id: 'freq',
      title: 'Frequency hint',
      body: order.slice(0, 5).map((ch) => `${ch}:${counts.get(ch) ?? 0}`).join(', '),
    }];
    const preferred = preferredShift(data.ciphertext);
    if (preferred !== null) {
      hints.push({ id: 'anchor', title: `Align with ${ANCHOR_LETTER}`, body: `${order[0]} becomes ${ANCHOR_LETTER} with shift ${preferred}` });
    }
    const { bruteForce, frequency, agree } = compareStrategies(data.ciphertext);
    hints.push({
      id: 'strategies',
      title: agree ? 'Both strategies agree' : 'Strategies disagree',
      body: `Brute force: shift ${bruteForce.shift}. Frequency analysis: shift ${frequency.shift}.`,
    });
    return hints;
  },
  explainStep(data, state) {
    if (caesarPlugin.isSolved(data, state)) return null;
    const [best] = rankShifts(data.ciphertext);
    const current = normalizeShift(state.shift);
    if (best.shift === current) {
      return { step: `Shift ${current} already scores highest`, details: best.plaintext };
    }
    return { step: `Set the shift to ${best.shift}`, details: `${best.plaintext} (score ${best.score})` };
  },
};

export default caesarPlugin;
