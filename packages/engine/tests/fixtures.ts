import type { PuzzlePlugin } from '../src'

type CounterData = { target: number }
type CounterState = { value: number }

export const counterPlugin: PuzzlePlugin<CounterData, CounterState> = {
  type: 'counter',
  parse(raw) { return { target: Number(raw) } },
  serialize(data) { return String(data.target) },
  createInitialState() { return { value: 0 } },
  render() { return null },
  validateMove(_data, _state, move) { return typeof move === 'number' ? { ok: true } : { ok: false, errors: ['not a number'] } },
  isSolved(data, state) { return data.target === state.value },
  getHints(data, state) { return [{ id: 'gap', title: `${data.target - state.value} to go` }] },
  explainStep() { throw new Error('no explanation') },
}
