export {
  PuzzleParseError,
  decodeRaw,
  getPlugin,
  listPlugins,
  registerPlugin,
  type Explanation,
  type Hint,
  type MoveResult,
  type PuzzlePlugin,
} from './plugin';
export { encodeState, decodeState } from './share';
export { handleWorkerRequest, type WorkerRequest, type WorkerResponse } from './worker';
