import { getPlugin, type Explanation, type Hint, type MoveResult } from './plugin';

export type WorkerRequest =
  | { reqId?: string; kind: 'validate'; plugin: string; data: unknown; state: unknown; move: unknown }
  | { reqId?: string; kind: 'hint'; plugin: string; data: unknown; state: unknown }
  | { reqId?: string; kind: 'explain'; plugin: string; data: unknown; state: unknown };

export type WorkerResponse =
  | { reqId?: string; kind: 'validate'; result: MoveResult }
  | { reqId?: string; kind: 'hint'; result: Hint[] }
  | { reqId?: string; kind: 'explain'; result: Explanation | null }
  | { reqId?: string; kind: 'error'; message: string };

// Unknown plugins yield null; a throwing plugin becomes an 'error' response.
export function handleWorkerRequest(msg: WorkerRequest): WorkerResponse | null {
  const plugin = getPlugin(msg.plugin);
  if (!plugin) return null;
  try {
    switch (msg.kind) {
      case 'validate':
        return { reqId: msg.reqId, kind: 'validate', result: plugin.validateMove(msg.data, msg.state, msg.move) };
      case 'hint':
        return { reqId: msg.reqId, kind: 'hint', result: plugin.getHints(msg.data, msg.state) };
      case 'explain':
        return { reqId: msg.reqId, kind: 'explain', result: plugin.explainStep(msg.data, msg.state) };
    }
  } catch (e) {
    return { reqId: msg.reqId, kind: 'error', message: e instanceof Error ? e.message : String(e) };
  }
}
