export type Hint = { id: string; title: string; body?: string };
export type Explanation = { step: string; details?: string };
export type MoveResult = { ok: boolean; errors?: string[] };

export interface PuzzlePlugin<TData = unknown, TState = unknown> {
  type: string;
  parse(raw: ArrayBuffer | string): TData;
  serialize(data: TData): ArrayBuffer | string;
  createInitialState(data: TData): TState;
  render(data: TData, state: TState): unknown;
  validateMove(data: TData, state: TState, move: unknown): MoveResult;
  isSolved(data: TData, state: TState): boolean;
  getHints(data: TData, state: TState): Hint[];
  explainStep(data: TData, state: TState): Explanation | null;
}

export class PuzzleParseError extends Error {
  constructor(public readonly pluginType: string, message: string) {
    super(`${pluginType}: ${message}`);
    this.name = 'PuzzleParseError';
  }
}

const registry: Map<string, PuzzlePlugin> = new Map();

export function registerPlugin<TData, TState>(plugin: PuzzlePlugin<TData, TState>): void {
  registry.set(plugin.type, plugin);
}

export function getPlugin(type: string): PuzzlePlugin | undefined {
  return registry.get(type);
}

export function listPlugins(): string[] {
  return Array.from(registry.keys()).sort();
}

export function decodeRaw(raw: ArrayBuffer | string): string {
  return typeof raw === 'string' ? raw : new TextDecoder().decode(raw);
}
