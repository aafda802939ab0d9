import LZ from 'lz-string';

export function encodeState<T>(state: T): string {
  try { return LZ.compressToEncodedURIComponent(JSON.stringify(state)); } catch { return ''; }
}

export function decodeState<T>(hash: string, guard: (value: unknown) => value is T): T | null {
  const json = LZ.decompressFromEncodedURIComponent(hash);
  if (!json) return null;
  let value: unknown;
  try { value = JSON.parse(json); } catch { return null; }
  return guard(value) ? value : null;
}
