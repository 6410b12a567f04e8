// ─────────────────────────────────────────────
//  Hex coordinate — axial (q, r) addressing
// ─────────────────────────────────────────────

export interface HexCoord {
  readonly q: number;
  readonly r: number;
}

export interface CubeCoord {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

/** String form used as record key: "q,r" */
export type HexKey = string;

export function hex(q: number, r: number): HexCoord {
  return { q, r };
}

export function hexKey(c: HexCoord): HexKey {
  return `${c.q},${c.r}`;
}

export function parseHexKey(key: HexKey): HexCoord | null {
  const parts = key.split(',');
  if (parts.length !== 2) return null;
  const q = Number(parts[0]);
  const r = Number(parts[1]);
  if (!Number.isInteger(q) || !Number.isInteger(r)) return null;
  return { q, r };
}

export function hexEquals(a: HexCoord, b: HexCoord): boolean {
  return a.q === b.q && a.r === b.r;
}
