// ─────────────────────────────────────────────
//  Hex Math — distance, neighbours, rings, lines
//  Axial coordinates; cube form only for interpolation.
// ─────────────────────────────────────────────

import type { CubeCoord, HexCoord } from '@/engine/data/types/Hex';
import { MathUtils } from './MathUtils';

/** E, NE, NW, W, SW, SE */
export const HEX_DIRECTIONS: readonly HexCoord[] = [
  { q: 1, r: 0 },
  { q: 1, r: -1 },
  { q: 0, r: -1 },
  { q: -1, r: 0 },
  { q: -1, r: 1 },
  { q: 0, r: 1 },
];

function direction(index: number): HexCoord {
  const dir = HEX_DIRECTIONS[((index % 6) + 6) % 6];
  return dir ?? { q: 0, r: 0 };
}

export const HexMath = {
  add(a: HexCoord, b: HexCoord): HexCoord {
    return { q: a.q + b.q, r: a.r + b.r };
  },

  scale(a: HexCoord, k: number): HexCoord {
    return { q: a.q * k, r: a.r * k };
  },

  neighbor(c: HexCoord, dirIndex: number): HexCoord {
    return HexMath.add(c, direction(dirIndex));
  },

  neighbors(c: HexCoord): HexCoord[] {
    return HEX_DIRECTIONS.map(d => HexMath.add(c, d));
  },

  toCube(c: HexCoord): CubeCoord {
    return { x: c.q, y: -c.q - c.r, z: c.r };
  },

  fromCube(c: CubeCoord): HexCoord {
    return { q: c.x, r: c.z };
  },

  distance(a: HexCoord, b: HexCoord): number {
    const dq = a.q - b.q;
    const dr = a.r - b.r;
    return (Math.abs(dq) + Math.abs(dr) + Math.abs(dq + dr)) / 2;
  },

  isAdjacent(a: HexCoord, b: HexCoord): boolean {
    return HexMath.distance(a, b) === 1;
  },

  /** Tiles at exactly `radius` from center. Radius 0 yields the center. */
  ring(center: HexCoord, radius: number): HexCoord[] {
    if (radius <= 0) return [center];
    const results: HexCoord[] = [];
    let cur = HexMath.add(center, HexMath.scale(direction(4), radius));
    for (let side = 0; side < 6; side++) {
      for (let step = 0; step < radius; step++) {
        results.push(cur);
        cur = HexMath.neighbor(cur, side);
      }
    }
    return results;
  },

  /** All tiles within `radius`, nearest rings first. */
  spiral(center: HexCoord, radius: number): HexCoord[] {
    const results: HexCoord[] = [];
    for (let k = 0; k <= radius; k++) results.push(...HexMath.ring(center, k));
    return results;
  },

  cubeRound(x: number, y: number, z: number): CubeCoord {
    let rx = Math.round(x);
    let ry = Math.round(y);
    let rz = Math.round(z);
    const dx = Math.abs(rx - x);
    const dy = Math.abs(ry - y);
    const dz = Math.abs(rz - z);
    if (dx > dy && dx > dz) {
      rx = -ry - rz;
    } else if (dy > dz) {
      ry = -rx - rz;
    } else {
      rz = -rx - ry;
    }
    // normalise -0
    return { x: rx + 0, y: ry + 0, z: rz + 0 };
  },

  /** Hexes along the straight line from a to b, both ends included. */
  line(a: HexCoord, b: HexCoord): HexCoord[] {
    const n = HexMath.distance(a, b);
    if (n === 0) return [a];
    const ca = HexMath.toCube(a);
    const cb = HexMath.toCube(b);
    // nudge off exact edges so ties break consistently
    const eps = 1e-6;
    const results: HexCoord[] = [];
    for (let i = 0; i <= n; i++) {
      const t = i / n;
      const cube = HexMath.cubeRound(
        MathUtils.lerp(ca.x + eps, cb.x + eps, t),
        MathUtils.lerp(ca.y + eps, cb.y + eps, t),
        MathUtils.lerp(ca.z - 2 * eps, cb.z - 2 * eps, t),
      );
      results.push(HexMath.fromCube(cube));
    }
    return results;
  },
};
