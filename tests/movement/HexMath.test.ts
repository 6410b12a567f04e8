import { describe, it, expect } from 'vitest';
import { HexMath, HEX_DIRECTIONS } from '@/engine/utils/HexMath';

describe('HexMath.distance', () => {
  it('is zero for the same tile', () => {
    expect(HexMath.distance({ q: 3, r: -2 }, { q: 3, r: -2 })).toBe(0);
  });

  it('follows the hex metric across both axes', () => {
    expect(HexMath.distance({ q: 0, r: 0 }, { q: 3, r: -1 })).toBe(3);
    expect(HexMath.distance({ q: 0, r: 0 }, { q: 2, r: 2 })).toBe(4);
  });
});

describe('HexMath.neighbors', () => {
  it('lists E, NE, NW, W, SW, SE in that order', () => {
    expect(HexMath.neighbors({ q: 0, r: 0 })).toEqual([
      { q: 1, r: 0 }, { q: 1, r: -1 }, { q: 0, r: -1 },
      { q: -1, r: 0 }, { q: -1, r: 1 }, { q: 0, r: 1 },
    ]);
    expect(HEX_DIRECTIONS).toHaveLength(6);
  });
});

describe('HexMath.ring / spiral', () => {
  it('radius 0 is just the centre', () => {
    expect(HexMath.ring({ q: 4, r: 4 }, 0)).toEqual([{ q: 4, r: 4 }]);
  });

  it('radius 1 walks the six neighbours starting south-west', () => {
    expect(HexMath.ring({ q: 0, r: 0 }, 1)).toEqual([
      { q: -1, r: 1 }, { q: 0, r: 1 }, { q: 1, r: 0 },
      { q: 1, r: -1 }, { q: 0, r: -1 }, { q: -1, r: 0 },
    ]);
  });

  it('every ring tile sits exactly at the radius', () => {
    const ring = HexMath.ring({ q: 2, r: -1 }, 3);
    expect(ring).toHaveLength(18);
    expect(ring.every(c => HexMath.distance(c, { q: 2, r: -1 }) === 3)).toBe(true);
  });

  it('spiral of radius 2 covers 19 tiles', () => {
    expect(HexMath.spiral({ q: 0, r: 0 }, 2)).toHaveLength(19);
  });
});

describe('HexMath.line', () => {
  it('includes both ends and steps one tile at a time', () => {
    const line = HexMath.line({ q: 0, r: 0 }, { q: 3, r: 0 });
    expect(line).toEqual([{ q: 0, r: 0 }, { q: 1, r: 0 }, { q: 2, r: 0 }, { q: 3, r: 0 }]);
  });

  it('cube round trip preserves the coordinate', () => {
    const c = { q: -2, r: 5 };
    expect(HexMath.fromCube(HexMath.toCube(c))).toEqual(c);
  });
});
