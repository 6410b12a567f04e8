import { describe, it, expect } from 'vitest';
import { VisionSystem } from '@/engine/systems/vision/VisionSystem';
import { makeContext, makeWorld, addPlayer, addArmy, addBuilding } from '../helpers';

const ctx = makeContext();

describe('VisionSystem.update', () => {
  it('reveals the army footprint and reports each newly visible tile', () => {
    const state = makeWorld();
    addPlayer(state, 'p1');
    addArmy(state, 'p1', { q: 5, r: 5 }, { swordsman: 1 });
    const changes = VisionSystem.update(state, ctx);

    expect(VisionSystem.visibility(state, 'p1', { q: 5, r: 5 })).toBe('visible');
    expect(VisionSystem.visibility(state, 'p1', { q: 8, r: 5 })).toBe('visible');
    expect(VisionSystem.visibility(state, 'p1', { q: 9, r: 5 })).toBe('unexplored');
    // radius 3 spiral is 37 tiles, all in bounds
    expect(changes).toHaveLength(37);
    expect(changes.every(c => c.type === 'fogOfWarUpdated')).toBe(true);
  });

  it('keeps tiles explored after the viewer leaves', () => {
    const state = makeWorld();
    addPlayer(state, 'p1');
    const army = addArmy(state, 'p1', { q: 5, r: 5 }, { swordsman: 1 });
    VisionSystem.update(state, ctx);

    army.coord = { q: 1, r: 1 };
    const changes = VisionSystem.update(state, ctx);
    expect(VisionSystem.visibility(state, 'p1', { q: 5, r: 5 })).toBe('explored');
    expect(VisionSystem.visibility(state, 'p1', { q: 1, r: 1 })).toBe('visible');
    expect(changes).toContainEqual({ type: 'fogOfWarUpdated', playerId: 'p1', coord: { q: 5, r: 5 }, visibility: 'explored' });
  });

  it('emits nothing when nothing moved', () => {
    const state = makeWorld();
    addPlayer(state, 'p1');
    addArmy(state, 'p1', { q: 5, r: 5 }, { swordsman: 1 });
    VisionSystem.update(state, ctx);
    expect(VisionSystem.update(state, ctx)).toEqual([]);
  });

  it('mountains hide the tiles behind them', () => {
    const state = makeWorld(12, 12, { '6,5': 'mountain' });
    addPlayer(state, 'p1');
    addArmy(state, 'p1', { q: 5, r: 5 }, { swordsman: 1 });
    VisionSystem.update(state, ctx);
    expect(VisionSystem.visibility(state, 'p1', { q: 6, r: 5 })).toBe('visible');
    expect(VisionSystem.visibility(state, 'p1', { q: 7, r: 5 })).toBe('unexplored');
  });

  it('a building under construction sees only one tile around it', () => {
    const state = makeWorld();
    addPlayer(state, 'p1');
    addBuilding(state, ctx, 'p1', 'tower', { q: 5, r: 5 }, { completed: false });
    VisionSystem.update(state, ctx);
    expect(VisionSystem.visibility(state, 'p1', { q: 6, r: 5 })).toBe('visible');
    expect(VisionSystem.visibility(state, 'p1', { q: 7, r: 5 })).toBe('unexplored');
  });
});
