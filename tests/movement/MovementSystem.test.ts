import { describe, it, expect } from 'vitest';
import { MovementSystem } from '@/engine/systems/movement/MovementSystem';
import { hex } from '@/engine/data/types/Hex';
import { makeContext, makeWorld, addPlayer, makeEnemies, addBuilding, addArmy } from '../helpers';

describe('MovementSystem', () => {
  it('walks a paved tile at three times the off-road pace', () => {
    const ctx = makeContext();
    const state = makeWorld();
    addPlayer(state, 'p1');
    addBuilding(state, ctx, 'p1', 'road', hex(2, 1));
    const paved = addArmy(state, 'p1', hex(1, 1), { swordsman: 5 });
    const rough = addArmy(state, 'p1', hex(1, 3), { swordsman: 5 });
    paved.movement = { path: [hex(2, 1)], progress: 0, intent: { kind: 'move' } };
    rough.movement = { path: [hex(2, 3)], progress: 0, intent: { kind: 'move' } };

    // 0.75 / 1.4 hex/s: a road step needs 1/3 of a tile's distance, plains a whole one
    const early = MovementSystem.update(state, 0.7, ctx);
    expect(early).toEqual([{ type: 'armyMoved', armyId: paved.id, from: hex(1, 1), to: hex(2, 1) }]);
    expect(rough.coord).toEqual(hex(1, 3));

    const late = MovementSystem.update(state, 1.3, ctx);
    expect(late).toEqual([{ type: 'armyMoved', armyId: rough.id, from: hex(1, 3), to: hex(2, 3) }]);
  });

  it('stops at a hostile army met partway and engages it', () => {
    const ctx = makeContext();
    const state = makeWorld();
    addPlayer(state, 'p1');
    addPlayer(state, 'p2');
    makeEnemies(state, 'p1', 'p2');
    const army = addArmy(state, 'p1', hex(1, 1), { swordsman: 5 });
    const blocker = addArmy(state, 'p2', hex(3, 1), { swordsman: 5 });
    army.movement = { path: [hex(2, 1), hex(3, 1), hex(4, 1)], progress: 0, intent: { kind: 'move' } };

    const changes = MovementSystem.update(state, 10, ctx);

    expect(changes.slice(0, 2)).toEqual([
      { type: 'armyMoved', armyId: army.id, from: hex(1, 1), to: hex(2, 1) },
      { type: 'armyMoved', armyId: army.id, from: hex(2, 1), to: hex(3, 1) },
    ]);
    expect(changes).toHaveLength(3);
    expect(changes[2]).toMatchObject({
      type: 'combatStarted',
      attackerId: army.id,
      defender: { kind: 'army', id: blocker.id },
      coord: hex(3, 1),
    });
    expect(army.movement).toBeNull();
    expect(army.coord).toEqual(hex(3, 1));
    expect(Object.keys(state.combats)).toHaveLength(1);
    expect(state.armies[blocker.id]?.inCombat).toBe(true);
  });

  it('lets a retreating army pass through hostile tiles', () => {
    const ctx = makeContext();
    const state = makeWorld();
    addPlayer(state, 'p1');
    addPlayer(state, 'p2');
    makeEnemies(state, 'p1', 'p2');
    const army = addArmy(state, 'p1', hex(1, 1), { swordsman: 5 });
    addArmy(state, 'p2', hex(2, 1), { swordsman: 5 });
    army.movement = { path: [hex(2, 1), hex(3, 1)], progress: 0, intent: { kind: 'retreat' } };

    const changes = MovementSystem.update(state, 10, ctx);

    expect(changes.map(c => c.type)).toEqual(['armyMoved', 'armyMoved']);
    expect(army.coord).toEqual(hex(3, 1));
    expect(state.combats).toEqual({});
  });
});
