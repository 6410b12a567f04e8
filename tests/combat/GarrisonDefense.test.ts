import { describe, it, expect } from 'vitest';
import { GarrisonDefense } from '@/engine/systems/combat/GarrisonDefense';
import { makeContext, makeWorld, addPlayer, makeEnemies, addArmy, addBuilding } from '../helpers';

function setup() {
  const ctx = makeContext();
  const state = makeWorld();
  addPlayer(state, 'p1');
  addPlayer(state, 'p2');
  makeEnemies(state, 'p1', 'p2');
  const tower = addBuilding(state, ctx, 'p2', 'tower', { q: 5, r: 5 });
  tower.garrison = { archer: 5 };
  return { ctx, state, tower };
}

describe('GarrisonDefense.update', () => {
  it('fires at the weakest hostile army in range', () => {
    const { ctx, state, tower } = setup();
    addArmy(state, 'p1', { q: 6, r: 5 }, { swordsman: 4 });
    const weak = addArmy(state, 'p1', { q: 5, r: 6 }, { swordsman: 2 });
    addArmy(state, 'p1', { q: 8, r: 5 }, { swordsman: 1 });

    // 5 archers × 12
    const changes = GarrisonDefense.update(state, ctx);

    expect(changes).toEqual([
      { type: 'garrisonDefenseAttack', buildingId: tower.id, targetArmyId: weak.id, damage: 60 },
      { type: 'armyCompositionChanged', armyId: weak.id, composition: { swordsman: 1 } },
    ]);
    expect(state.armies[weak.id]?.damageCarry.swordsman).toBe(10);
    expect(tower.lastGarrisonFireAt).toBe(0);
  });

  it('waits out the fire interval between volleys', () => {
    const { ctx, state, tower } = setup();
    const target = addArmy(state, 'p1', { q: 5, r: 6 }, { swordsman: 2 });

    GarrisonDefense.update(state, ctx);
    state.currentTime = 0.5;
    expect(GarrisonDefense.update(state, ctx)).toEqual([]);

    state.currentTime = 1;
    const second = GarrisonDefense.update(state, ctx);
    expect(second).toEqual([
      { type: 'garrisonDefenseAttack', buildingId: tower.id, targetArmyId: target.id, damage: 60 },
      { type: 'armyDestroyed', armyId: target.id, ownerId: 'p1', coord: { q: 5, r: 6 } },
    ]);
    expect(state.armies[target.id]).toBeUndefined();
    expect(tower.lastGarrisonFireAt).toBe(1);
  });

  it('is blunted by an entrenchment', () => {
    const { ctx, state, tower } = setup();
    const target = addArmy(state, 'p1', { q: 6, r: 5 }, { swordsman: 4 });
    target.entrenchment = 'entrenched';

    const changes = GarrisonDefense.update(state, ctx);

    expect(changes[0]).toEqual({ type: 'garrisonDefenseAttack', buildingId: tower.id, targetArmyId: target.id, damage: 54 });
    expect(state.armies[target.id]?.composition).toEqual({ swordsman: 3 });
  });

  it('stays silent with no ranged garrison or no one in range', () => {
    const { ctx, state, tower } = setup();
    addArmy(state, 'p1', { q: 8, r: 5 }, { swordsman: 2 });
    expect(GarrisonDefense.update(state, ctx)).toEqual([]);

    tower.garrison = { swordsman: 5 };
    addArmy(state, 'p1', { q: 6, r: 5 }, { swordsman: 2 });
    expect(GarrisonDefense.update(state, ctx)).toEqual([]);
  });
});
