import { describe, it, expect } from 'vitest';
import type { StateChange } from '@/engine/data/types/StateChange';
import { SimulationStore } from '@/engine/state/SimulationStore';
import { ReinforceArmyCommand } from '@/engine/state/commands/ReinforceArmyCommand';
import { ReinforcementSystem } from '@/engine/systems/military/ReinforcementSystem';
import { updateEntrenchments } from '@/engine/systems/military/ArmySystem';
import { hex } from '@/engine/data/types/Hex';
import { makeContext, makeWorld, addPlayer, addBuilding, addArmy, makeEnemies } from '../helpers';

describe('ReinforceArmyCommand', () => {
  it('marches garrison units out and merges them on arrival', () => {
    const ctx = makeContext();
    const state = makeWorld();
    addPlayer(state, 'p1');
    const barracks = addBuilding(state, ctx, 'p1', 'barracks', hex(2, 2));
    barracks.garrison = { swordsman: 10 };
    const army = addArmy(state, 'p1', hex(5, 2), { swordsman: 5 });
    const store = new SimulationStore(state, ctx);

    const { result, changes } = store.execute(new ReinforceArmyCommand('p1', 0, barracks.id, army.id, { swordsman: 4 }));
    expect(result.succeeded).toBe(true);
    expect(changes.map(c => c.type)).toEqual(['reinforcementDispatched']);
    expect(store.getState().buildings[barracks.id]?.garrison).toEqual({ swordsman: 6 });

    const arrived = store.apply(draft => ReinforcementSystem.update(draft, 100, ctx));

    expect(arrived.map(c => c.type)).toEqual(['reinforcementArrived', 'armyCompositionChanged']);
    expect(store.getState().armies[army.id]?.composition).toEqual({ swordsman: 9 });
    expect(store.getState().reinforcements).toEqual({});
  });

  it('returns to the garrison when the target army is gone', () => {
    const ctx = makeContext();
    const state = makeWorld();
    addPlayer(state, 'p1');
    const barracks = addBuilding(state, ctx, 'p1', 'barracks', hex(2, 2));
    barracks.garrison = { swordsman: 10 };
    const army = addArmy(state, 'p1', hex(6, 2), { swordsman: 5 });
    const store = new SimulationStore(state, ctx);
    store.execute(new ReinforceArmyCommand('p1', 0, barracks.id, army.id, { swordsman: 4 }));

    store.apply(draft => {
      delete draft.armies[army.id];
      return [];
    });
    const changes = store.apply(draft => ReinforcementSystem.update(draft, 0, ctx));

    const returned = changes.find(c => c.type === 'reinforcementReturned');
    expect(returned).toMatchObject({ type: 'reinforcementReturned', buildingId: barracks.id });
    expect(store.getState().buildings[barracks.id]?.garrison).toEqual({ swordsman: 10 });
  });

  it('refuses units the garrison does not hold', () => {
    const ctx = makeContext();
    const state = makeWorld();
    addPlayer(state, 'p1');
    const barracks = addBuilding(state, ctx, 'p1', 'barracks', hex(2, 2));
    const army = addArmy(state, 'p1', hex(5, 2), { swordsman: 5 });
    const store = new SimulationStore(state, ctx);

    const { result } = store.execute(new ReinforceArmyCommand('p1', 0, barracks.id, army.id, { swordsman: 1 }));
    expect(result.failureReason).toBe('garrison does not hold those units');
  });

  it('refuses a negative unit count', () => {
    const ctx = makeContext();
    const state = makeWorld();
    addPlayer(state, 'p1');
    const barracks = addBuilding(state, ctx, 'p1', 'barracks', hex(2, 2));
    barracks.garrison = { swordsman: 5, archer: 5 };
    const army = addArmy(state, 'p1', hex(5, 2), { swordsman: 5 });
    const store = new SimulationStore(state, ctx);

    const { result } = store.execute(new ReinforceArmyCommand('p1', 0, barracks.id, army.id, { swordsman: 2, archer: -1 }));
    expect(result.failureReason).toBe('unit counts must be whole numbers');
    expect(store.getState().buildings[barracks.id]?.garrison).toEqual({ swordsman: 5, archer: 5 });
    expect(store.getState().reinforcements).toEqual({});
  });
});

describe('ReinforcementSystem.intercept', () => {
  it('loses a weak column to a hostile army on its route', () => {
    const ctx = makeContext();
    const state = makeWorld();
    addPlayer(state, 'p1');
    addPlayer(state, 'p2');
    makeEnemies(state, 'p1', 'p2');
    const barracks = addBuilding(state, ctx, 'p1', 'barracks', hex(2, 2));
    barracks.garrison = { swordsman: 1 };
    const friend = addArmy(state, 'p1', hex(6, 2), { swordsman: 5 });
    const blocker = addArmy(state, 'p2', hex(3, 2), { swordsman: 20 });

    ReinforcementSystem.dispatch(state, barracks, friend, { swordsman: 1 }, ctx);
    const reinforcement = Object.values(state.reinforcements)[0];
    if (!reinforcement) throw new Error('no reinforcement dispatched');
    // force the route through the enemy tile
    reinforcement.path = [hex(3, 2), hex(4, 2), hex(5, 2)];

    const changes: StateChange[] = ReinforcementSystem.update(state, 100, ctx);

    expect(changes[0]).toEqual({
      type: 'reinforcementIntercepted', reinforcementId: reinforcement.id, byArmyId: blocker.id, survived: false,
    });
    expect(state.reinforcements).toEqual({});
    expect(state.armies[blocker.id]).toBeDefined();
  });
});

describe('updateEntrenchments', () => {
  it('finishes digging after the build time', () => {
    const ctx = makeContext();
    const state = makeWorld();
    addPlayer(state, 'p1');
    const army = addArmy(state, 'p1', hex(3, 3), { swordsman: 5 });
    army.entrenchment = 'entrenching';
    army.entrenchmentStartedAt = 0;

    state.currentTime = ctx.config.entrenchment.buildTime - 1;
    expect(updateEntrenchments(state, ctx)).toEqual([]);

    state.currentTime = ctx.config.entrenchment.buildTime;
    expect(updateEntrenchments(state, ctx)).toEqual([{ type: 'armyEntrenched', armyId: army.id }]);
    expect(army.entrenchment).toBe('entrenched');
  });
});
