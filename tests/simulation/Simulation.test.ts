import { describe, it, expect } from 'vitest';
import type { WorldState } from '@/engine/state/WorldState';
import type { StateChange } from '@/engine/data/types/StateChange';
import { Simulation } from '@/engine/simulation/Simulation';
import { SimulationStore } from '@/engine/state/SimulationStore';
import { MoveCommand } from '@/engine/state/commands/MoveCommand';
import { EntrenchCommand } from '@/engine/state/commands/EntrenchCommand';
import { createAIPlayerState } from '@/engine/data/types/AI';
import { hex } from '@/engine/data/types/Hex';
import { Logger } from '@/engine/utils/Logger';
import { makeContext, makeWorld, addPlayer, addBuilding, addArmy } from '../helpers';

describe('Simulation.tick', () => {
  it('runs every subsystem on the first tick, then each on its own cadence', () => {
    const ctx = makeContext();
    const state = makeWorld();
    addPlayer(state, 'p1');
    const sim = new Simulation(state, ctx);

    sim.tick(1);
    expect(sim.state.subsystemLastRun).toMatchObject({
      movement: 1, combat: 1, vision: 1, building: 1, training: 1, resource: 1, research: 1, ai: 1,
    });

    sim.tick(1.2);
    expect(sim.state.subsystemLastRun).toMatchObject({ movement: 1.2, vision: 1, combat: 1, resource: 1 });
    expect(sim.state.currentTime).toBe(1.2);
  });

  it('moves an ordered army once enough time has accrued', () => {
    const ctx = makeContext();
    const state = makeWorld();
    addPlayer(state, 'p1');
    const army = addArmy(state, 'p1', hex(1, 1), { swordsman: 5 });
    const sim = new Simulation(state, ctx);
    sim.submit(new MoveCommand('p1', 0, { kind: 'army', id: army.id }, hex(4, 1)));

    // 0.75 / 1.4 hexes per second on plains
    const first = sim.tick(1);
    expect(first.filter(c => c.type === 'armyMoved')).toEqual([]);

    const second = sim.tick(2);
    expect(second.filter(c => c.type === 'armyMoved')).toEqual([
      { type: 'armyMoved', armyId: army.id, from: hex(1, 1), to: hex(2, 1) },
    ]);
  });

  it('ignores a tick behind the clock', () => {
    const ctx = makeContext();
    const sim = new Simulation(makeWorld(2, 2), ctx);
    sim.tick(5);
    const before = sim.state;

    expect(sim.tick(4)).toEqual([]);
    expect(sim.state).toBe(before);
  });

  it('lets AI players act through the command pipeline', () => {
    const ctx = makeContext();
    const state = makeWorld(16, 16);
    addPlayer(state, 'ai', { wood: 40, stone: 40, food: 30 }, { isAI: true });
    addBuilding(state, ctx, 'ai', 'cityCenter', hex(5, 5));
    state.aiPlayers['ai'] = createAIPlayerState('ai');
    const sim = new Simulation(state, ctx);

    sim.tick(1);

    expect(sim.state.players['ai']?.activeResearch?.researchId).toBe('lumberCampGatheringI');
    expect(sim.state.players['ai']?.resources).toMatchObject({ stone: 0, food: 0, wood: 40 });
    expect(sim.state.aiPlayers['ai']?.lastDecisionAt).toBe(1);
  });
});

describe('SimulationStore', () => {
  function storeWithArmy(): { store: SimulationStore; armyId: string; initial: WorldState } {
    const ctx = makeContext();
    const state = makeWorld();
    addPlayer(state, 'p1', { wood: 300 });
    const army = addArmy(state, 'p1', hex(2, 2), { swordsman: 5 });
    return { store: new SimulationStore(state, ctx), armyId: army.id, initial: state };
  }

  it('notifies subscribers with the committed changes', () => {
    const { store, armyId } = storeWithArmy();
    const seen: StateChange[][] = [];
    const unsubscribe = store.subscribe((_state, changes) => seen.push([...changes]));

    store.execute(new EntrenchCommand('p1', 0, armyId));
    unsubscribe();
    store.execute(new EntrenchCommand('p1', 0, armyId));

    expect(seen).toHaveLength(1);
    expect(seen[0]?.map(c => c.type)).toEqual(['armyEntrenchmentStarted', 'resourcesChanged']);
  });

  it('does not record history for a rejected command', () => {
    const { store } = storeWithArmy();
    store.execute(new EntrenchCommand('p1', 0, 'army_missing'));
    expect(store.getHistory()).toHaveLength(0);
  });

  it('undoes back to the previous snapshot', () => {
    const { store, armyId, initial } = storeWithArmy();
    store.execute(new EntrenchCommand('p1', 0, armyId));

    expect(store.undo()).toBe(true);
    expect(store.getState()).toBe(initial);
    expect(store.undo()).toBe(false);
  });

  it('keeps a bounded history', () => {
    const { store } = storeWithArmy();
    for (let i = 1; i <= 60; i++) {
      store.apply(draft => {
        draft.currentTime = i;
        return [];
      });
    }
    expect(store.getHistory()).toHaveLength(50);
    expect(store.getHistory()[0]?.currentTime).toBe(10);
  });
});

describe('Logger', () => {
  it('forwards entries to sinks until they detach, even while console output is off', () => {
    const lines: string[] = [];
    const detach = Logger.addSink(entry => lines.push(`${entry.cls}:${entry.text}`));
    Logger.log('hello', 'economy');
    Logger.warn('careful');
    detach();
    Logger.log('after', 'system');

    expect(lines).toEqual(['economy:hello', 'warning:careful']);
  });
});
