import { describe, it, expect } from 'vitest';
import type { WorldState } from '@/engine/state/WorldState';
import type { BuildingState } from '@/engine/data/types/Building';
import type { SimulationContext } from '@/engine/simulation/SimulationContext';
import { executeCommand } from '@/engine/state/commands/CommandPipeline';
import { TrainCommand } from '@/engine/state/commands/TrainCommand';
import { DeployCommand } from '@/engine/state/commands/DeployCommand';
import { TrainingSystem } from '@/engine/systems/economy/TrainingSystem';
import { hex } from '@/engine/data/types/Hex';
import { makeContext, makeWorld, addPlayer, addBuilding } from '../helpers';

function setup(ctx: SimulationContext): { state: WorldState; barracks: BuildingState } {
  const state = makeWorld();
  addPlayer(state, 'p1', { food: 1000, ore: 1000, wood: 1000 });
  addBuilding(state, ctx, 'p1', 'cityCenter', hex(1, 1));
  const barracks = addBuilding(state, ctx, 'p1', 'barracks', hex(6, 6));
  return { state, barracks };
}

describe('TrainCommand', () => {
  it('charges per unit and queues the batch', () => {
    const ctx = makeContext();
    const { state, barracks } = setup(ctx);

    const { state: next, changes } = executeCommand(state, new TrainCommand('p1', 0, barracks.id, 'swordsman', 3), ctx);

    expect(changes[0]).toEqual({ type: 'trainingStarted', buildingId: barracks.id, unitType: 'swordsman', quantity: 3 });
    expect(next.players['p1']?.resources).toMatchObject({ food: 850, ore: 925 });
    expect(next.buildings[barracks.id]?.trainingQueue).toEqual([{ unitType: 'swordsman', quantity: 3, startedAt: 0 }]);
  });

  it('rejects units the building does not train', () => {
    const ctx = makeContext();
    const { state, barracks } = setup(ctx);
    const { result } = executeCommand(state, new TrainCommand('p1', 0, barracks.id, 'archer', 1), ctx);
    expect(result.failureReason).toBe('building cannot train that');
  });

  it('stops at the population cap', () => {
    const ctx = makeContext();
    const { state, barracks } = setup(ctx);
    // one city centre houses 10
    const { result } = executeCommand(state, new TrainCommand('p1', 0, barracks.id, 'swordsman', 11), ctx);
    expect(result.failureReason).toBe('population capacity reached');
  });

  it('rejects fractional quantities', () => {
    const ctx = makeContext();
    const { state, barracks } = setup(ctx);
    const { result } = executeCommand(state, new TrainCommand('p1', 0, barracks.id, 'swordsman', 1.5), ctx);
    expect(result.failureReason).toBe('quantity must be a positive whole number');
  });
});

describe('TrainingSystem.update', () => {
  it('completes a batch after unit time × quantity into the garrison', () => {
    const ctx = makeContext();
    const { state, barracks } = setup(ctx);
    TrainingSystem.enqueue(state, barracks, 'swordsman', 3, ctx);

    state.currentTime = 44;
    expect(TrainingSystem.update(state, ctx)).toEqual([]);

    state.currentTime = 45;
    expect(TrainingSystem.update(state, ctx)).toEqual([
      { type: 'trainingCompleted', buildingId: barracks.id, unitType: 'swordsman', quantity: 3 },
      { type: 'unitsGarrisoned', buildingId: barracks.id, composition: { swordsman: 3 }, villagers: 0 },
    ]);
    expect(barracks.garrison).toEqual({ swordsman: 3 });
  });

  it('starts a queued batch when the previous one ends', () => {
    const ctx = makeContext();
    const { state, barracks } = setup(ctx);
    TrainingSystem.enqueue(state, barracks, 'swordsman', 2, ctx);
    TrainingSystem.enqueue(state, barracks, 'pikeman', 1, ctx);

    expect(barracks.trainingQueue[1]?.startedAt).toBe(30);
    state.currentTime = 45;
    TrainingSystem.update(state, ctx);
    expect(barracks.garrison).toEqual({ swordsman: 2, pikeman: 1 });
  });

  it('holds training while the building is still under construction', () => {
    const ctx = makeContext();
    const state = makeWorld();
    addPlayer(state, 'p1', { food: 1000, ore: 1000 });
    const barracks = addBuilding(state, ctx, 'p1', 'barracks', hex(6, 6), { completed: false });
    barracks.trainingQueue.push({ unitType: 'swordsman', quantity: 1, startedAt: 0 });

    state.currentTime = 100;
    expect(TrainingSystem.update(state, ctx)).toEqual([]);
  });
});

describe('DeployCommand', () => {
  it('forms an army beside the building from its garrison', () => {
    const ctx = makeContext();
    const { state, barracks } = setup(ctx);
    barracks.garrison = { swordsman: 5 };

    const { state: next, changes } = executeCommand(state, new DeployCommand('p1', 0, barracks.id, { swordsman: 3 }), ctx);

    const created = changes.find(c => c.type === 'armyCreated');
    expect(created).toMatchObject({ type: 'armyCreated', ownerId: 'p1', composition: { swordsman: 3 } });
    expect(next.buildings[barracks.id]?.garrison).toEqual({ swordsman: 2 });
    const army = Object.values(next.armies)[0];
    expect(army?.homeBaseId).toBe(barracks.id);
  });

  it('refuses more units than the garrison holds', () => {
    const ctx = makeContext();
    const { state, barracks } = setup(ctx);
    barracks.garrison = { swordsman: 2 };
    const { result } = executeCommand(state, new DeployCommand('p1', 0, barracks.id, { swordsman: 3 }), ctx);
    expect(result.failureReason).toBe('garrison does not hold those units');
  });

  it('refuses negative and fractional counts', () => {
    const ctx = makeContext();
    const { state, barracks } = setup(ctx);
    barracks.garrison = { swordsman: 5 };

    const negative = executeCommand(state, new DeployCommand('p1', 0, barracks.id, { swordsman: 3, archer: -2 }), ctx);
    const fractional = executeCommand(state, new DeployCommand('p1', 0, barracks.id, { swordsman: 1.5 }), ctx);

    expect(negative.result.failureReason).toBe('unit counts must be whole numbers');
    expect(fractional.result.failureReason).toBe('unit counts must be whole numbers');
  });
});
