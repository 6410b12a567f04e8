import { describe, it, expect } from 'vitest';
import { SimulationStore } from '@/engine/state/SimulationStore';
import { UpgradeCommand } from '@/engine/state/commands/UpgradeCommand';
import { CancelUpgradeCommand } from '@/engine/state/commands/CancelUpgradeCommand';
import { DemolishCommand } from '@/engine/state/commands/DemolishCommand';
import { CancelDemolitionCommand } from '@/engine/state/commands/CancelDemolitionCommand';
import { hex } from '@/engine/data/types/Hex';
import { makeContext, makeWorld, addPlayer, addBuilding } from '../helpers';

describe('upgrades', () => {
  it('refunds the whole cost when an upgrade is cancelled', () => {
    const ctx = makeContext();
    const state = makeWorld();
    addPlayer(state, 'p1', { wood: 500, stone: 500, ore: 500 });
    const center = addBuilding(state, ctx, 'p1', 'cityCenter', hex(4, 4));
    const store = new SimulationStore(state, ctx);

    const started = store.execute(new UpgradeCommand('p1', 0, center.id));
    expect(started.result.succeeded).toBe(true);
    expect(store.getState().buildings[center.id]?.state).toBe('upgrading');
    expect(store.getState().players['p1']?.resources).toEqual({ wood: 300, food: 0, stone: 350, ore: 450 });

    const cancelled = store.execute(new CancelUpgradeCommand('p1', 0, center.id));
    expect(cancelled.result.succeeded).toBe(true);
    expect(cancelled.changes).toEqual([
      { type: 'buildingUpgradeCancelled', buildingId: center.id },
      { type: 'resourcesChanged', playerId: 'p1', resources: { wood: 500, food: 0, stone: 500, ore: 500 } },
    ]);
    const after = store.getState().buildings[center.id];
    expect(after?.state).toBe('completed');
    expect(after?.upgrade).toBeNull();
    expect(after?.level).toBe(1);
  });

  it('refuses to cancel an upgrade that never started', () => {
    const ctx = makeContext();
    const state = makeWorld();
    addPlayer(state, 'p1');
    const center = addBuilding(state, ctx, 'p1', 'cityCenter', hex(4, 4));
    const store = new SimulationStore(state, ctx);

    expect(store.execute(new CancelUpgradeCommand('p1', 0, center.id)).result.failureReason).toBe('building is not upgrading');
  });
});

describe('demolition', () => {
  it('restores the building when demolition is cancelled', () => {
    const ctx = makeContext();
    const state = makeWorld();
    addPlayer(state, 'p1');
    addBuilding(state, ctx, 'p1', 'cityCenter', hex(4, 4));
    const farm = addBuilding(state, ctx, 'p1', 'farm', hex(8, 8));
    const store = new SimulationStore(state, ctx);

    expect(store.execute(new DemolishCommand('p1', 0, farm.id)).result.succeeded).toBe(true);
    expect(store.getState().buildings[farm.id]?.state).toBe('demolishing');

    const cancelled = store.execute(new CancelDemolitionCommand('p1', 0, farm.id));
    expect(cancelled.result.succeeded).toBe(true);
    expect(cancelled.changes).toEqual([{ type: 'buildingDemolitionCancelled', buildingId: farm.id }]);
    expect(store.getState().buildings[farm.id]?.state).toBe('completed');
    expect(store.getState().buildings[farm.id]?.demolition).toBeNull();
  });

  it('refuses to demolish a city centre', () => {
    const ctx = makeContext();
    const state = makeWorld();
    addPlayer(state, 'p1');
    const center = addBuilding(state, ctx, 'p1', 'cityCenter', hex(4, 4));
    const store = new SimulationStore(state, ctx);

    expect(store.execute(new DemolishCommand('p1', 0, center.id)).result.failureReason).toBe('city centres cannot be demolished');
  });
});
