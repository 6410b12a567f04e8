import { describe, it, expect } from 'vitest';
import type { StateChange } from '@/engine/data/types/StateChange';
import { SimulationStore } from '@/engine/state/SimulationStore';
import { GatherCommand } from '@/engine/state/commands/GatherCommand';
import { StopGatheringCommand } from '@/engine/state/commands/StopGatheringCommand';
import { ResourceSystem } from '@/engine/systems/economy/ResourceSystem';
import { hex } from '@/engine/data/types/Hex';
import { makeContext, makeWorld, addPlayer, addBuilding, addVillagers, addResourcePoint } from '../helpers';

describe('ResourceSystem gathering', () => {
  it('depletes a point exactly once and idles its gatherers', () => {
    const ctx = makeContext();
    const state = makeWorld();
    addPlayer(state, 'p1', { food: 1000 });
    const group = addVillagers(state, 'p1', hex(2, 2), 5);
    const trees = addResourcePoint(state, ctx, 'trees', hex(3, 2));
    const store = new SimulationStore(state, ctx);

    expect(store.execute(new GatherCommand('p1', 0, group.id, trees.id)).result.succeeded).toBe(true);

    // 0.5 base + 5 × 0.2 per villager = 1.5 wood/s, so 15 per 10 s step
    const changes: StateChange[] = [];
    for (let i = 0; i < 10; i++) changes.push(...store.apply(draft => ResourceSystem.update(draft, 10, ctx)));

    const depleted = changes.filter(c => c.type === 'resourcePointDepleted');
    expect(depleted).toEqual([{ type: 'resourcePointDepleted', resourcePointId: trees.id, coord: hex(3, 2), resource: 'wood' }]);
    const after = store.getState();
    expect(after.players['p1']?.resources.wood).toBe(100);
    expect(after.villagerGroups[group.id]?.task).toEqual({ kind: 'idle' });
    expect(after.resourcePoints[trees.id]).toBeUndefined();
  });

  it('reports the remaining amount while a point lasts', () => {
    const ctx = makeContext();
    const state = makeWorld();
    addPlayer(state, 'p1', { food: 1000 });
    const group = addVillagers(state, 'p1', hex(2, 2), 5);
    const trees = addResourcePoint(state, ctx, 'trees', hex(3, 2));
    group.task = { kind: 'gathering', resourcePointId: trees.id };
    trees.assignedGroupIds.push(group.id);

    const changes = ResourceSystem.update(state, 10, ctx);

    expect(changes).toContainEqual({ type: 'resourcePointAmountChanged', resourcePointId: trees.id, remaining: 85 });
    expect(state.players['p1']?.resources.wood).toBe(15);
  });

  it('limits how many groups share a point', () => {
    const ctx = makeContext();
    const state = makeWorld();
    addPlayer(state, 'p1');
    const trees = addResourcePoint(state, ctx, 'trees', hex(5, 5));
    const groups = [hex(4, 5), hex(6, 5), hex(5, 4)].map(c => addVillagers(state, 'p1', c, 1));
    const store = new SimulationStore(state, ctx);

    const results = groups.map(g => store.execute(new GatherCommand('p1', 0, g.id, trees.id)).result);

    expect(results.map(r => r.succeeded)).toEqual([true, true, false]);
    expect(results[2]?.failureReason).toBe('resource has no room for more gatherers');
  });

  it('floors food at zero when upkeep outruns the stockpile', () => {
    const ctx = makeContext();
    const state = makeWorld();
    const player = addPlayer(state, 'p1', { food: 3 });
    addVillagers(state, 'p1', hex(2, 2), 10);

    // 10 villagers eat 1 food/s
    ResourceSystem.update(state, 5, ctx);

    expect(player.resources.food).toBe(0);
    expect(player.consumptionCarry).toBe(0);
  });

  it('counts farm output in the collection rates', () => {
    const ctx = makeContext();
    const state = makeWorld();
    const player = addPlayer(state, 'p1');
    addBuilding(state, ctx, 'p1', 'farm', hex(4, 4));
    addVillagers(state, 'p1', hex(2, 2), 1);

    ResourceSystem.recomputeRates(state, ctx);

    expect(player.collectionRates.food).toBeCloseTo(0.2 - 0.1, 9);
  });
});

describe('StopGatheringCommand', () => {
  it('frees the slot on the point and idles the group', () => {
    const ctx = makeContext();
    const state = makeWorld();
    addPlayer(state, 'p1');
    const group = addVillagers(state, 'p1', hex(2, 2), 5);
    const trees = addResourcePoint(state, ctx, 'trees', hex(3, 2));
    const store = new SimulationStore(state, ctx);
    store.execute(new GatherCommand('p1', 0, group.id, trees.id));

    const stopped = store.execute(new StopGatheringCommand('p1', 0, group.id));

    expect(stopped.result.succeeded).toBe(true);
    expect(stopped.changes).toEqual([{ type: 'villagerGroupTaskChanged', groupId: group.id, task: 'idle', targetId: null }]);
    expect(store.getState().villagerGroups[group.id]?.task).toEqual({ kind: 'idle' });
    expect(store.getState().resourcePoints[trees.id]?.assignedGroupIds).toEqual([]);
  });

  it('refuses a group that is not gathering', () => {
    const ctx = makeContext();
    const state = makeWorld();
    addPlayer(state, 'p1');
    const group = addVillagers(state, 'p1', hex(2, 2), 5);
    const store = new SimulationStore(state, ctx);

    expect(store.execute(new StopGatheringCommand('p1', 0, group.id)).result.failureReason).toBe('villagers are not gathering');
  });
});

describe('ResourceSystem hunting', () => {
  it('turns a slain animal into a carcass and sets its hunters gathering', () => {
    const ctx = makeContext();
    const state = makeWorld();
    addPlayer(state, 'p1', { food: 1000 });
    const group = addVillagers(state, 'p1', hex(2, 2), 5);
    const deer = addResourcePoint(state, ctx, 'deer', hex(3, 2));
    const store = new SimulationStore(state, ctx);

    store.execute(new GatherCommand('p1', 0, group.id, deer.id));
    expect(store.getState().villagerGroups[group.id]?.task).toEqual({ kind: 'hunting', resourcePointId: deer.id });

    // 5 hunters × 2 damage/s against 40 health
    const first = store.apply(draft => ResourceSystem.update(draft, 2, ctx));
    expect(first.filter(c => c.type === 'resourcePointConverted')).toEqual([]);
    expect(store.getState().resourcePoints[deer.id]?.health).toBe(20);

    const second = store.apply(draft => ResourceSystem.update(draft, 2, ctx));
    expect(second.slice(0, 2)).toEqual([
      { type: 'resourcePointConverted', resourcePointId: deer.id, into: 'deerCarcass' },
      { type: 'villagerGroupTaskChanged', groupId: group.id, task: 'gathering', targetId: deer.id },
    ]);
    expect(store.getState().resourcePoints[deer.id]?.type).toBe('deerCarcass');
    expect(store.getState().villagerGroups[group.id]?.task).toEqual({ kind: 'gathering', resourcePointId: deer.id });
  });
});
