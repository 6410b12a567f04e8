import { describe, it, expect } from 'vitest';
import type { WorldState } from '@/engine/state/WorldState';
import type { SimulationContext } from '@/engine/simulation/SimulationContext';
import { WorldLoader } from '@/engine/loader/WorldLoader';
import { VisionSystem } from '@/engine/systems/vision/VisionSystem';
import { createAIPlayerState } from '@/engine/data/types/AI';
import { SimulationError } from '@/engine/utils/SimulationError';
import { hex } from '@/engine/data/types/Hex';
import {
  makeContext, makeWorld, addPlayer, addBuilding, addArmy, addVillagers, addResourcePoint, makeEnemies,
} from '../helpers';

function sampleWorld(ctx: SimulationContext): WorldState {
  const state = makeWorld(10, 10, { '7,7': 'hill', '8,2': 'water' });
  addPlayer(state, 'p1', { wood: 120, food: 40 });
  addPlayer(state, 'p2', { stone: 15 }, { isAI: true });
  makeEnemies(state, 'p1', 'p2');
  addBuilding(state, ctx, 'p1', 'cityCenter', hex(2, 2));
  const barracks = addBuilding(state, ctx, 'p1', 'barracks', hex(5, 2), { completed: false });
  barracks.garrison = { archer: 3 };
  const army = addArmy(state, 'p2', hex(7, 5), { swordsman: 4, archer: 2 });
  army.entrenchment = 'entrenched';
  const trees = addResourcePoint(state, ctx, 'trees', hex(4, 6), 70);
  const group = addVillagers(state, 'p1', hex(3, 6), 3);
  group.task = { kind: 'gathering', resourcePointId: trees.id };
  trees.assignedGroupIds.push(group.id);
  state.aiPlayers['p2'] = createAIPlayerState('p2', 'hard');
  state.currentTime = 250;
  VisionSystem.recomputeAll(state, ctx);
  return state;
}

describe('WorldLoader', () => {
  it('reproduces a snapshot after a JSON round trip', () => {
    const ctx = makeContext();
    const snapshot = WorldLoader.createSnapshot(sampleWorld(ctx));

    const loaded = WorldLoader.fromSnapshot(JSON.parse(JSON.stringify(snapshot)), ctx);

    expect(WorldLoader.createSnapshot(loaded)).toEqual(snapshot);
  });

  it('rebuilds derived state from the saved fields', () => {
    const ctx = makeContext();
    const source = sampleWorld(ctx);
    const loaded = WorldLoader.fromSnapshot(JSON.parse(JSON.stringify(WorldLoader.createSnapshot(source))), ctx);

    const center = Object.values(loaded.buildings).find(b => b.type === 'cityCenter');
    expect(center?.occupied).toEqual([hex(2, 2), hex(3, 2), hex(3, 1)]);
    expect(center?.maxHealth).toBe(ctx.catalog.buildings.cityCenter.maxHealth);

    const trees = Object.values(loaded.resourcePoints)[0];
    const group = Object.values(loaded.villagerGroups)[0];
    expect(trees?.assignedGroupIds).toEqual([group?.id]);
    expect(group?.task).toEqual({ kind: 'gathering', resourcePointId: trees?.id });
    expect(loaded.aiPlayers['p2']?.difficulty).toBe('hard');
    expect(loaded.nextId).toBe(source.nextId);
  });

  it('moves the id counter past every saved id', () => {
    const ctx = makeContext();
    const snapshot = WorldLoader.createSnapshot(sampleWorld(ctx));
    const loaded = WorldLoader.fromSnapshot(JSON.parse(JSON.stringify({ ...snapshot, nextId: 0 })), ctx);
    expect(loaded.nextId).toBe(snapshot.nextId);
  });

  it('accepts a snapshot that was never reconciled', () => {
    const ctx = makeContext();
    const snapshot = WorldLoader.createSnapshot(makeWorld(2, 2));
    expect(WorldLoader.fromSnapshot(JSON.parse(JSON.stringify(snapshot)), ctx).lastReconciledAt).toBeNull();
  });

  it('names the field when an owner is unknown', () => {
    const ctx = makeContext();
    const snapshot = WorldLoader.createSnapshot(sampleWorld(ctx));
    const broken = { ...snapshot, buildings: snapshot.buildings.map(b => ({ ...b, ownerId: 'ghost' })) };

    expect(() => WorldLoader.fromSnapshot(broken, ctx)).toThrow(SimulationError);
    expect(() => WorldLoader.fromSnapshot(broken, ctx)).toThrow('buildings[0].ownerId: unknown player ghost');
  });

  it('rejects an unknown terrain type', () => {
    const ctx = makeContext();
    const raw = { map: { width: 1, height: 1, tiles: [{ q: 0, r: 0, terrain: 'lava' }] } };
    expect(() => WorldLoader.fromSnapshot(raw, ctx)).toThrow(/^map\.tiles\[0\]\.terrain: expected /);
  });
});
