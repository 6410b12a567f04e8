// ─────────────────────────────────────────────
//  Test Helpers
//  Build small headless worlds directly; drive them
//  with commands through the store or Simulation.
// ─────────────────────────────────────────────

import type { WorldState } from '@/engine/state/WorldState';
import type { SimulationContext } from '@/engine/simulation/SimulationContext';
import type { SimulationOverrides } from '@/config';
import type { Catalog } from '@/engine/loader/CatalogLoader';
import type { HexCoord } from '@/engine/data/types/Hex';
import type { MapTile } from '@/engine/data/types/Map';
import type { TerrainType } from '@/engine/data/types/Terrain';
import type { PlayerState } from '@/engine/data/types/Player';
import type { BuildingState, BuildingType } from '@/engine/data/types/Building';
import type { ArmyState } from '@/engine/data/types/Army';
import type { VillagerGroupState } from '@/engine/data/types/Villager';
import type { ResourcePointState, ResourcePointType, ResourceBalances } from '@/engine/data/types/Resource';
import type { Composition } from '@/engine/data/types/Unit';
import { createEmptyWorld, allocateId } from '@/engine/state/WorldState';
import { createSimulationContext } from '@/engine/simulation/SimulationContext';
import { loadCatalog } from '@/engine/loader/CatalogLoader';
import { hexKey } from '@/engine/data/types/Hex';
import { emptyBalances } from '@/engine/data/types/Resource';
import { ConstructionSystem } from '@/engine/systems/economy/ConstructionSystem';
import { createArmy } from '@/engine/systems/military/ArmySystem';
import { Logger } from '@/engine/utils/Logger';

Logger.setEnabled(false);

// ── Context ──────────────────────────────────

export function makeContext(
  options: { config?: SimulationOverrides; catalog?: (c: Catalog) => void; clock?: () => number } = {},
): SimulationContext {
  const catalog = structuredClone(loadCatalog());
  options.catalog?.(catalog);
  return createSimulationContext({ catalog, config: options.config, clock: options.clock ?? (() => 0) });
}

// ── World ────────────────────────────────────

/** Plains rectangle q ∈ [0, width), r ∈ [0, height). */
export function makeWorld(width = 12, height = 12, terrain: Record<string, TerrainType> = {}): WorldState {
  const tiles: Record<string, MapTile> = {};
  for (let q = 0; q < width; q++) {
    for (let r = 0; r < height; r++) {
      const coord = { q, r };
      tiles[hexKey(coord)] = { coord, terrain: terrain[hexKey(coord)] ?? 'plains', elevation: 0 };
    }
  }
  return createEmptyWorld({ width, height, tiles });
}

export function addPlayer(
  state: WorldState,
  id: string,
  resources: Partial<ResourceBalances> = {},
  overrides: Partial<PlayerState> = {},
): PlayerState {
  const player: PlayerState = {
    id,
    name: id,
    isAI: false,
    resources: { ...emptyBalances(), ...resources },
    collectionRates: emptyBalances(),
    consumptionCarry: 0,
    diplomacy: {},
    visibility: {},
    completedResearch: [],
    activeResearch: null,
    ...overrides,
  };
  state.players[id] = player;
  return player;
}

export function makeEnemies(state: WorldState, a: string, b: string): void {
  const pa = state.players[a];
  const pb = state.players[b];
  if (pa) pa.diplomacy[b] = 'enemy';
  if (pb) pb.diplomacy[a] = 'enemy';
}

export function addBuilding(
  state: WorldState,
  ctx: SimulationContext,
  ownerId: string,
  type: BuildingType,
  anchor: HexCoord,
  options: { completed?: boolean; level?: number; rotation?: number } = {},
): BuildingState {
  const { building } = ConstructionSystem.placeBuilding(state, ownerId, type, anchor, options.rotation ?? 0, ctx, {
    completed: options.completed ?? true,
    level: options.level,
  });
  return building;
}

export function addArmy(state: WorldState, ownerId: string, coord: HexCoord, composition: Composition): ArmyState {
  return createArmy(state, ownerId, coord, composition, null).army;
}

export function addVillagers(state: WorldState, ownerId: string, coord: HexCoord, count: number): VillagerGroupState {
  const group: VillagerGroupState = {
    id: allocateId(state, 'villagers'),
    ownerId,
    coord,
    count,
    task: { kind: 'idle' },
    movement: null,
    damageCarry: 0,
  };
  state.villagerGroups[group.id] = group;
  return group;
}

export function addResourcePoint(
  state: WorldState,
  ctx: SimulationContext,
  type: ResourcePointType,
  coord: HexCoord,
  remaining?: number,
): ResourcePointState {
  const data = ctx.catalog.resources[type];
  const point: ResourcePointState = {
    id: allocateId(state, 'resource'),
    type,
    coord,
    remaining: remaining ?? data.initialAmount,
    health: data.health,
    assignedGroupIds: [],
    carry: 0,
  };
  state.resourcePoints[point.id] = point;
  return point;
}
