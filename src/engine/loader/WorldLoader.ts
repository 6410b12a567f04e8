// ─────────────────────────────────────────────
//  WorldLoader — persisted snapshots
//  A snapshot keeps what cannot be derived; loading
//  validates it and rebuilds footprints, health caps,
//  gatherer links and vision.
// ─────────────────────────────────────────────

import type { WorldState } from '@/engine/state/WorldState';
import type { SimulationContext } from '@/engine/simulation/SimulationContext';
import type { HexCoord } from '@/engine/data/types/Hex';
import type { MapTile } from '@/engine/data/types/Map';
import type { PlayerState, TileVisibility } from '@/engine/data/types/Player';
import type { BuildingLifecycle, BuildingState, TimedWork, UpgradeWork } from '@/engine/data/types/Building';
import type { ArmyState, Commander } from '@/engine/data/types/Army';
import type { VillagerGroupState } from '@/engine/data/types/Villager';
import type { ResourcePointState, ResourceBalances } from '@/engine/data/types/Resource';
import type { Composition } from '@/engine/data/types/Unit';
import type { ActiveResearch } from '@/engine/data/types/Research';
import type { AIDifficulty } from '@/engine/data/types/AI';
import { createEmptyWorld } from '@/engine/state/WorldState';
import { hexKey, parseHexKey } from '@/engine/data/types/Hex';
import { TERRAIN_TYPES } from '@/engine/data/types/Terrain';
import { MILITARY_UNIT_TYPES } from '@/engine/data/types/Unit';
import { RESOURCE_TYPES, emptyBalances } from '@/engine/data/types/Resource';
import { createAIPlayerState } from '@/engine/data/types/AI';
import { BUILDING_TYPES, RESOURCE_POINT_TYPES, readBundle } from './CatalogLoader';
import { JsonReader, type JsonObject } from './JsonReader';
import { BuildingStats } from '@/engine/systems/economy/BuildingStats';
import { ResearchSystem } from '@/engine/systems/economy/ResearchSystem';
import { ResourceSystem } from '@/engine/systems/economy/ResourceSystem';
import { VisionSystem } from '@/engine/systems/vision/VisionSystem';
import { SimulationError } from '@/engine/utils/SimulationError';

// ── Snapshot shape ──

export interface TileSnapshot {
  q: number;
  r: number;
  terrain: MapTile['terrain'];
  elevation: number;
}

export interface PlayerSnapshot {
  id: string;
  name: string;
  isAI: boolean;
  resources: ResourceBalances;
  diplomacy: Record<string, PlayerState['diplomacy'][string]>;
  /** Keys of every tile the player has seen */
  explored: string[];
  completedResearch: string[];
  activeResearch: ActiveResearch | null;
}

export interface BuildingSnapshot {
  id: string;
  type: BuildingState['type'];
  ownerId: string;
  anchor: HexCoord;
  rotation: number;
  level: number;
  health: number;
  state: BuildingLifecycle;
  construction: TimedWork | null;
  upgrade: UpgradeWork | null;
  demolition: TimedWork | null;
  garrison: Composition;
  villagerGarrison: number;
  trainingQueue: BuildingState['trainingQueue'];
  villagerTrainingQueue: BuildingState['villagerTrainingQueue'];
}

export interface ArmySnapshot {
  id: string;
  ownerId: string;
  coord: HexCoord;
  composition: Composition;
  commander: Commander | null;
  homeBaseId: string | null;
  entrenched: boolean;
}

export interface VillagerGroupSnapshot {
  id: string;
  ownerId: string;
  coord: HexCoord;
  count: number;
  /** Resource point the group was gathering from, if any */
  gatheringAt: string | null;
}

export interface ResourcePointSnapshot {
  id: string;
  type: ResourcePointState['type'];
  coord: HexCoord;
  remaining: number;
}

export interface WorldSnapshot {
  currentTime: number;
  nextId: number;
  lastReconciledAt: number | null;
  map: { width: number; height: number; tiles: TileSnapshot[] };
  players: PlayerSnapshot[];
  buildings: BuildingSnapshot[];
  armies: ArmySnapshot[];
  villagerGroups: VillagerGroupSnapshot[];
  resourcePoints: ResourcePointSnapshot[];
  aiPlayers: { playerId: string; difficulty: AIDifficulty }[];
}

const LIFECYCLES: readonly BuildingLifecycle[] = ['constructing', 'completed', 'damaged', 'upgrading', 'demolishing'];
const DIPLOMACY = ['ally', 'neutral', 'enemy'] as const;
const DIFFICULTIES: readonly AIDifficulty[] = ['easy', 'medium', 'hard'];

// ── Field readers ──

function readCoord(v: unknown, path: string): HexCoord {
  const obj = JsonReader.object(v, path);
  const q = JsonReader.number(obj, 'q', path);
  const r = JsonReader.number(obj, 'r', path);
  if (!Number.isInteger(q) || !Number.isInteger(r)) JsonReader.fail(path, 'integer coordinate');
  return { q, r };
}

function readComposition(v: unknown, path: string): Composition {
  const obj = JsonReader.object(v ?? {}, path);
  const out: Composition = {};
  for (const key of Object.keys(obj)) {
    const type = MILITARY_UNIT_TYPES.find(t => t === key);
    if (type === undefined) return JsonReader.fail(`${path}.${key}`, 'unit type');
    const count = JsonReader.number(obj, key, path);
    if (count < 0 || !Number.isInteger(count)) JsonReader.fail(`${path}.${key}`, 'non-negative integer');
    if (count > 0) out[type] = count;
  }
  return out;
}

function readWork(v: unknown, path: string): TimedWork | null {
  if (v === null || v === undefined) return null;
  const obj = JsonReader.object(v, path);
  return {
    startedAt: JsonReader.number(obj, 'startedAt', path),
    duration: JsonReader.number(obj, 'duration', path),
    builders: JsonReader.optionalNumber(obj, 'builders', path) ?? 1,
  };
}

function readList(root: JsonObject, key: string): unknown[] {
  return root[key] === undefined ? [] : JsonReader.array(root[key], key);
}

function readPlayer(v: unknown, path: string): PlayerState {
  const obj = JsonReader.object(v, path);
  const resources = emptyBalances();
  const rawResources = JsonReader.object(obj['resources'] ?? {}, `${path}.resources`);
  for (const type of RESOURCE_TYPES) {
    resources[type] = JsonReader.optionalNumber(rawResources, type, `${path}.resources`) ?? 0;
  }

  const diplomacy: PlayerState['diplomacy'] = {};
  const rawDiplomacy = JsonReader.object(obj['diplomacy'] ?? {}, `${path}.diplomacy`);
  for (const other of Object.keys(rawDiplomacy)) {
    diplomacy[other] = JsonReader.oneOf(rawDiplomacy, other, DIPLOMACY, `${path}.diplomacy`);
  }

  const visibility: Record<string, TileVisibility> = {};
  const explored = obj['explored'] === undefined ? [] : JsonReader.stringArray(obj, 'explored', path);
  for (const key of explored) {
    if (!parseHexKey(key)) JsonReader.fail(`${path}.explored`, 'tile keys "q,r"');
    visibility[key] = 'explored';
  }

  let activeResearch: ActiveResearch | null = null;
  if (obj['activeResearch'] !== undefined && obj['activeResearch'] !== null) {
    const active = JsonReader.object(obj['activeResearch'], `${path}.activeResearch`);
    activeResearch = {
      researchId: JsonReader.string(active, 'researchId', `${path}.activeResearch`),
      startedAt: JsonReader.number(active, 'startedAt', `${path}.activeResearch`),
      duration: JsonReader.number(active, 'duration', `${path}.activeResearch`),
    };
  }

  return {
    id: JsonReader.string(obj, 'id', path),
    name: JsonReader.string(obj, 'name', path),
    isAI: obj['isAI'] === undefined ? false : JsonReader.boolean(obj, 'isAI', path),
    resources,
    collectionRates: emptyBalances(),
    consumptionCarry: 0,
    diplomacy,
    visibility,
    completedResearch: obj['completedResearch'] === undefined ? [] : JsonReader.stringArray(obj, 'completedResearch', path),
    activeResearch,
  };
}

// ── Public API ──

export const WorldLoader = {
  /** Serializable form of a world. Combats and marching reinforcements are not kept. */
  createSnapshot(state: WorldState): WorldSnapshot {
    return {
      currentTime: state.currentTime,
      nextId: state.nextId,
      lastReconciledAt: state.lastReconciledAt,
      map: {
        width: state.map.width,
        height: state.map.height,
        tiles: Object.values(state.map.tiles).map(t => ({ q: t.coord.q, r: t.coord.r, terrain: t.terrain, elevation: t.elevation })),
      },
      players: Object.values(state.players).map(p => ({
        id: p.id,
        name: p.name,
        isAI: p.isAI,
        resources: { ...p.resources },
        diplomacy: { ...p.diplomacy },
        explored: Object.keys(p.visibility),
        completedResearch: [...p.completedResearch],
        activeResearch: p.activeResearch ? { ...p.activeResearch } : null,
      })),
      buildings: Object.values(state.buildings)
        .filter(b => b.state !== 'destroyed')
        .map(b => ({
          id: b.id,
          type: b.type,
          ownerId: b.ownerId,
          anchor: b.anchor,
          rotation: b.rotation,
          level: b.level,
          health: b.health,
          state: b.state,
          construction: b.construction ? { ...b.construction } : null,
          upgrade: b.upgrade ? { ...b.upgrade, cost: { ...b.upgrade.cost } } : null,
          demolition: b.demolition ? { ...b.demolition } : null,
          garrison: { ...b.garrison },
          villagerGarrison: b.villagerGarrison,
          trainingQueue: b.trainingQueue.map(e => ({ ...e })),
          villagerTrainingQueue: b.villagerTrainingQueue.map(e => ({ ...e })),
        })),
      armies: Object.values(state.armies).map(a => ({
        id: a.id,
        ownerId: a.ownerId,
        coord: a.coord,
        composition: { ...a.composition },
        commander: a.commander ? { ...a.commander } : null,
        homeBaseId: a.homeBaseId,
        entrenched: a.entrenchment === 'entrenched',
      })),
      villagerGroups: Object.values(state.villagerGroups).map(g => ({
        id: g.id,
        ownerId: g.ownerId,
        coord: g.coord,
        count: g.count,
        gatheringAt: g.task.kind === 'gathering' ? g.task.resourcePointId : null,
      })),
      resourcePoints: Object.values(state.resourcePoints).map(p => ({
        id: p.id,
        type: p.type,
        coord: p.coord,
        remaining: p.remaining,
      })),
      aiPlayers: Object.values(state.aiPlayers).map(ai => ({ playerId: ai.playerId, difficulty: ai.difficulty })),
    };
  },

  /**
   * Validates an untyped snapshot and rebuilds a live world from it.
   * Throws SimulationError('INVALID_DATA') naming the first bad field.
   */
  fromSnapshot(raw: unknown, ctx: SimulationContext): WorldState {
    const root = JsonReader.object(raw, 'snapshot');
    const mapObj = JsonReader.object(root['map'], 'map');
    const tiles: Record<string, MapTile> = {};
    JsonReader.array(mapObj['tiles'], 'map.tiles').forEach((t, i) => {
      const path = `map.tiles[${i}]`;
      const obj = JsonReader.object(t, path);
      const coord = readCoord(obj, path);
      tiles[hexKey(coord)] = {
        coord,
        terrain: JsonReader.oneOf(obj, 'terrain', TERRAIN_TYPES, path),
        elevation: JsonReader.optionalNumber(obj, 'elevation', path) ?? 0,
      };
    });

    const state = createEmptyWorld({
      width: JsonReader.number(mapObj, 'width', 'map'),
      height: JsonReader.number(mapObj, 'height', 'map'),
      tiles,
    });
    state.currentTime = JsonReader.optionalNumber(root, 'currentTime', 'snapshot') ?? 0;
    state.lastReconciledAt = root['lastReconciledAt'] === null
      ? null
      : JsonReader.optionalNumber(root, 'lastReconciledAt', 'snapshot') ?? null;

    readList(root, 'players').forEach((p, i) => {
      const player = readPlayer(p, `players[${i}]`);
      state.players[player.id] = player;
    });
    const requireOwner = (ownerId: string, path: string): void => {
      if (!state.players[ownerId]) throw new SimulationError('INVALID_DATA', `${path}.ownerId: unknown player ${ownerId}`);
    };

    readList(root, 'resourcePoints').forEach((p, i) => {
      const path = `resourcePoints[${i}]`;
      const obj = JsonReader.object(p, path);
      const type = JsonReader.oneOf(obj, 'type', RESOURCE_POINT_TYPES, path);
      const data = ctx.catalog.resources[type];
      const point: ResourcePointState = {
        id: JsonReader.string(obj, 'id', path),
        type,
        coord: readCoord(obj['coord'], `${path}.coord`),
        remaining: JsonReader.optionalNumber(obj, 'remaining', path) ?? data.initialAmount,
        health: data.health,
        assignedGroupIds: [],
        carry: 0,
      };
      state.resourcePoints[point.id] = point;
    });

    readList(root, 'buildings').forEach((b, i) => {
      const path = `buildings[${i}]`;
      const obj = JsonReader.object(b, path);
      const type = JsonReader.oneOf(obj, 'type', BUILDING_TYPES, path);
      const ownerId = JsonReader.string(obj, 'ownerId', path);
      requireOwner(ownerId, path);
      const anchor = readCoord(obj['anchor'], `${path}.anchor`);
      const rotation = JsonReader.optionalNumber(obj, 'rotation', path) ?? 0;
      const level = JsonReader.optionalNumber(obj, 'level', path) ?? 1;
      const maxHealth = BuildingStats.maxHealth(type, level, ResearchSystem.bonuses(state, ownerId, ctx), ctx);
      const lifecycle = obj['state'] === undefined ? 'completed' : JsonReader.oneOf(obj, 'state', LIFECYCLES, path);
      const rawUpgrade = obj['upgrade'];
      const upgradeWork = readWork(rawUpgrade, `${path}.upgrade`);
      const upgradeObj: JsonObject = JsonReader.isObject(rawUpgrade) ? rawUpgrade : {};

      const building: BuildingState = {
        id: JsonReader.string(obj, 'id', path),
        type,
        ownerId,
        anchor,
        rotation,
        occupied: BuildingStats.occupiedCoordinates(type, anchor, rotation, ctx),
        level,
        health: Math.min(maxHealth, JsonReader.optionalNumber(obj, 'health', path) ?? maxHealth),
        maxHealth,
        state: lifecycle,
        construction: readWork(obj['construction'], `${path}.construction`),
        upgrade: upgradeWork ? { ...upgradeWork, cost: readBundle(upgradeObj['cost'] ?? {}, `${path}.upgrade.cost`) } : null,
        demolition: readWork(obj['demolition'], `${path}.demolition`),
        garrison: readComposition(obj['garrison'], `${path}.garrison`),
        villagerGarrison: JsonReader.optionalNumber(obj, 'villagerGarrison', path) ?? 0,
        trainingQueue: readList(obj, 'trainingQueue').map((e, j) => {
          const entryPath = `${path}.trainingQueue[${j}]`;
          const entry = JsonReader.object(e, entryPath);
          return {
            unitType: JsonReader.oneOf(entry, 'unitType', MILITARY_UNIT_TYPES, entryPath),
            quantity: JsonReader.number(entry, 'quantity', entryPath),
            startedAt: JsonReader.number(entry, 'startedAt', entryPath),
          };
        }),
        villagerTrainingQueue: readList(obj, 'villagerTrainingQueue').map((e, j) => {
          const entryPath = `${path}.villagerTrainingQueue[${j}]`;
          const entry = JsonReader.object(e, entryPath);
          return {
            quantity: JsonReader.number(entry, 'quantity', entryPath),
            startedAt: JsonReader.number(entry, 'startedAt', entryPath),
          };
        }),
        lastGarrisonFireAt: state.currentTime - ctx.config.garrison.fireInterval,
      };
      if (building.state === 'constructing' && !building.construction) {
        JsonReader.fail(`${path}.construction`, 'work record for a constructing building');
      }
      state.buildings[building.id] = building;
    });

    readList(root, 'armies').forEach((a, i) => {
      const path = `armies[${i}]`;
      const obj = JsonReader.object(a, path);
      const ownerId = JsonReader.string(obj, 'ownerId', path);
      requireOwner(ownerId, path);
      let commander: Commander | null = null;
      const c = obj['commander'];
      if (JsonReader.isObject(c)) {
        commander = {
          name: JsonReader.string(c, 'name', `${path}.commander`),
          leadership: JsonReader.number(c, 'leadership', `${path}.commander`),
          tactics: JsonReader.number(c, 'tactics', `${path}.commander`),
        };
      }
      const entrenched = obj['entrenched'] === undefined ? false : JsonReader.boolean(obj, 'entrenched', path);
      const homeBase = obj['homeBaseId'];
      const army: ArmyState = {
        id: JsonReader.string(obj, 'id', path),
        ownerId,
        coord: readCoord(obj['coord'], `${path}.coord`),
        commander,
        composition: readComposition(obj['composition'], `${path}.composition`),
        damageCarry: {},
        entrenchment: entrenched ? 'entrenched' : 'none',
        entrenchmentStartedAt: entrenched ? state.currentTime : null,
        movement: null,
        inCombat: false,
        homeBaseId: typeof homeBase === 'string' ? homeBase : null,
      };
      state.armies[army.id] = army;
    });

    readList(root, 'villagerGroups').forEach((g, i) => {
      const path = `villagerGroups[${i}]`;
      const obj = JsonReader.object(g, path);
      const ownerId = JsonReader.string(obj, 'ownerId', path);
      requireOwner(ownerId, path);
      const group: VillagerGroupState = {
        id: JsonReader.string(obj, 'id', path),
        ownerId,
        coord: readCoord(obj['coord'], `${path}.coord`),
        count: JsonReader.number(obj, 'count', path),
        task: { kind: 'idle' },
        movement: null,
        damageCarry: 0,
      };
      const pointId = obj['gatheringAt'];
      const point = typeof pointId === 'string' ? state.resourcePoints[pointId] : undefined;
      if (point) {
        group.task = { kind: ctx.catalog.resources[point.type].huntable ? 'hunting' : 'gathering', resourcePointId: point.id };
        point.assignedGroupIds.push(group.id);
      }
      state.villagerGroups[group.id] = group;
    });

    readList(root, 'aiPlayers').forEach((a, i) => {
      const path = `aiPlayers[${i}]`;
      const obj = JsonReader.object(a, path);
      const playerId = JsonReader.string(obj, 'playerId', path);
      requireOwner(playerId, path);
      const difficulty = obj['difficulty'] === undefined ? 'medium' : JsonReader.oneOf(obj, 'difficulty', DIFFICULTIES, path);
      state.aiPlayers[playerId] = createAIPlayerState(playerId, difficulty);
    });

    // ids allocated after loading must not collide with saved ones
    const saved = JsonReader.optionalNumber(root, 'nextId', 'snapshot') ?? 0;
    state.nextId = Math.max(saved, ...allIds(state).map(idNumber));

    VisionSystem.recomputeAll(state, ctx);
    ResourceSystem.recomputeRates(state, ctx);
    ctx.logger.log(`Loaded world: ${Object.keys(state.players).length} players, ${Object.keys(state.buildings).length} buildings`, 'system');
    return state;
  },
};

function allIds(state: WorldState): string[] {
  return [
    ...Object.keys(state.buildings),
    ...Object.keys(state.armies),
    ...Object.keys(state.villagerGroups),
    ...Object.keys(state.resourcePoints),
  ];
}

function idNumber(id: string): number {
  const n = Number(id.slice(id.lastIndexOf('_') + 1));
  return Number.isInteger(n) ? n : 0;
}
