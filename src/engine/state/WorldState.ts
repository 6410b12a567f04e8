// ─────────────────────────────────────────────
//  World State — authoritative simulation model
//  Entities reference each other by id only and
//  are resolved through these records.
// ─────────────────────────────────────────────

import type { WorldMap, MapTile } from '../data/types/Map';
import type { HexCoord } from '../data/types/Hex';
import type { PlayerState, DiplomacyStatus } from '../data/types/Player';
import type { BuildingState, BuildingType } from '../data/types/Building';
import type { ArmyState } from '../data/types/Army';
import type { VillagerGroupState } from '../data/types/Villager';
import type { ResourcePointState } from '../data/types/Resource';
import type { ActiveCombat } from '../data/types/Combat';
import type { PendingReinforcement } from '../data/types/Reinforcement';
import type { AIPlayerState } from '../data/types/AI';
import type { EntityRef } from '../data/types/Entity';
import { hexEquals, hexKey } from '../data/types/Hex';

export type SubsystemKey =
  | 'movement'
  | 'combat'
  | 'vision'
  | 'building'
  | 'training'
  | 'resource'
  | 'research'
  | 'ai';

export interface WorldState {
  /** Simulation clock in seconds; never decreases */
  currentTime: number;
  nextId: number;
  /** Watermark of the last background catch-up */
  lastReconciledAt: number | null;

  map: WorldMap;
  players: Record<string, PlayerState>;
  buildings: Record<string, BuildingState>;
  armies: Record<string, ArmyState>;
  villagerGroups: Record<string, VillagerGroupState>;
  resourcePoints: Record<string, ResourcePointState>;
  combats: Record<string, ActiveCombat>;
  reinforcements: Record<string, PendingReinforcement>;
  aiPlayers: Record<string, AIPlayerState>;

  subsystemLastRun: Partial<Record<SubsystemKey, number>>;
}

export type ResolvedEntity =
  | { kind: 'army'; entity: ArmyState }
  | { kind: 'villagerGroup'; entity: VillagerGroupState }
  | { kind: 'building'; entity: BuildingState }
  | { kind: 'resourcePoint'; entity: ResourcePointState };

export function createEmptyWorld(map: WorldMap): WorldState {
  return {
    currentTime: 0,
    nextId: 0,
    lastReconciledAt: null,
    map,
    players: {},
    buildings: {},
    armies: {},
    villagerGroups: {},
    resourcePoints: {},
    combats: {},
    reinforcements: {},
    aiPlayers: {},
    subsystemLastRun: {},
  };
}

/** Deterministic id allocation; mutates the counter. */
export function allocateId(state: WorldState, prefix: string): string {
  state.nextId += 1;
  return `${prefix}_${state.nextId}`;
}

export const WorldStateQuery = {
  tile(state: WorldState, c: HexCoord): MapTile | undefined {
    return state.map.tiles[hexKey(c)];
  },

  inBounds(state: WorldState, c: HexCoord): boolean {
    return state.map.tiles[hexKey(c)] !== undefined;
  },

  relation(state: WorldState, a: string, b: string): DiplomacyStatus {
    if (a === b) return 'ally';
    return state.players[a]?.diplomacy[b] ?? 'neutral';
  },

  isHostile(state: WorldState, a: string, b: string): boolean {
    return a !== b && WorldStateQuery.relation(state, a, b) === 'enemy';
  },

  isAllied(state: WorldState, a: string, b: string): boolean {
    return WorldStateQuery.relation(state, a, b) === 'ally';
  },

  resolve(state: WorldState, ref: EntityRef): ResolvedEntity | null {
    switch (ref.kind) {
      case 'army': {
        const entity = state.armies[ref.id];
        return entity ? { kind: 'army', entity } : null;
      }
      case 'villagerGroup': {
        const entity = state.villagerGroups[ref.id];
        return entity ? { kind: 'villagerGroup', entity } : null;
      }
      case 'building': {
        const entity = state.buildings[ref.id];
        return entity ? { kind: 'building', entity } : null;
      }
      case 'resourcePoint': {
        const entity = state.resourcePoints[ref.id];
        return entity ? { kind: 'resourcePoint', entity } : null;
      }
    }
  },

  ownerOf(state: WorldState, ref: EntityRef): string | null {
    const resolved = WorldStateQuery.resolve(state, ref);
    if (!resolved) return null;
    switch (resolved.kind) {
      case 'army':
      case 'villagerGroup':
        return resolved.entity.ownerId;
      case 'building':
        return resolved.entity.ownerId;
      case 'resourcePoint':
        return null;
    }
  },

  coordOf(state: WorldState, ref: EntityRef): HexCoord | null {
    const resolved = WorldStateQuery.resolve(state, ref);
    if (!resolved) return null;
    switch (resolved.kind) {
      case 'army':
      case 'villagerGroup':
      case 'resourcePoint':
        return resolved.entity.coord;
      case 'building':
        return resolved.entity.anchor;
    }
  },

  buildingsOf(state: WorldState, playerId: string): BuildingState[] {
    return Object.values(state.buildings).filter(b => b.ownerId === playerId && b.state !== 'destroyed');
  },

  armiesOf(state: WorldState, playerId: string): ArmyState[] {
    return Object.values(state.armies).filter(a => a.ownerId === playerId);
  },

  villagerGroupsOf(state: WorldState, playerId: string): VillagerGroupState[] {
    return Object.values(state.villagerGroups).filter(g => g.ownerId === playerId);
  },

  /** Building covering a tile, if any. */
  buildingAt(state: WorldState, c: HexCoord): BuildingState | undefined {
    for (const b of Object.values(state.buildings)) {
      if (b.state === 'destroyed') continue;
      if (b.occupied.some(o => hexEquals(o, c))) return b;
    }
    return undefined;
  },

  /** Tile key → building id for every standing building. */
  occupancyIndex(state: WorldState): Map<string, BuildingState> {
    const index = new Map<string, BuildingState>();
    for (const b of Object.values(state.buildings)) {
      if (b.state === 'destroyed') continue;
      for (const o of b.occupied) index.set(hexKey(o), b);
    }
    return index;
  },

  armiesAt(state: WorldState, c: HexCoord): ArmyState[] {
    return Object.values(state.armies).filter(a => hexEquals(a.coord, c));
  },

  villagerGroupsAt(state: WorldState, c: HexCoord): VillagerGroupState[] {
    return Object.values(state.villagerGroups).filter(g => hexEquals(g.coord, c));
  },

  /** Live mobile entities standing on a tile */
  entityCountAt(state: WorldState, c: HexCoord): number {
    return WorldStateQuery.armiesAt(state, c).length + WorldStateQuery.villagerGroupsAt(state, c).length;
  },

  entityCounts(state: WorldState): Map<string, number> {
    const counts = new Map<string, number>();
    const bump = (c: HexCoord): void => {
      const k = hexKey(c);
      counts.set(k, (counts.get(k) ?? 0) + 1);
    };
    for (const a of Object.values(state.armies)) bump(a.coord);
    for (const g of Object.values(state.villagerGroups)) bump(g.coord);
    return counts;
  },

  resourcePointAt(state: WorldState, c: HexCoord): ResourcePointState | undefined {
    return Object.values(state.resourcePoints).find(p => hexEquals(p.coord, c));
  },

  cityCenter(state: WorldState, playerId: string): BuildingState | undefined {
    return WorldStateQuery.buildingsOf(state, playerId)
      .filter(b => b.type === 'cityCenter' && b.state !== 'constructing')
      .sort((a, b) => b.level - a.level)[0];
  },

  cityCenterLevel(state: WorldState, playerId: string): number {
    return WorldStateQuery.cityCenter(state, playerId)?.level ?? 0;
  },

  countBuildings(state: WorldState, playerId: string, type: BuildingType): number {
    return WorldStateQuery.buildingsOf(state, playerId).filter(b => b.type === type).length;
  },

  enemyArmiesOf(state: WorldState, playerId: string): ArmyState[] {
    return Object.values(state.armies).filter(a => WorldStateQuery.isHostile(state, playerId, a.ownerId));
  },

  combatsInvolvingArmy(state: WorldState, armyId: string): ActiveCombat[] {
    return Object.values(state.combats).filter(
      c => c.attackerId === armyId || (c.defender.kind === 'army' && c.defender.id === armyId),
    );
  },
};
