// ─────────────────────────────────────────────
//  Command guards
//  check* return a failure reason (or null) and
//  are used by validate(). require* resolve ids
//  inside execute() and throw on a stale id.
// ─────────────────────────────────────────────

import type { WorldState } from '@/engine/state/WorldState';
import type { ArmyState } from '@/engine/data/types/Army';
import type { BuildingState } from '@/engine/data/types/Building';
import type { PlayerState } from '@/engine/data/types/Player';
import type { ResourcePointState } from '@/engine/data/types/Resource';
import type { VillagerGroupState } from '@/engine/data/types/Villager';
import type { HexCoord } from '@/engine/data/types/Hex';
import type { Composition } from '@/engine/data/types/Unit';
import type { SimulationContext } from '@/engine/simulation/SimulationContext';
import { SimulationError } from '@/engine/utils/SimulationError';
import { MILITARY_UNIT_TYPES } from '@/engine/data/types/Unit';
import { VillagerSystem } from '@/engine/systems/economy/VillagerSystem';

export function checkPlayer(state: WorldState, playerId: string): string | null {
  return state.players[playerId] ? null : `unknown player ${playerId}`;
}

export function checkArmy(state: WorldState, playerId: string, armyId: string): string | null {
  const army = state.armies[armyId];
  if (!army) return `army ${armyId} not found`;
  if (army.ownerId !== playerId) return `army ${armyId} belongs to another player`;
  return null;
}

export function checkVillagerGroup(state: WorldState, playerId: string, groupId: string): string | null {
  const group = state.villagerGroups[groupId];
  if (!group) return `villager group ${groupId} not found`;
  if (group.ownerId !== playerId) return `villager group ${groupId} belongs to another player`;
  return null;
}

export function checkBuilding(state: WorldState, playerId: string, buildingId: string): string | null {
  const building = state.buildings[buildingId];
  if (!building || building.state === 'destroyed') return `building ${buildingId} not found`;
  if (building.ownerId !== playerId) return `building ${buildingId} belongs to another player`;
  return null;
}

/** Every listed count, zero included, must be a non-negative whole number. */
export function checkUnitCounts(units: Composition): string | null {
  for (const type of MILITARY_UNIT_TYPES) {
    const n = units[type];
    if (n !== undefined && (!Number.isInteger(n) || n < 0)) return 'unit counts must be whole numbers';
  }
  return null;
}

/** Villagers being attacked cannot take new orders. */
export function isUnderAttack(state: WorldState, groupId: string): boolean {
  return Object.values(state.combats).some(c => c.defender.kind === 'villagerGroup' && c.defender.id === groupId);
}

/** Optional builder group: owned, free to act and able to reach the site. */
export function checkBuilders(
  state: WorldState,
  playerId: string,
  groupId: string | null,
  site: HexCoord[],
  ctx: SimulationContext,
): string | null {
  if (groupId === null) return null;
  const bad = checkVillagerGroup(state, playerId, groupId);
  if (bad) return bad;
  if (isUnderAttack(state, groupId)) return 'builders are under attack';
  const group = state.villagerGroups[groupId];
  if (group && !VillagerSystem.routeAdjacent(state, group, site, ctx)) return 'builders cannot reach the site';
  return null;
}

function stale(kind: string, id: string): SimulationError {
  return new SimulationError('STALE_REFERENCE', `${kind} ${id} disappeared between validation and execution`);
}

export function requirePlayer(state: WorldState, id: string): PlayerState {
  const player = state.players[id];
  if (!player) throw stale('player', id);
  return player;
}

export function requireArmy(state: WorldState, id: string): ArmyState {
  const army = state.armies[id];
  if (!army) throw stale('army', id);
  return army;
}

export function requireVillagerGroup(state: WorldState, id: string): VillagerGroupState {
  const group = state.villagerGroups[id];
  if (!group) throw stale('villager group', id);
  return group;
}

export function requireBuilding(state: WorldState, id: string): BuildingState {
  const building = state.buildings[id];
  if (!building) throw stale('building', id);
  return building;
}

export function requireResourcePoint(state: WorldState, id: string): ResourcePointState {
  const point = state.resourcePoints[id];
  if (!point) throw stale('resource point', id);
  return point;
}
