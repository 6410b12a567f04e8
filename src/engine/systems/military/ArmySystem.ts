// ─────────────────────────────────────────────
//  Army System — creation, disbanding, garrisons
//  Mutates the given (draft) state and reports
//  what changed.
// ─────────────────────────────────────────────

import type { WorldState } from '@/engine/state/WorldState';
import type { ArmyState, Commander } from '@/engine/data/types/Army';
import type { BuildingState } from '@/engine/data/types/Building';
import type { HexCoord } from '@/engine/data/types/Hex';
import type { Composition } from '@/engine/data/types/Unit';
import type { StateChange } from '@/engine/data/types/StateChange';
import type { SimulationContext } from '@/engine/simulation/SimulationContext';
import { allocateId, WorldStateQuery } from '@/engine/state/WorldState';
import { compositionEntries, compositionTotal } from '@/engine/data/types/Unit';
import { isOperational } from '@/engine/data/types/Building';
import { createPathGrid, Pathfinding } from '@/engine/systems/movement/Pathfinding';

export function createArmy(
  state: WorldState,
  ownerId: string,
  coord: HexCoord,
  composition: Composition,
  homeBaseId: string | null,
  commander: Commander | null = null,
): { army: ArmyState; changes: StateChange[] } {
  const army: ArmyState = {
    id: allocateId(state, 'army'),
    ownerId,
    coord,
    commander,
    composition: { ...composition },
    damageCarry: {},
    entrenchment: 'none',
    entrenchmentStartedAt: null,
    movement: null,
    inCombat: false,
    homeBaseId,
  };
  state.armies[army.id] = army;
  return {
    army,
    changes: [{ type: 'armyCreated', armyId: army.id, ownerId, coord, composition: { ...army.composition } }],
  };
}

/**
 * Removes a beaten army. Combats and reinforcements that still name it
 * settle on their next update.
 */
export function destroyArmy(state: WorldState, armyId: string): StateChange[] {
  const army = state.armies[armyId];
  if (!army) return [];
  delete state.armies[armyId];
  return [{ type: 'armyDestroyed', armyId, ownerId: army.ownerId, coord: army.coord }];
}

export function addUnits(target: Composition, units: Composition): void {
  for (const [type, n] of compositionEntries(units)) target[type] = (target[type] ?? 0) + n;
}

/** Moves `units` out of `source`; returns false without mutating when any count is short. */
export function takeUnits(source: Composition, units: Composition): boolean {
  const entries = compositionEntries(units);
  if (!entries.every(([type, n]) => (source[type] ?? 0) >= n)) return false;
  for (const [type, n] of entries) {
    const left = (source[type] ?? 0) - n;
    if (left > 0) source[type] = left;
    else delete source[type];
  }
  return true;
}

export function hasUnits(source: Composition, units: Composition): boolean {
  return compositionEntries(units).every(([type, n]) => (source[type] ?? 0) >= n);
}

/** Nearest tile around a building where deployed units can stand. */
export function deploymentTile(state: WorldState, building: BuildingState, ctx: SimulationContext): HexCoord | null {
  const grid = createPathGrid(state, building.ownerId, ctx);
  return Pathfinding.findNearestWalkable(building.anchor, grid, 3);
}

export function garrisonSpace(building: BuildingState, ctx: SimulationContext): number {
  const capacity = ctx.catalog.buildings[building.type].garrisonCapacity;
  return capacity - compositionTotal(building.garrison) - building.villagerGarrison;
}

export function canGarrisonInto(state: WorldState, army: ArmyState, building: BuildingState, ctx: SimulationContext): boolean {
  return isOperational(building)
    && WorldStateQuery.isAllied(state, building.ownerId, army.ownerId)
    && garrisonSpace(building, ctx) >= compositionTotal(army.composition);
}

/** Folds an army into a building's garrison. */
export function garrisonArmy(state: WorldState, army: ArmyState, building: BuildingState, ctx: SimulationContext): StateChange[] {
  if (!canGarrisonInto(state, army, building, ctx)) return [];
  const units = { ...army.composition };
  addUnits(building.garrison, units);
  delete state.armies[army.id];
  ctx.logger.log(`Army ${army.id} garrisoned in ${building.type} ${building.id}`, 'action');
  return [
    { type: 'unitsGarrisoned', buildingId: building.id, composition: units, villagers: 0 },
    { type: 'armyDisbanded', armyId: army.id, intoBuildingId: building.id },
  ];
}

export function cancelEntrenchment(army: ArmyState): StateChange[] {
  if (army.entrenchment === 'none') return [];
  army.entrenchment = 'none';
  army.entrenchmentStartedAt = null;
  return [{ type: 'armyEntrenchmentCancelled', armyId: army.id }];
}

/** Completes entrenchments whose dig time has elapsed. */
export function updateEntrenchments(state: WorldState, ctx: SimulationContext): StateChange[] {
  const changes: StateChange[] = [];
  for (const army of Object.values(state.armies)) {
    if (army.entrenchment !== 'entrenching' || army.entrenchmentStartedAt === null) continue;
    if (state.currentTime - army.entrenchmentStartedAt >= ctx.config.entrenchment.buildTime) {
      army.entrenchment = 'entrenched';
      changes.push({ type: 'armyEntrenched', armyId: army.id });
    }
  }
  return changes;
}
