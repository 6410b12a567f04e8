// ─────────────────────────────────────────────
//  Construction System
//  Placement, construction, upgrade and demolition.
//  Timed work is closed form from `startedAt`:
//    progress = elapsed × speed(builders) / duration
//  and the start is rebased whenever the builder
//  count changes.
// ─────────────────────────────────────────────

import type { WorldState } from '@/engine/state/WorldState';
import type { BuildingState, BuildingType, TimedWork } from '@/engine/data/types/Building';
import type { HexCoord } from '@/engine/data/types/Hex';
import type { ResearchBonusTotals } from '@/engine/data/types/Research';
import type { StateChange } from '@/engine/data/types/StateChange';
import type { VillagerTask } from '@/engine/data/types/Villager';
import type { SimulationContext } from '@/engine/simulation/SimulationContext';
import { allocateId, WorldStateQuery } from '@/engine/state/WorldState';
import { TERRAIN } from '@/engine/data/types/Terrain';
import { hexKey } from '@/engine/data/types/Hex';
import { HexMath } from '@/engine/utils/HexMath';
import { MathUtils } from '@/engine/utils/MathUtils';
import { BuildingStats } from './BuildingStats';
import { ResearchSystem } from './ResearchSystem';
import { ResourceLedger } from './ResourceLedger';

type WorkTask = Extract<VillagerTask, { buildingId: string }>['kind'];

export type PlacementBlocker = 'outOfBounds' | 'unwalkable' | 'occupied' | 'resourcePoint' | 'cityCenterLevel';

export interface PlaceOptions {
  /** Skip construction (map setup and rehydration) */
  completed?: boolean;
  level?: number;
}

function idleGroupsWorkingOn(state: WorldState, buildingId: string, kind: WorkTask): StateChange[] {
  const changes: StateChange[] = [];
  for (const g of Object.values(state.villagerGroups)) {
    if (g.task.kind !== kind || g.task.buildingId !== buildingId) continue;
    g.task = { kind: 'idle' };
    changes.push({ type: 'villagerGroupTaskChanged', groupId: g.id, task: 'idle', targetId: null });
  }
  return changes;
}

export const ConstructionSystem = {
  /** Builder speed: 1 + 0.8 + 0.8² + … for n builders, scaled by research. */
  workSpeed(builders: number, bonuses: ResearchBonusTotals, ctx: SimulationContext): number {
    const n = Math.max(1, builders);
    return MathUtils.diminishingSum(n, ctx.config.construction.builderRatio) * (1 + (bonuses.buildingSpeed ?? 0));
  },

  progress(work: TimedWork, now: number, bonuses: ResearchBonusTotals, ctx: SimulationContext): number {
    if (work.duration <= 0) return 1;
    const elapsed = Math.max(0, now - work.startedAt);
    return Math.min(1, (elapsed * ConstructionSystem.workSpeed(work.builders, bonuses, ctx)) / work.duration);
  },

  /** Keeps progress continuous across a change in builder count. */
  rebase(work: TimedWork, now: number, builders: number, bonuses: ResearchBonusTotals, ctx: SimulationContext): void {
    if (builders === work.builders) return;
    const done = ConstructionSystem.progress(work, now, bonuses, ctx);
    work.builders = builders;
    work.startedAt = now - (done * work.duration) / ConstructionSystem.workSpeed(builders, bonuses, ctx);
  },

  /** 1 plus the villagers of every arrived group working this building. */
  builderCount(state: WorldState, building: BuildingState, kind: WorkTask): number {
    let n = 1;
    for (const g of Object.values(state.villagerGroups)) {
      if (g.ownerId !== building.ownerId || g.movement) continue;
      if (g.task.kind !== kind || g.task.buildingId !== building.id) continue;
      if (building.occupied.some(o => HexMath.distance(o, g.coord) <= 1)) n += g.count;
    }
    return n;
  },

  placementBlocker(
    state: WorldState,
    playerId: string,
    type: BuildingType,
    anchor: HexCoord,
    rotation: number,
    ctx: SimulationContext,
  ): PlacementBlocker | null {
    const tiles = BuildingStats.occupiedCoordinates(type, anchor, rotation, ctx);
    const taken = WorldStateQuery.occupancyIndex(state);
    for (const c of tiles) {
      const tile = WorldStateQuery.tile(state, c);
      if (!tile) return 'outOfBounds';
      if (!TERRAIN[tile.terrain].walkable) return 'unwalkable';
      if (taken.has(hexKey(c))) return 'occupied';
      if (WorldStateQuery.resourcePointAt(state, c)) return 'resourcePoint';
    }
    const required = ctx.catalog.buildings[type].requiredCityCenterLevel;
    const firstCenter = type === 'cityCenter' && WorldStateQuery.countBuildings(state, playerId, 'cityCenter') === 0;
    if (!firstCenter && WorldStateQuery.cityCenterLevel(state, playerId) < required) return 'cityCenterLevel';
    return null;
  },

  /** Creates the building record; the caller has checked placement and paid. */
  placeBuilding(
    state: WorldState,
    ownerId: string,
    type: BuildingType,
    anchor: HexCoord,
    rotation: number,
    ctx: SimulationContext,
    options: PlaceOptions = {},
  ): { building: BuildingState; changes: StateChange[] } {
    const data = ctx.catalog.buildings[type];
    const level = options.level ?? 1;
    const bonuses = ResearchSystem.bonuses(state, ownerId, ctx);
    const maxHealth = BuildingStats.maxHealth(type, level, bonuses, ctx);
    const building: BuildingState = {
      id: allocateId(state, 'building'),
      type,
      ownerId,
      anchor,
      rotation,
      occupied: BuildingStats.occupiedCoordinates(type, anchor, rotation, ctx),
      level,
      health: options.completed ? maxHealth : 1,
      maxHealth,
      state: options.completed ? 'completed' : 'constructing',
      construction: options.completed ? null : { startedAt: state.currentTime, duration: data.buildTime, builders: 1 },
      upgrade: null,
      demolition: null,
      garrison: {},
      villagerGarrison: 0,
      trainingQueue: [],
      villagerTrainingQueue: [],
      lastGarrisonFireAt: state.currentTime - ctx.config.garrison.fireInterval,
    };
    state.buildings[building.id] = building;

    const changes: StateChange[] = [
      { type: 'buildingPlaced', buildingId: building.id, buildingType: type, coord: anchor, ownerId, rotation },
    ];
    if (options.completed) changes.push({ type: 'buildingCompleted', buildingId: building.id });
    else changes.push({ type: 'buildingConstructionStarted', buildingId: building.id });
    ctx.logger.log(`${type} ${building.id} placed at (${anchor.q},${anchor.r}) for ${ownerId}`, 'economy');
    return { building, changes };
  },

  startUpgrade(state: WorldState, building: BuildingState, ctx: SimulationContext): StateChange[] {
    const player = state.players[building.ownerId];
    if (!player) return [];
    const cost = BuildingStats.upgradeCost(building.type, building.level, ctx);
    ResourceLedger.deduct(player.resources, cost);
    building.state = 'upgrading';
    building.upgrade = {
      startedAt: state.currentTime,
      duration: BuildingStats.upgradeDuration(building.type, building.level, ctx),
      builders: 1,
      cost,
    };
    return [
      { type: 'buildingUpgradeStarted', buildingId: building.id, toLevel: building.level + 1 },
      { type: 'resourcesChanged', playerId: player.id, resources: ResourceLedger.snapshot(player.resources) },
    ];
  },

  cancelUpgrade(state: WorldState, building: BuildingState, ctx: SimulationContext): StateChange[] {
    const player = state.players[building.ownerId];
    const upgrade = building.upgrade;
    if (!player || !upgrade) return [];
    ResourceLedger.credit(player.resources, upgrade.cost);
    building.upgrade = null;
    building.state = building.health < building.maxHealth * ctx.config.combat.buildingDamagedRatio ? 'damaged' : 'completed';
    return [
      { type: 'buildingUpgradeCancelled', buildingId: building.id },
      { type: 'resourcesChanged', playerId: player.id, resources: ResourceLedger.snapshot(player.resources) },
      ...idleGroupsWorkingOn(state, building.id, 'upgrading'),
    ];
  },

  startDemolition(state: WorldState, building: BuildingState, ctx: SimulationContext): StateChange[] {
    building.state = 'demolishing';
    building.demolition = {
      startedAt: state.currentTime,
      duration: BuildingStats.demolitionDuration(building.type, ctx),
      builders: 1,
    };
    return [{ type: 'buildingDemolitionStarted', buildingId: building.id }];
  },

  cancelDemolition(state: WorldState, building: BuildingState): StateChange[] {
    building.demolition = null;
    building.state = 'completed';
    return [
      { type: 'buildingDemolitionCancelled', buildingId: building.id },
      ...idleGroupsWorkingOn(state, building.id, 'demolishing'),
    ];
  },

  update(state: WorldState, ctx: SimulationContext): StateChange[] {
    const changes: StateChange[] = [];
    const now = state.currentTime;
    for (const building of Object.values(state.buildings)) {
      if (!state.buildings[building.id]) continue;
      const bonuses = ResearchSystem.bonuses(state, building.ownerId, ctx);

      if (building.state === 'constructing' && building.construction) {
        const work = building.construction;
        ConstructionSystem.rebase(work, now, ConstructionSystem.builderCount(state, building, 'building'), bonuses, ctx);
        const done = ConstructionSystem.progress(work, now, bonuses, ctx);
        if (done >= 1) {
          changes.push(...ConstructionSystem.completeConstruction(state, building, ctx));
        } else {
          const health = Math.max(1, Math.floor(building.maxHealth * done));
          if (health !== building.health) {
            building.health = health;
            changes.push({ type: 'buildingConstructionProgress', buildingId: building.id, progress: done });
          }
        }
      } else if (building.state === 'upgrading' && building.upgrade) {
        const work = building.upgrade;
        ConstructionSystem.rebase(work, now, ConstructionSystem.builderCount(state, building, 'upgrading'), bonuses, ctx);
        if (ConstructionSystem.progress(work, now, bonuses, ctx) >= 1) {
          changes.push(...ConstructionSystem.completeUpgrade(state, building, ctx));
        }
      } else if (building.state === 'demolishing' && building.demolition) {
        const work = building.demolition;
        ConstructionSystem.rebase(work, now, ConstructionSystem.builderCount(state, building, 'demolishing'), bonuses, ctx);
        if (ConstructionSystem.progress(work, now, bonuses, ctx) >= 1) {
          changes.push(...ConstructionSystem.completeDemolition(state, building, ctx));
        }
      }
    }
    return changes;
  },

  completeConstruction(state: WorldState, building: BuildingState, ctx: SimulationContext): StateChange[] {
    building.state = 'completed';
    building.construction = null;
    building.health = building.maxHealth;
    ctx.logger.log(`${building.type} ${building.id} completed`, 'economy');
    return [{ type: 'buildingCompleted', buildingId: building.id }, ...idleGroupsWorkingOn(state, building.id, 'building')];
  },

  completeUpgrade(state: WorldState, building: BuildingState, ctx: SimulationContext): StateChange[] {
    const bonuses = ResearchSystem.bonuses(state, building.ownerId, ctx);
    building.level += 1;
    const max = BuildingStats.maxHealth(building.type, building.level, bonuses, ctx);
    building.health = Math.min(max, building.health + Math.max(0, max - building.maxHealth));
    building.maxHealth = max;
    building.upgrade = null;
    building.state = building.health < max * ctx.config.combat.buildingDamagedRatio ? 'damaged' : 'completed';
    ctx.logger.log(`${building.type} ${building.id} upgraded to level ${building.level}`, 'economy');
    return [
      { type: 'buildingUpgradeCompleted', buildingId: building.id, level: building.level },
      ...idleGroupsWorkingOn(state, building.id, 'upgrading'),
    ];
  },

  completeDemolition(state: WorldState, building: BuildingState, ctx: SimulationContext): StateChange[] {
    const changes = idleGroupsWorkingOn(state, building.id, 'demolishing');
    const player = state.players[building.ownerId];
    if (player) {
      const cost = ctx.catalog.buildings[building.type].cost;
      ResourceLedger.credit(player.resources, cost, ctx.config.construction.demolitionRefund);
      changes.push({ type: 'resourcesChanged', playerId: player.id, resources: ResourceLedger.snapshot(player.resources) });
    }
    delete state.buildings[building.id];
    changes.push({ type: 'buildingDemolished', buildingId: building.id, coord: building.anchor });
    ctx.logger.log(`${building.type} ${building.id} demolished`, 'economy');
    return changes;
  },

  /** Removes a building brought to zero health; its garrison is lost. */
  destroyBuilding(state: WorldState, building: BuildingState, ctx: SimulationContext): StateChange[] {
    building.state = 'destroyed';
    building.health = 0;
    const changes: StateChange[] = [];
    for (const kind of ['building', 'upgrading', 'demolishing'] as const) {
      changes.push(...idleGroupsWorkingOn(state, building.id, kind));
    }
    delete state.buildings[building.id];
    changes.push({ type: 'buildingDestroyed', buildingId: building.id, coord: building.anchor });
    ctx.logger.log(`${building.type} ${building.id} of ${building.ownerId} destroyed`, 'combat');
    return changes;
  },
};
