// ─────────────────────────────────────────────
//  Training System — military and villager queues
//  Entries complete at startedAt + time × quantity
//  and land in the building's garrison.
// ─────────────────────────────────────────────

import type { WorldState } from '@/engine/state/WorldState';
import type { BuildingState } from '@/engine/data/types/Building';
import type { Composition, MilitaryUnitType } from '@/engine/data/types/Unit';
import type { StateChange } from '@/engine/data/types/StateChange';
import type { SimulationContext } from '@/engine/simulation/SimulationContext';
import { isOperational } from '@/engine/data/types/Building';
import { addUnits } from '@/engine/systems/military/ArmySystem';
import { ResearchSystem } from './ResearchSystem';
import { ResourceLedger } from './ResourceLedger';
import { BuildingStats } from './BuildingStats';

export type TrainingBlocker = 'notOperational' | 'wrongBuilding' | 'quantity' | 'resources' | 'population';

export const TrainingSystem = {
  unitTime(state: WorldState, ownerId: string, unitType: MilitaryUnitType, ctx: SimulationContext): number {
    const bonuses = ResearchSystem.bonuses(state, ownerId, ctx);
    return ctx.catalog.units[unitType].trainingTime / (1 + (bonuses.militaryTrainingSpeed ?? 0));
  },

  blocker(state: WorldState, building: BuildingState, unitType: MilitaryUnitType, quantity: number, ctx: SimulationContext): TrainingBlocker | null {
    if (!isOperational(building)) return 'notOperational';
    if (ctx.catalog.units[unitType].trainedAt !== building.type) return 'wrongBuilding';
    if (!Number.isInteger(quantity) || quantity <= 0) return 'quantity';
    const player = state.players[building.ownerId];
    if (!player || !ResourceLedger.canAfford(player.resources, ctx.catalog.units[unitType].cost, quantity)) return 'resources';
    if (!TrainingSystem.hasPopulationRoom(state, building.ownerId, quantity, ctx)) return 'population';
    return null;
  },

  villagerBlocker(state: WorldState, building: BuildingState, quantity: number, ctx: SimulationContext): TrainingBlocker | null {
    if (!isOperational(building)) return 'notOperational';
    if (!ctx.catalog.buildings[building.type].trainsVillagers) return 'wrongBuilding';
    if (!Number.isInteger(quantity) || quantity <= 0) return 'quantity';
    const player = state.players[building.ownerId];
    if (!player || !ResourceLedger.canAfford(player.resources, ctx.config.training.villagerCost, quantity)) return 'resources';
    if (!TrainingSystem.hasPopulationRoom(state, building.ownerId, quantity, ctx)) return 'population';
    return null;
  },

  hasPopulationRoom(state: WorldState, playerId: string, quantity: number, ctx: SimulationContext): boolean {
    const bonuses = ResearchSystem.bonuses(state, playerId, ctx);
    const pop = BuildingStats.population(state, playerId, bonuses, ctx);
    return pop.current + quantity <= pop.capacity;
  },

  /** Pays and queues; caller has checked `blocker`. */
  enqueue(state: WorldState, building: BuildingState, unitType: MilitaryUnitType, quantity: number, ctx: SimulationContext): StateChange[] {
    const player = state.players[building.ownerId];
    if (!player) return [];
    ResourceLedger.deduct(player.resources, ctx.catalog.units[unitType].cost, quantity);
    const last = building.trainingQueue[building.trainingQueue.length - 1];
    const startedAt = last
      ? Math.max(state.currentTime, last.startedAt + TrainingSystem.unitTime(state, building.ownerId, last.unitType, ctx) * last.quantity)
      : state.currentTime;
    building.trainingQueue.push({ unitType, quantity, startedAt });
    return [
      { type: 'trainingStarted', buildingId: building.id, unitType, quantity },
      { type: 'resourcesChanged', playerId: player.id, resources: ResourceLedger.snapshot(player.resources) },
    ];
  },

  enqueueVillagers(state: WorldState, building: BuildingState, quantity: number, ctx: SimulationContext): StateChange[] {
    const player = state.players[building.ownerId];
    if (!player) return [];
    ResourceLedger.deduct(player.resources, ctx.config.training.villagerCost, quantity);
    const last = building.villagerTrainingQueue[building.villagerTrainingQueue.length - 1];
    const startedAt = last
      ? Math.max(state.currentTime, last.startedAt + ctx.config.training.villagerTime * last.quantity)
      : state.currentTime;
    building.villagerTrainingQueue.push({ quantity, startedAt });
    return [
      { type: 'villagerTrainingStarted', buildingId: building.id, quantity },
      { type: 'resourcesChanged', playerId: player.id, resources: ResourceLedger.snapshot(player.resources) },
    ];
  },

  update(state: WorldState, ctx: SimulationContext): StateChange[] {
    const changes: StateChange[] = [];
    const now = state.currentTime;
    for (const building of Object.values(state.buildings)) {
      if (!isOperational(building)) continue;

      while (building.trainingQueue.length > 0) {
        const entry = building.trainingQueue[0];
        if (!entry) break;
        const time = TrainingSystem.unitTime(state, building.ownerId, entry.unitType, ctx) * entry.quantity;
        if (now < entry.startedAt + time) break;
        building.trainingQueue.shift();
        const units: Composition = {};
        units[entry.unitType] = entry.quantity;
        addUnits(building.garrison, units);
        changes.push(
          { type: 'trainingCompleted', buildingId: building.id, unitType: entry.unitType, quantity: entry.quantity },
          { type: 'unitsGarrisoned', buildingId: building.id, composition: units, villagers: 0 },
        );
        ctx.logger.log(`${building.type} ${building.id} trained ${entry.quantity} ${entry.unitType}`, 'economy');
      }

      while (building.villagerTrainingQueue.length > 0) {
        const entry = building.villagerTrainingQueue[0];
        if (!entry) break;
        if (now < entry.startedAt + ctx.config.training.villagerTime * entry.quantity) break;
        building.villagerTrainingQueue.shift();
        building.villagerGarrison += entry.quantity;
        changes.push(
          { type: 'villagerTrainingCompleted', buildingId: building.id, quantity: entry.quantity },
          { type: 'unitsGarrisoned', buildingId: building.id, composition: {}, villagers: entry.quantity },
        );
      }
    }
    return changes;
  },
};
