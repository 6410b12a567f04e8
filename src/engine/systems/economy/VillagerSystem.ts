// ─────────────────────────────────────────────
//  Villager System — group creation and tasking
// ─────────────────────────────────────────────

import type { WorldState } from '@/engine/state/WorldState';
import type { BuildingState } from '@/engine/data/types/Building';
import type { HexCoord } from '@/engine/data/types/Hex';
import type { StateChange } from '@/engine/data/types/StateChange';
import type { VillagerGroupState, VillagerTask } from '@/engine/data/types/Villager';
import type { SimulationContext } from '@/engine/simulation/SimulationContext';
import { allocateId } from '@/engine/state/WorldState';
import { taskTargetId } from '@/engine/data/types/Villager';
import { createPathGrid, Pathfinding } from '@/engine/systems/movement/Pathfinding';
import { ResourceSystem } from './ResourceSystem';

export type WorkKind = 'building' | 'upgrading' | 'demolishing';

export const VillagerSystem = {
  create(state: WorldState, ownerId: string, coord: HexCoord, count: number): { group: VillagerGroupState; changes: StateChange[] } {
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
    return { group, changes: [{ type: 'villagerGroupCreated', groupId: group.id, ownerId, coord, count }] };
  },

  setTask(group: VillagerGroupState, task: VillagerTask): StateChange[] {
    group.task = task;
    return [{ type: 'villagerGroupTaskChanged', groupId: group.id, task: task.kind, targetId: taskTargetId(task) }];
  },

  /** Route to a tile next to any of `targets`; [] when already adjacent. */
  routeAdjacent(state: WorldState, group: VillagerGroupState, targets: HexCoord[], ctx: SimulationContext): HexCoord[] | null {
    const grid = createPathGrid(state, group.ownerId, ctx, { ignoreCapacityAt: [group.coord] });
    return Pathfinding.findPathAdjacent(group.coord, targets, grid);
  },

  /** Starts walking toward `targets`; the task is left for the caller. */
  sendAdjacent(state: WorldState, group: VillagerGroupState, targets: HexCoord[], ctx: SimulationContext): boolean {
    const path = VillagerSystem.routeAdjacent(state, group, targets, ctx);
    if (!path) return false;
    group.movement = path.length > 0 ? { path, progress: 0, intent: { kind: 'move' } } : null;
    return true;
  },

  /** Sends a group to work on a building site. */
  assignWork(state: WorldState, group: VillagerGroupState, building: BuildingState, kind: WorkKind, ctx: SimulationContext): StateChange[] {
    ResourceSystem.unassign(state, group);
    VillagerSystem.sendAdjacent(state, group, building.occupied, ctx);
    return VillagerSystem.setTask(group, { kind, buildingId: building.id });
  },
};
