import type { WorldState } from '@/engine/state/WorldState';
import type { HexCoord } from '@/engine/data/types/Hex';
import type { MobileRef } from '@/engine/data/types/Entity';
import type { StateChange } from '@/engine/data/types/StateChange';
import type { SimulationContext } from '@/engine/simulation/SimulationContext';
import type { Command } from './Command';
import { CommandResult } from './Command';
import { WorldStateQuery } from '@/engine/state/WorldState';
import { TERRAIN } from '@/engine/data/types/Terrain';
import { hexEquals } from '@/engine/data/types/Hex';
import { canGarrisonInto, cancelEntrenchment } from '@/engine/systems/military/ArmySystem';
import { HexMath } from '@/engine/utils/HexMath';
import { ResourceSystem } from '@/engine/systems/economy/ResourceSystem';
import { VillagerSystem } from '@/engine/systems/economy/VillagerSystem';
import { createPathGrid, Pathfinding } from '@/engine/systems/movement/Pathfinding';
import { checkArmy, checkVillagerGroup, isUnderAttack, requireArmy, requireVillagerGroup } from './CommandGuards';

export class MoveCommand implements Command {
  readonly type = 'MOVE';

  constructor(
    readonly playerId: string,
    readonly issuedAt: number,
    readonly entity: MobileRef,
    readonly destination: HexCoord,
    readonly cancelEntrenchment = false,
    /** Fold the army into this building on arrival */
    readonly garrisonBuildingId: string | null = null,
  ) {}

  private origin(state: WorldState): { ownerId: string; coord: HexCoord } | null {
    return this.entity.kind === 'army'
      ? state.armies[this.entity.id] ?? null
      : state.villagerGroups[this.entity.id] ?? null;
  }

  private route(state: WorldState, ctx: SimulationContext): HexCoord[] | null {
    const origin = this.origin(state);
    if (!origin) return null;
    const grid = createPathGrid(state, origin.ownerId, ctx, { ignoreCapacityAt: [origin.coord] });
    return Pathfinding.findPath(origin.coord, this.destination, grid);
  }

  validate(state: WorldState, ctx: SimulationContext): CommandResult {
    const ownership = this.entity.kind === 'army'
      ? checkArmy(state, this.playerId, this.entity.id)
      : checkVillagerGroup(state, this.playerId, this.entity.id);
    if (ownership) return CommandResult.fail(ownership);

    if (this.entity.kind === 'army') {
      const army = state.armies[this.entity.id];
      if (army?.inCombat) return CommandResult.fail('army is in combat');
      if (army && army.entrenchment !== 'none' && !this.cancelEntrenchment) {
        return CommandResult.fail('army is entrenched; moving requires cancelling the entrenchment');
      }
    } else if (isUnderAttack(state, this.entity.id)) {
      return CommandResult.fail('villagers are under attack');
    }

    const tile = WorldStateQuery.tile(state, this.destination);
    if (!tile) return CommandResult.fail('destination is off the map');
    if (!TERRAIN[tile.terrain].walkable) return CommandResult.fail(`destination is ${tile.terrain}`);
    const origin = this.origin(state);
    // a garrison order may start next to the building
    if (origin && hexEquals(origin.coord, this.destination) && this.garrisonBuildingId === null) {
      return CommandResult.fail('already at destination');
    }

    if (this.garrisonBuildingId !== null) {
      const blocker = this.garrisonBlocker(state, ctx);
      if (blocker) return CommandResult.fail(blocker);
    }

    const path = this.route(state, ctx);
    if (!path) return CommandResult.fail('no path to destination');
    return CommandResult.ok();
  }

  private garrisonBlocker(state: WorldState, ctx: SimulationContext): string | null {
    if (this.entity.kind !== 'army' || this.garrisonBuildingId === null) return 'only armies can garrison';
    const army = state.armies[this.entity.id];
    const building = state.buildings[this.garrisonBuildingId];
    if (!army || !building || building.state === 'destroyed') return `building ${this.garrisonBuildingId} not found`;
    if (!canGarrisonInto(state, army, building, ctx)) return 'building cannot take this army';
    if (!building.occupied.some(o => HexMath.distance(o, this.destination) <= 1)) {
      return 'destination is not next to the building';
    }
    return null;
  }

  execute(draft: WorldState, ctx: SimulationContext): StateChange[] {
    const path = this.route(draft, ctx);
    if (!path) return [];
    const changes: StateChange[] = [];

    if (this.entity.kind === 'army') {
      const army = requireArmy(draft, this.entity.id);
      if (army.entrenchment !== 'none') {
        ctx.logger.log(`Army ${army.id} leaves its entrenchment`, 'warning');
        changes.push(...cancelEntrenchment(army));
      }
      army.movement = {
        path,
        progress: 0,
        intent: this.garrisonBuildingId !== null ? { kind: 'garrison', buildingId: this.garrisonBuildingId } : { kind: 'move' },
      };
      return changes;
    }

    const group = requireVillagerGroup(draft, this.entity.id);
    ResourceSystem.unassign(draft, group);
    group.movement = { path, progress: 0, intent: { kind: 'move' } };
    changes.push(...VillagerSystem.setTask(group, { kind: 'moving' }));
    return changes;
  }
}
