import type { WorldState } from '@/engine/state/WorldState';
import type { StateChange } from '@/engine/data/types/StateChange';
import type { SimulationContext } from '@/engine/simulation/SimulationContext';
import type { Command } from './Command';
import { CommandResult } from './Command';
import { ResourceSystem } from '@/engine/systems/economy/ResourceSystem';
import { VillagerSystem } from '@/engine/systems/economy/VillagerSystem';
import {
  checkVillagerGroup,
  isUnderAttack,
  requireResourcePoint,
  requireVillagerGroup,
} from './CommandGuards';

export class GatherCommand implements Command {
  readonly type = 'GATHER';

  constructor(
    readonly playerId: string,
    readonly issuedAt: number,
    readonly villagerGroupId: string,
    readonly resourcePointId: string,
  ) {}

  validate(state: WorldState, ctx: SimulationContext): CommandResult {
    const bad = checkVillagerGroup(state, this.playerId, this.villagerGroupId);
    if (bad) return CommandResult.fail(bad);
    if (isUnderAttack(state, this.villagerGroupId)) return CommandResult.fail('villagers are under attack');

    const group = state.villagerGroups[this.villagerGroupId];
    const point = state.resourcePoints[this.resourcePointId];
    if (!group || !point) return CommandResult.fail(`resource point ${this.resourcePointId} not found`);
    if (point.remaining <= 0) return CommandResult.fail('resource is depleted');
    if (!ResourceSystem.hasCapacity(point, group.id, ctx)) return CommandResult.fail('resource has no room for more gatherers');
    if (!VillagerSystem.routeAdjacent(state, group, [point.coord], ctx)) return CommandResult.fail('resource cannot be reached');
    return CommandResult.ok();
  }

  execute(draft: WorldState, ctx: SimulationContext): StateChange[] {
    const group = requireVillagerGroup(draft, this.villagerGroupId);
    const point = requireResourcePoint(draft, this.resourcePointId);
    ResourceSystem.assign(draft, group, point);
    VillagerSystem.sendAdjacent(draft, group, [point.coord], ctx);
    const hunting = ctx.catalog.resources[point.type].huntable && point.health > 0;
    return VillagerSystem.setTask(group, hunting
      ? { kind: 'hunting', resourcePointId: point.id }
      : { kind: 'gathering', resourcePointId: point.id });
  }
}
