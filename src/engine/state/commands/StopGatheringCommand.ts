import type { WorldState } from '@/engine/state/WorldState';
import type { StateChange } from '@/engine/data/types/StateChange';
import type { SimulationContext } from '@/engine/simulation/SimulationContext';
import type { Command } from './Command';
import { CommandResult } from './Command';
import { ResourceSystem } from '@/engine/systems/economy/ResourceSystem';
import { VillagerSystem } from '@/engine/systems/economy/VillagerSystem';
import { checkVillagerGroup, requireVillagerGroup } from './CommandGuards';

export class StopGatheringCommand implements Command {
  readonly type = 'STOP_GATHERING';

  constructor(
    readonly playerId: string,
    readonly issuedAt: number,
    readonly villagerGroupId: string,
  ) {}

  validate(state: WorldState, _ctx: SimulationContext): CommandResult {
    const bad = checkVillagerGroup(state, this.playerId, this.villagerGroupId);
    if (bad) return CommandResult.fail(bad);
    const kind = state.villagerGroups[this.villagerGroupId]?.task.kind;
    if (kind !== 'gathering' && kind !== 'hunting') return CommandResult.fail('villagers are not gathering');
    return CommandResult.ok();
  }

  execute(draft: WorldState, _ctx: SimulationContext): StateChange[] {
    const group = requireVillagerGroup(draft, this.villagerGroupId);
    ResourceSystem.unassign(draft, group);
    group.movement = null;
    return VillagerSystem.setTask(group, { kind: 'idle' });
  }
}
