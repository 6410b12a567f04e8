import type { WorldState } from '@/engine/state/WorldState';
import type { StateChange } from '@/engine/data/types/StateChange';
import type { SimulationContext } from '@/engine/simulation/SimulationContext';
import type { Command } from './Command';
import { CommandResult } from './Command';
import { compositionTotal } from '@/engine/data/types/Unit';
import { ConstructionSystem } from '@/engine/systems/economy/ConstructionSystem';
import { VillagerSystem } from '@/engine/systems/economy/VillagerSystem';
import { checkBuilders, checkBuilding, requireBuilding, requireVillagerGroup } from './CommandGuards';

export class DemolishCommand implements Command {
  readonly type = 'DEMOLISH';

  constructor(
    readonly playerId: string,
    readonly issuedAt: number,
    readonly buildingId: string,
    readonly builderGroupId: string | null = null,
  ) {}

  validate(state: WorldState, ctx: SimulationContext): CommandResult {
    const bad = checkBuilding(state, this.playerId, this.buildingId);
    if (bad) return CommandResult.fail(bad);
    const building = state.buildings[this.buildingId];
    if (!building) return CommandResult.fail(`building ${this.buildingId} not found`);
    if (building.type === 'cityCenter') return CommandResult.fail('city centres cannot be demolished');
    if (building.state !== 'completed') return CommandResult.fail(`building is ${building.state}`);
    if (compositionTotal(building.garrison) > 0 || building.villagerGarrison > 0) {
      return CommandResult.fail('garrison must be deployed first');
    }
    const builders = checkBuilders(state, this.playerId, this.builderGroupId, building.occupied, ctx);
    if (builders) return CommandResult.fail(builders);
    return CommandResult.ok();
  }

  execute(draft: WorldState, ctx: SimulationContext): StateChange[] {
    const building = requireBuilding(draft, this.buildingId);
    const changes = ConstructionSystem.startDemolition(draft, building, ctx);
    if (this.builderGroupId !== null) {
      const group = requireVillagerGroup(draft, this.builderGroupId);
      changes.push(...VillagerSystem.assignWork(draft, group, building, 'demolishing', ctx));
    }
    return changes;
  }
}
