import type { WorldState } from '@/engine/state/WorldState';
import type { StateChange } from '@/engine/data/types/StateChange';
import type { SimulationContext } from '@/engine/simulation/SimulationContext';
import type { Command } from './Command';
import { CommandResult } from './Command';
import { WorldStateQuery } from '@/engine/state/WorldState';
import { BuildingStats } from '@/engine/systems/economy/BuildingStats';
import { ConstructionSystem } from '@/engine/systems/economy/ConstructionSystem';
import { ResourceLedger } from '@/engine/systems/economy/ResourceLedger';
import { VillagerSystem } from '@/engine/systems/economy/VillagerSystem';
import { checkBuilders, checkBuilding, requireBuilding, requireVillagerGroup } from './CommandGuards';

export class UpgradeCommand implements Command {
  readonly type = 'UPGRADE';

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
    const player = state.players[this.playerId];
    if (!building || !player) return CommandResult.fail(`building ${this.buildingId} not found`);

    if (building.state === 'upgrading') return CommandResult.fail('already upgrading');
    if (building.state !== 'completed') return CommandResult.fail(`building is ${building.state}`);
    if (building.level >= ctx.catalog.buildings[building.type].maxLevel) return CommandResult.fail('building is at max level');
    if (building.type !== 'cityCenter' && WorldStateQuery.cityCenterLevel(state, this.playerId) < building.level + 1) {
      return CommandResult.fail('city centre level too low');
    }
    const short = ResourceLedger.shortfall(player.resources, BuildingStats.upgradeCost(building.type, building.level, ctx));
    if (short) return CommandResult.fail(`not enough ${short}`);

    const builders = checkBuilders(state, this.playerId, this.builderGroupId, building.occupied, ctx);
    if (builders) return CommandResult.fail(builders);
    return CommandResult.ok();
  }

  execute(draft: WorldState, ctx: SimulationContext): StateChange[] {
    const building = requireBuilding(draft, this.buildingId);
    const changes = ConstructionSystem.startUpgrade(draft, building, ctx);
    if (this.builderGroupId !== null) {
      const group = requireVillagerGroup(draft, this.builderGroupId);
      changes.push(...VillagerSystem.assignWork(draft, group, building, 'upgrading', ctx));
    }
    return changes;
  }
}
