import type { WorldState } from '@/engine/state/WorldState';
import type { StateChange } from '@/engine/data/types/StateChange';
import type { SimulationContext } from '@/engine/simulation/SimulationContext';
import type { Command } from './Command';
import { CommandResult } from './Command';
import { deploymentTile } from '@/engine/systems/military/ArmySystem';
import { VillagerSystem } from '@/engine/systems/economy/VillagerSystem';
import { SimulationError } from '@/engine/utils/SimulationError';
import { checkBuilding, requireBuilding } from './CommandGuards';

export class DeployVillagersCommand implements Command {
  readonly type = 'DEPLOY_VILLAGERS';

  constructor(
    readonly playerId: string,
    readonly issuedAt: number,
    readonly buildingId: string,
    readonly count: number,
  ) {}

  validate(state: WorldState, ctx: SimulationContext): CommandResult {
    const bad = checkBuilding(state, this.playerId, this.buildingId);
    if (bad) return CommandResult.fail(bad);
    const building = state.buildings[this.buildingId];
    if (!building) return CommandResult.fail(`building ${this.buildingId} not found`);
    if (!Number.isInteger(this.count) || this.count <= 0) return CommandResult.fail('count must be a positive whole number');
    if (building.villagerGarrison < this.count) return CommandResult.fail('not enough villagers in garrison');
    if (!deploymentTile(state, building, ctx)) return CommandResult.fail('no free tile to deploy onto');
    return CommandResult.ok();
  }

  execute(draft: WorldState, ctx: SimulationContext): StateChange[] {
    const building = requireBuilding(draft, this.buildingId);
    const tile = deploymentTile(draft, building, ctx);
    if (!tile) throw new SimulationError('INVALID_STATE', `cannot deploy villagers from ${building.id}`);
    building.villagerGarrison -= this.count;
    return VillagerSystem.create(draft, building.ownerId, tile, this.count).changes;
  }
}
