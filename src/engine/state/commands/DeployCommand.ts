import type { WorldState } from '@/engine/state/WorldState';
import type { Composition } from '@/engine/data/types/Unit';
import type { StateChange } from '@/engine/data/types/StateChange';
import type { SimulationContext } from '@/engine/simulation/SimulationContext';
import type { Command } from './Command';
import { CommandResult } from './Command';
import { compositionTotal } from '@/engine/data/types/Unit';
import { createArmy, deploymentTile, hasUnits, takeUnits } from '@/engine/systems/military/ArmySystem';
import { SimulationError } from '@/engine/utils/SimulationError';
import { checkBuilding, checkUnitCounts, requireBuilding } from './CommandGuards';

export class DeployCommand implements Command {
  readonly type = 'DEPLOY';

  constructor(
    readonly playerId: string,
    readonly issuedAt: number,
    readonly buildingId: string,
    readonly composition: Composition,
  ) {}

  validate(state: WorldState, ctx: SimulationContext): CommandResult {
    const bad = checkBuilding(state, this.playerId, this.buildingId);
    if (bad) return CommandResult.fail(bad);
    const building = state.buildings[this.buildingId];
    if (!building) return CommandResult.fail(`building ${this.buildingId} not found`);
    const counts = checkUnitCounts(this.composition);
    if (counts) return CommandResult.fail(counts);
    if (compositionTotal(this.composition) === 0) return CommandResult.fail('no units selected');
    if (!hasUnits(building.garrison, this.composition)) return CommandResult.fail('garrison does not hold those units');
    if (!deploymentTile(state, building, ctx)) return CommandResult.fail('no free tile to deploy onto');
    return CommandResult.ok();
  }

  execute(draft: WorldState, ctx: SimulationContext): StateChange[] {
    const building = requireBuilding(draft, this.buildingId);
    const tile = deploymentTile(draft, building, ctx);
    if (!tile || !takeUnits(building.garrison, this.composition)) {
      throw new SimulationError('INVALID_STATE', `cannot deploy from ${building.id}`);
    }
    const { army, changes } = createArmy(draft, building.ownerId, tile, this.composition, building.id);
    ctx.logger.log(`Army ${army.id} deployed from ${building.type} ${building.id}`, 'action');
    return changes;
  }
}
