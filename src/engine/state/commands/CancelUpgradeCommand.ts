import type { WorldState } from '@/engine/state/WorldState';
import type { StateChange } from '@/engine/data/types/StateChange';
import type { SimulationContext } from '@/engine/simulation/SimulationContext';
import type { Command } from './Command';
import { CommandResult } from './Command';
import { ConstructionSystem } from '@/engine/systems/economy/ConstructionSystem';
import { checkBuilding, requireBuilding } from './CommandGuards';

export class CancelUpgradeCommand implements Command {
  readonly type = 'CANCEL_UPGRADE';

  constructor(
    readonly playerId: string,
    readonly issuedAt: number,
    readonly buildingId: string,
  ) {}

  validate(state: WorldState, _ctx: SimulationContext): CommandResult {
    const bad = checkBuilding(state, this.playerId, this.buildingId);
    if (bad) return CommandResult.fail(bad);
    if (state.buildings[this.buildingId]?.state !== 'upgrading') return CommandResult.fail('building is not upgrading');
    return CommandResult.ok();
  }

  execute(draft: WorldState, ctx: SimulationContext): StateChange[] {
    return ConstructionSystem.cancelUpgrade(draft, requireBuilding(draft, this.buildingId), ctx);
  }
}
