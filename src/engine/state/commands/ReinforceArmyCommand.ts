import type { WorldState } from '@/engine/state/WorldState';
import type { Composition } from '@/engine/data/types/Unit';
import type { StateChange } from '@/engine/data/types/StateChange';
import type { SimulationContext } from '@/engine/simulation/SimulationContext';
import type { Command } from './Command';
import { CommandResult } from './Command';
import { compositionTotal } from '@/engine/data/types/Unit';
import { hasUnits } from '@/engine/systems/military/ArmySystem';
import { ReinforcementSystem } from '@/engine/systems/military/ReinforcementSystem';
import { checkArmy, checkBuilding, checkUnitCounts, requireArmy, requireBuilding } from './CommandGuards';

export class ReinforceArmyCommand implements Command {
  readonly type = 'REINFORCE_ARMY';

  constructor(
    readonly playerId: string,
    readonly issuedAt: number,
    readonly buildingId: string,
    readonly armyId: string,
    readonly composition: Composition,
  ) {}

  validate(state: WorldState, ctx: SimulationContext): CommandResult {
    const bad = checkBuilding(state, this.playerId, this.buildingId) ?? checkArmy(state, this.playerId, this.armyId);
    if (bad) return CommandResult.fail(bad);
    const building = state.buildings[this.buildingId];
    const army = state.armies[this.armyId];
    if (!building || !army) return CommandResult.fail('reinforcement source or target missing');
    const counts = checkUnitCounts(this.composition);
    if (counts) return CommandResult.fail(counts);
    if (compositionTotal(this.composition) === 0) return CommandResult.fail('no units selected');
    if (!hasUnits(building.garrison, this.composition)) return CommandResult.fail('garrison does not hold those units');
    if (!ReinforcementSystem.planRoute(state, building, army, ctx)) return CommandResult.fail('no route to the army');
    return CommandResult.ok();
  }

  execute(draft: WorldState, ctx: SimulationContext): StateChange[] {
    return ReinforcementSystem.dispatch(
      draft,
      requireBuilding(draft, this.buildingId),
      requireArmy(draft, this.armyId),
      this.composition,
      ctx,
    );
  }
}
