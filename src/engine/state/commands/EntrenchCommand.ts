import type { WorldState } from '@/engine/state/WorldState';
import type { StateChange } from '@/engine/data/types/StateChange';
import type { SimulationContext } from '@/engine/simulation/SimulationContext';
import type { Command } from './Command';
import { CommandResult } from './Command';
import { compositionTotal } from '@/engine/data/types/Unit';
import { ResourceLedger } from '@/engine/systems/economy/ResourceLedger';
import { checkArmy, requireArmy, requirePlayer } from './CommandGuards';

export class EntrenchCommand implements Command {
  readonly type = 'ENTRENCH';

  constructor(
    readonly playerId: string,
    readonly issuedAt: number,
    readonly armyId: string,
  ) {}

  validate(state: WorldState, ctx: SimulationContext): CommandResult {
    const bad = checkArmy(state, this.playerId, this.armyId);
    if (bad) return CommandResult.fail(bad);
    const army = state.armies[this.armyId];
    const player = state.players[this.playerId];
    if (!army || !player) return CommandResult.fail(`army ${this.armyId} not found`);
    if (army.inCombat) return CommandResult.fail('army is in combat');
    if (army.movement) return CommandResult.fail('army is moving');
    if (army.entrenchment !== 'none') return CommandResult.fail(`army is already ${army.entrenchment}`);
    if (compositionTotal(army.composition) === 0) return CommandResult.fail('army has no units');
    if (player.resources.wood < ctx.config.entrenchment.woodCost) return CommandResult.fail('not enough wood');
    return CommandResult.ok();
  }

  execute(draft: WorldState, ctx: SimulationContext): StateChange[] {
    const army = requireArmy(draft, this.armyId);
    const player = requirePlayer(draft, this.playerId);
    ResourceLedger.deduct(player.resources, { wood: ctx.config.entrenchment.woodCost });
    army.entrenchment = 'entrenching';
    army.entrenchmentStartedAt = draft.currentTime;
    ctx.logger.log(`Army ${army.id} digs in`, 'action');
    return [
      { type: 'armyEntrenchmentStarted', armyId: army.id },
      { type: 'resourcesChanged', playerId: player.id, resources: ResourceLedger.snapshot(player.resources) },
    ];
  }
}
