import type { WorldState } from '@/engine/state/WorldState';
import type { StateChange } from '@/engine/data/types/StateChange';
import type { SimulationContext } from '@/engine/simulation/SimulationContext';
import type { Command } from './Command';
import { CommandResult } from './Command';
import { TrainingSystem } from '@/engine/systems/economy/TrainingSystem';
import { checkBuilding, requireBuilding } from './CommandGuards';
import { TRAINING_REASONS } from './TrainCommand';

export class TrainVillagersCommand implements Command {
  readonly type = 'TRAIN_VILLAGERS';

  constructor(
    readonly playerId: string,
    readonly issuedAt: number,
    readonly buildingId: string,
    readonly quantity: number,
  ) {}

  validate(state: WorldState, ctx: SimulationContext): CommandResult {
    const bad = checkBuilding(state, this.playerId, this.buildingId);
    if (bad) return CommandResult.fail(bad);
    const building = state.buildings[this.buildingId];
    const blocker = building ? TrainingSystem.villagerBlocker(state, building, this.quantity, ctx) : 'notOperational';
    return blocker ? CommandResult.fail(TRAINING_REASONS[blocker]) : CommandResult.ok();
  }

  execute(draft: WorldState, ctx: SimulationContext): StateChange[] {
    return TrainingSystem.enqueueVillagers(draft, requireBuilding(draft, this.buildingId), this.quantity, ctx);
  }
}
