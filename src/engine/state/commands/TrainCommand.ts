import type { WorldState } from '@/engine/state/WorldState';
import type { MilitaryUnitType } from '@/engine/data/types/Unit';
import type { StateChange } from '@/engine/data/types/StateChange';
import type { SimulationContext } from '@/engine/simulation/SimulationContext';
import type { TrainingBlocker } from '@/engine/systems/economy/TrainingSystem';
import type { Command } from './Command';
import { CommandResult } from './Command';
import { TrainingSystem } from '@/engine/systems/economy/TrainingSystem';
import { checkBuilding, requireBuilding } from './CommandGuards';

export const TRAINING_REASONS: Record<TrainingBlocker, string> = {
  notOperational: 'building is not operational',
  wrongBuilding: 'building cannot train that',
  quantity: 'quantity must be a positive whole number',
  resources: 'not enough resources',
  population: 'population capacity reached',
};

export class TrainCommand implements Command {
  readonly type = 'TRAIN';

  constructor(
    readonly playerId: string,
    readonly issuedAt: number,
    readonly buildingId: string,
    readonly unitType: MilitaryUnitType,
    readonly quantity: number,
  ) {}

  validate(state: WorldState, ctx: SimulationContext): CommandResult {
    const bad = checkBuilding(state, this.playerId, this.buildingId);
    if (bad) return CommandResult.fail(bad);
    const building = state.buildings[this.buildingId];
    const blocker = building ? TrainingSystem.blocker(state, building, this.unitType, this.quantity, ctx) : 'notOperational';
    return blocker ? CommandResult.fail(TRAINING_REASONS[blocker]) : CommandResult.ok();
  }

  execute(draft: WorldState, ctx: SimulationContext): StateChange[] {
    return TrainingSystem.enqueue(draft, requireBuilding(draft, this.buildingId), this.unitType, this.quantity, ctx);
  }
}
