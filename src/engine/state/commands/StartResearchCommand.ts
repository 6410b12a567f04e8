import type { WorldState } from '@/engine/state/WorldState';
import type { StateChange } from '@/engine/data/types/StateChange';
import type { SimulationContext } from '@/engine/simulation/SimulationContext';
import type { ResearchBlocker } from '@/engine/systems/economy/ResearchSystem';
import type { Command } from './Command';
import { CommandResult } from './Command';
import { ResearchSystem } from '@/engine/systems/economy/ResearchSystem';

const RESEARCH_REASONS: Record<ResearchBlocker, string> = {
  unknown: 'unknown research',
  completed: 'research already completed',
  active: 'research already in progress',
  busy: 'another research is in progress',
  cityCenterLevel: 'city centre level too low',
  prerequisites: 'prerequisites not researched',
  resources: 'not enough resources',
};

export class StartResearchCommand implements Command {
  readonly type = 'START_RESEARCH';

  constructor(
    readonly playerId: string,
    readonly issuedAt: number,
    readonly researchId: string,
  ) {}

  validate(state: WorldState, ctx: SimulationContext): CommandResult {
    const blocker = ResearchSystem.blocker(state, this.playerId, this.researchId, ctx);
    return blocker ? CommandResult.fail(RESEARCH_REASONS[blocker]) : CommandResult.ok();
  }

  execute(draft: WorldState, ctx: SimulationContext): StateChange[] {
    ctx.logger.log(`${this.playerId} starts researching ${this.researchId}`, 'economy');
    return ResearchSystem.start(draft, this.playerId, this.researchId, ctx);
  }
}
