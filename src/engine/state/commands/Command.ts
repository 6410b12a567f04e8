// ─────────────────────────────────────────────
//  Command — a player intention
//  validate() never mutates; execute() mutates a
//  draft and reports what changed. Both humans and
//  the AI go through the same pipeline.
// ─────────────────────────────────────────────

import type { WorldState } from '@/engine/state/WorldState';
import type { StateChange } from '@/engine/data/types/StateChange';
import type { SimulationContext } from '@/engine/simulation/SimulationContext';

export type CommandType =
  | 'MOVE'
  | 'BUILD'
  | 'GATHER'
  | 'STOP_GATHERING'
  | 'ATTACK'
  | 'UPGRADE'
  | 'CANCEL_UPGRADE'
  | 'DEMOLISH'
  | 'CANCEL_DEMOLITION'
  | 'TRAIN'
  | 'TRAIN_VILLAGERS'
  | 'DEPLOY'
  | 'DEPLOY_VILLAGERS'
  | 'REINFORCE_ARMY'
  | 'ENTRENCH'
  | 'START_RESEARCH';

export type CommandResult =
  | { succeeded: true }
  | { succeeded: false; failureReason: string };

export interface Command {
  readonly type: CommandType;
  readonly playerId: string;
  /** Simulation time the command was issued at */
  readonly issuedAt: number;
  validate(state: WorldState, ctx: SimulationContext): CommandResult;
  execute(draft: WorldState, ctx: SimulationContext): StateChange[];
}

export const CommandResult = {
  ok(): CommandResult {
    return { succeeded: true };
  },
  fail(failureReason: string): CommandResult {
    return { succeeded: false, failureReason };
  },
};
