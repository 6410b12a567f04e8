// ─────────────────────────────────────────────
//  Command Pipeline — validate, then execute in
//  an immer recipe. A SimulationError thrown by
//  the recipe discards the draft.
// ─────────────────────────────────────────────

import type { Draft } from 'immer';
import { produce } from 'immer';
import type { WorldState } from '@/engine/state/WorldState';
import type { StateChange } from '@/engine/data/types/StateChange';
import type { SimulationContext } from '@/engine/simulation/SimulationContext';
import { SimulationError } from '@/engine/utils/SimulationError';
import type { Command } from './Command';
import { CommandResult } from './Command';

export type MutationRecipe = (draft: WorldState) => StateChange[];

export interface RecipeOutcome {
  state: WorldState;
  changes: StateChange[];
  error: SimulationError | null;
}

export interface CommandOutcome {
  state: WorldState;
  result: CommandResult;
  changes: StateChange[];
}

/** Runs a recipe; on SimulationError the input state comes back untouched. */
export function applyRecipe(state: WorldState, recipe: MutationRecipe, ctx: SimulationContext, label: string): RecipeOutcome {
  let changes: StateChange[] = [];
  try {
    const next = produce(state, (draft: Draft<WorldState>) => {
      changes = recipe(draft);
    });
    return { state: next, changes, error: null };
  } catch (err) {
    if (!(err instanceof SimulationError)) throw err;
    ctx.logger.log(`${label} aborted (${err.code}): ${err.message}`, 'warning');
    return { state, changes: [], error: err };
  }
}

export function executeCommand(state: WorldState, command: Command, ctx: SimulationContext): CommandOutcome {
  const result = command.validate(state, ctx);
  if (!result.succeeded) {
    ctx.logger.log(`${command.type} rejected for ${command.playerId}: ${result.failureReason}`, 'warning');
    return { state, result, changes: [] };
  }

  const outcome = applyRecipe(state, draft => command.execute(draft, ctx), ctx, command.type);
  if (outcome.error) return { state, result: CommandResult.fail(outcome.error.message), changes: [] };
  return { state: outcome.state, result, changes: outcome.changes };
}
