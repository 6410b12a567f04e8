// ─────────────────────────────────────────────
//  Simulation Store — single source of truth
//  Holds the current WorldState snapshot; every
//  mutation goes through a command or a recipe.
// ─────────────────────────────────────────────

import type { WorldState } from './WorldState';
import type { StateChange } from '@/engine/data/types/StateChange';
import type { SimulationContext } from '@/engine/simulation/SimulationContext';
import type { Command, CommandResult } from './commands/Command';
import type { MutationRecipe } from './commands/CommandPipeline';
import { applyRecipe, executeCommand } from './commands/CommandPipeline';

type StoreListener = (state: WorldState, changes: readonly StateChange[]) => void;

const HISTORY_LIMIT = 50;

export class SimulationStore {
  private state: WorldState;
  private listeners: StoreListener[] = [];
  private history: WorldState[] = [];

  constructor(
    initial: WorldState,
    readonly ctx: SimulationContext,
  ) {
    this.state = initial;
  }

  getState(): WorldState { return this.state; }

  /** Previous snapshots, oldest first */
  getHistory(): readonly WorldState[] { return this.history; }

  execute(command: Command): { result: CommandResult; changes: StateChange[] } {
    const { state, result, changes } = executeCommand(this.state, command, this.ctx);
    this.commit(state, changes);
    return { result, changes };
  }

  /** Engine mutation (ticks, catch-up); nothing is committed if the recipe throws. */
  apply(recipe: MutationRecipe, label = 'update'): StateChange[] {
    const { state, changes } = applyRecipe(this.state, recipe, this.ctx, label);
    this.commit(state, changes);
    return changes;
  }

  /** Restores the previous snapshot. Returns false when there is none. */
  undo(): boolean {
    const previous = this.history.pop();
    if (!previous) return false;
    this.state = previous;
    this.notify([]);
    return true;
  }

  /** Replaces the state wholesale, e.g. after loading a snapshot. History is cleared. */
  reset(state: WorldState): void {
    this.state = state;
    this.history = [];
    this.notify([]);
  }

  subscribe(listener: StoreListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter(l => l !== listener);
    };
  }

  private commit(next: WorldState, changes: StateChange[]): void {
    if (next === this.state) return;
    this.history.push(this.state);
    if (this.history.length > HISTORY_LIMIT) this.history.shift();
    this.state = next;
    this.notify(changes);
  }

  private notify(changes: readonly StateChange[]): void {
    for (const l of this.listeners) l(this.state, changes);
  }
}
