// ─────────────────────────────────────────────
//  Simulation — fixed-order tick loop
//  Subsystems run on their own cadence inside one
//  recipe; AI players then decide from the committed
//  snapshot and act through the command pipeline.
// ─────────────────────────────────────────────

import type { WorldState, SubsystemKey } from '@/engine/state/WorldState';
import type { StateChange } from '@/engine/data/types/StateChange';
import type { Command, CommandResult } from '@/engine/state/commands/Command';
import type { SimulationContext } from './SimulationContext';
import { SimulationStore } from '@/engine/state/SimulationStore';
import { MovementSystem } from '@/engine/systems/movement/MovementSystem';
import { ReinforcementSystem } from '@/engine/systems/military/ReinforcementSystem';
import { updateEntrenchments } from '@/engine/systems/military/ArmySystem';
import { CombatSystem } from '@/engine/systems/combat/CombatSystem';
import { VisionSystem } from '@/engine/systems/vision/VisionSystem';
import { ConstructionSystem } from '@/engine/systems/economy/ConstructionSystem';
import { TrainingSystem } from '@/engine/systems/economy/TrainingSystem';
import { ResourceSystem } from '@/engine/systems/economy/ResourceSystem';
import { ResearchSystem } from '@/engine/systems/economy/ResearchSystem';
import { AIController } from '@/engine/systems/ai/AIController';
import { reconcileBackgroundTime } from '@/engine/systems/time/BackgroundTime';
import { isCooldownDue } from '@/engine/utils/Cooldown';

type EngineStep = (state: WorldState, dt: number, ctx: SimulationContext) => StateChange[];

const ENGINE_STEPS: readonly [Exclude<SubsystemKey, 'ai'>, EngineStep][] = [
  ['movement', (s, dt, ctx) => [
    ...MovementSystem.update(s, dt, ctx),
    ...ReinforcementSystem.update(s, dt, ctx),
    ...updateEntrenchments(s, ctx),
  ]],
  ['combat', (s, _dt, ctx) => CombatSystem.update(s, ctx)],
  ['vision', (s, _dt, ctx) => VisionSystem.update(s, ctx)],
  ['building', (s, _dt, ctx) => ConstructionSystem.update(s, ctx)],
  ['training', (s, _dt, ctx) => TrainingSystem.update(s, ctx)],
  ['resource', (s, dt, ctx) => ResourceSystem.update(s, dt, ctx)],
  ['research', (s, _dt, ctx) => ResearchSystem.update(s, ctx)],
];

export class Simulation {
  readonly store: SimulationStore;

  constructor(initial: WorldState, readonly ctx: SimulationContext) {
    this.store = new SimulationStore(initial, ctx);
  }

  get state(): WorldState {
    return this.store.getState();
  }

  /** A player's command, validated and applied immediately. */
  submit(command: Command): { result: CommandResult; changes: StateChange[] } {
    return this.store.execute(command);
  }

  /** Advances the clock to `now`, running every subsystem that is due. */
  tick(now: number): StateChange[] {
    if (now < this.state.currentTime) {
      this.ctx.logger.warn(`tick(${now}) is behind the clock (${this.state.currentTime}); ignored`);
      return [];
    }

    const changes = this.store.apply(draft => Simulation.runEngine(draft, now, this.ctx), 'tick');
    changes.push(...this.runAI(now));
    return changes;
  }

  /** Credits time spent away since `savedAt`, measured against the context clock. */
  catchUp(savedAt: number): StateChange[] {
    const now = this.ctx.clock();
    return this.store.apply(draft => reconcileBackgroundTime(draft, savedAt, now, this.ctx), 'catch-up');
  }

  static runEngine(draft: WorldState, now: number, ctx: SimulationContext): StateChange[] {
    const previous = draft.currentTime;
    draft.currentTime = now;
    const changes: StateChange[] = [];
    for (const [key, step] of ENGINE_STEPS) {
      const last = draft.subsystemLastRun[key] ?? null;
      if (!isCooldownDue(last, now, ctx.config.intervals[key])) continue;
      const dt = now - (last ?? previous);
      draft.subsystemLastRun[key] = now;
      changes.push(...step(draft, dt, ctx));
    }
    return changes;
  }

  private runAI(now: number): StateChange[] {
    const last = this.state.subsystemLastRun.ai ?? null;
    if (!isCooldownDue(last, now, this.ctx.config.intervals.ai)) return [];

    const changes = this.store.apply(draft => {
      draft.subsystemLastRun.ai = now;
      return [];
    }, 'ai');

    for (const playerId of Object.keys(this.state.aiPlayers)) {
      const decision = AIController.decide(this.state, playerId, now, this.ctx);
      if (!decision) continue;
      changes.push(...this.store.apply(draft => AIController.commit(draft, decision.memory), 'ai'));
      for (const command of decision.commands) {
        const { result, changes: applied } = this.store.execute(command);
        if (!result.succeeded) {
          this.ctx.logger.log(`AI ${playerId} ${command.type} rejected: ${result.failureReason}`, 'ai');
          continue;
        }
        changes.push(...applied);
      }
    }
    return changes;
  }
}
