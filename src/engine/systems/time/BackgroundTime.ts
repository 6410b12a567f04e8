// ─────────────────────────────────────────────
//  Background Time — catch-up after time away
//  Credits income in one step, then lets timed
//  work finish by its timestamps. Armies do not
//  march while the world is away.
// ─────────────────────────────────────────────

import type { WorldState, SubsystemKey } from '@/engine/state/WorldState';
import type { StateChange } from '@/engine/data/types/StateChange';
import type { SimulationContext } from '@/engine/simulation/SimulationContext';
import { ResourceSystem } from '@/engine/systems/economy/ResourceSystem';
import { ConstructionSystem } from '@/engine/systems/economy/ConstructionSystem';
import { TrainingSystem } from '@/engine/systems/economy/TrainingSystem';
import { ResearchSystem } from '@/engine/systems/economy/ResearchSystem';

const CAUGHT_UP: readonly SubsystemKey[] = ['movement', 'building', 'training', 'resource', 'research'];

/** Seconds still owed for the window ending at `now`; zero once reconciled. */
export function backgroundElapsed(state: WorldState, savedAt: number, now: number, ctx: SimulationContext): number {
  const from = Math.max(savedAt, state.lastReconciledAt ?? savedAt);
  return Math.min(Math.max(0, now - from), ctx.config.background.maxOfflineSeconds);
}

/**
 * Applies the time between `savedAt` and `now` (wall-clock seconds) to the
 * world, capped at the configured offline limit. The simulation clock moves
 * forward by the credited amount.
 */
export function reconcileBackgroundTime(
  state: WorldState,
  savedAt: number,
  now: number,
  ctx: SimulationContext,
): StateChange[] {
  const elapsed = backgroundElapsed(state, savedAt, now, ctx);
  state.lastReconciledAt = Math.max(now, state.lastReconciledAt ?? now);
  if (elapsed <= 0) return [];

  ctx.logger.log(`Reconciling ${Math.round(elapsed)}s of background time`, 'system');
  const changes: StateChange[] = [];

  // income first, from the economy as it stood when the world was left
  changes.push(...ResourceSystem.update(state, elapsed, ctx));

  state.currentTime += elapsed;
  changes.push(
    ...ConstructionSystem.update(state, ctx),
    ...TrainingSystem.update(state, ctx),
    ...ResearchSystem.update(state, ctx),
  );
  ResourceSystem.recomputeRates(state, ctx);

  for (const key of CAUGHT_UP) state.subsystemLastRun[key] = state.currentTime;
  return changes;
}
