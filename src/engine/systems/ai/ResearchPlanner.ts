// ─────────────────────────────────────────────
//  Research Planner
//  Lower tiers first, tilted toward what the
//  current behaviour state needs.
// ─────────────────────────────────────────────

import type { Command } from '@/engine/state/commands/Command';
import type { ResearchData } from '@/engine/data/types/Research';
import type { AIBehaviorState } from '@/engine/data/types/AI';
import type { SimulationContext } from '@/engine/simulation/SimulationContext';
import type { PlanningContext } from './PlanningContext';
import { StartResearchCommand } from '@/engine/state/commands/StartResearchCommand';
import { ResearchSystem } from '@/engine/systems/economy/ResearchSystem';
import { ResourceLedger } from '@/engine/systems/economy/ResourceLedger';
import { Planning } from './PlanningContext';

export const ResearchPlanner = {
  score(research: ResearchData, state: AIBehaviorState, ctx: SimulationContext): number {
    const priority = ctx.catalog.aiResearch[state];
    let score = (4 - research.tier) * 10;
    if (research.category === priority.favours) {
      score += priority.categoryBonus + (priority.lines[research.line] ?? 0);
    } else {
      score += priority.otherBonus;
    }
    return score;
  },

  /** Highest scoring research the player can start and pay for now. */
  select(p: PlanningContext): ResearchData | null {
    const candidates = ResearchSystem.available(p.state, p.playerId, p.ctx)
      .filter(r => ResourceLedger.canAfford(p.budget, r.cost));
    let best: ResearchData | null = null;
    let bestScore = Number.NEGATIVE_INFINITY;
    for (const r of candidates) {
      const score = ResearchPlanner.score(r, p.memory.state, p.ctx);
      if (score > bestScore) {
        best = r;
        bestScore = score;
      }
    }
    return best;
  },

  plan(p: PlanningContext): Command[] {
    if (!Planning.claim(p, 'researchCheck')) return [];
    if (p.player.activeResearch) return [];
    const research = ResearchPlanner.select(p);
    if (!research || !Planning.spend(p, research.cost)) return [];
    p.ctx.logger.log(`AI ${p.playerId} starts research ${research.name}`, 'ai');
    return [new StartResearchCommand(p.playerId, p.now, research.id)];
  },
};
