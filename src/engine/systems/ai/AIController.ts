// ─────────────────────────────────────────────
//  AI Controller — behaviour state machine
//  Plans from a committed snapshot and returns
//  ordinary commands plus its updated memory;
//  the caller runs both through the store.
// ─────────────────────────────────────────────

import type { WorldState } from '@/engine/state/WorldState';
import type { Command } from '@/engine/state/commands/Command';
import type { StateChange } from '@/engine/data/types/StateChange';
import type { AIBehaviorState, AIPlayerState } from '@/engine/data/types/AI';
import type { SimulationContext } from '@/engine/simulation/SimulationContext';
import type { PlanningContext } from './PlanningContext';
import { WorldStateQuery } from '@/engine/state/WorldState';
import { ResourceLedger } from '@/engine/systems/economy/ResourceLedger';
import { isCooldownDue } from '@/engine/utils/Cooldown';
import { ThreatAssessment } from './ThreatAssessment';
import { EconomyPlanner } from './EconomyPlanner';
import { MilitaryPlanner } from './MilitaryPlanner';
import { DefensePlanner } from './DefensePlanner';
import { ResearchPlanner } from './ResearchPlanner';

export interface AIDecision {
  commands: Command[];
  /** Updated AI record to commit before the commands run */
  memory: AIPlayerState;
}

type Planner = (p: PlanningContext) => Command[];

const PLANNERS: Record<AIBehaviorState, readonly Planner[]> = {
  peace: [EconomyPlanner.plan, EconomyPlanner.expand, ResearchPlanner.plan, DefensePlanner.buildDefenses],
  alert: [
    EconomyPlanner.plan, MilitaryPlanner.train, MilitaryPlanner.deploy, ResearchPlanner.plan,
    DefensePlanner.buildDefenses, DefensePlanner.garrison, DefensePlanner.entrench,
  ],
  defense: [
    MilitaryPlanner.intercept, MilitaryPlanner.train, MilitaryPlanner.deploy, ResearchPlanner.plan,
    DefensePlanner.buildDefenses, DefensePlanner.garrison, DefensePlanner.entrench,
  ],
  attack: [MilitaryPlanner.attack, EconomyPlanner.plan, ResearchPlanner.plan, DefensePlanner.garrison],
  retreat: [MilitaryPlanner.retreat],
};

export const AIController = {
  /** Strong enough overall, and against the nearest enemy army, to go on the offensive. */
  canAttack(p: PlanningContext, strength: number): boolean {
    const cfg = p.ctx.config.ai;
    const base = p.base;
    if (!base || strength < cfg.minAttackStrength) return false;
    const enemy = ThreatAssessment.nearestEnemyArmy(p.state, p.playerId, base.anchor);
    if (!enemy) return ThreatAssessment.visibleEnemyBuildings(p.state, p.playerId).length > 0;
    const modifier = ThreatAssessment.compositionModifier(p.state, p.playerId, p.memory.enemyAnalysis, p.ctx);
    const ratio = strength * modifier / Math.max(1, ThreatAssessment.armyStrength(enemy, p.ctx));
    return ratio >= p.profile.attackThreshold;
  },

  armyNeedsRetreat(p: PlanningContext): boolean {
    const base = p.base;
    if (!base) return true;
    return WorldStateQuery.armiesOf(p.state, p.playerId).some(a => MilitaryPlanner.shouldRetreat(p, a, base));
  },

  /** Next behaviour state; also maintains the defence counter and attack target. */
  nextState(p: PlanningContext): AIBehaviorState {
    const base = p.base;
    if (!base) return 'retreat';
    const cfg = p.ctx.config.ai;
    const memory = p.memory;
    const threat = ThreatAssessment.threatLevel(p.state, p.playerId, base.anchor, p.ctx);
    const strength = ThreatAssessment.militaryStrength(p.state, p.playerId, p.ctx);
    const enemiesNear = ThreatAssessment.enemyArmiesNear(p.state, p.playerId, base.anchor, cfg.nearbyEnemyRadius).length > 0;

    switch (memory.state) {
      case 'peace':
        if (enemiesNear) return 'defense';
        if (threat > p.profile.alertThreshold) return 'alert';
        if (AIController.canAttack(p, strength)) return 'attack';
        return 'peace';

      case 'alert':
        if (enemiesNear) return 'defense';
        if (threat < p.profile.alertThreshold / 2) return 'peace';
        if (AIController.canAttack(p, strength)) return 'attack';
        return 'alert';

      case 'defense':
        if (!enemiesNear) {
          memory.consecutiveDefenses += 1;
          if (memory.consecutiveDefenses > cfg.maxConsecutiveDefenses) {
            memory.consecutiveDefenses = 0;
            return 'attack';
          }
          return 'alert';
        }
        if (strength < cfg.defenseRetreatStrength || AIController.armyNeedsRetreat(p)) return 'retreat';
        return 'defense';

      case 'attack':
        if (enemiesNear) return 'defense';
        if (strength < cfg.attackAbortStrength) {
          memory.attackTarget = null;
          return 'peace';
        }
        if (AIController.armyNeedsRetreat(p)) return 'retreat';
        return 'attack';

      case 'retreat':
        if (!enemiesNear && strength > cfg.retreatRecoverStrength) return 'alert';
        return 'retreat';
    }
  },

  /** Records the strongest each army has been; forgets armies that are gone. */
  trackPeaks(p: PlanningContext): void {
    const peaks: Record<string, number> = {};
    for (const army of WorldStateQuery.armiesOf(p.state, p.playerId)) {
      const strength = ThreatAssessment.armyStrength(army, p.ctx);
      peaks[army.id] = Math.max(strength, p.memory.peakStrength[army.id] ?? 0);
    }
    p.memory.peakStrength = peaks;
  },

  /** One decision for an AI player, or null when it is not due. */
  decide(state: WorldState, playerId: string, now: number, ctx: SimulationContext): AIDecision | null {
    const current = state.aiPlayers[playerId];
    const player = state.players[playerId];
    if (!current || !player) return null;
    const profile = ctx.config.ai.difficulty[current.difficulty];
    if (!isCooldownDue(current.lastDecisionAt, now, profile.decisionInterval)) return null;

    const memory = structuredClone(current);
    const p: PlanningContext = {
      state,
      playerId,
      player,
      now,
      ctx,
      profile,
      memory,
      previousRuns: current.lastRun,
      base: WorldStateQuery.cityCenter(state, playerId),
      budget: ResourceLedger.snapshot(player.resources),
      assigned: new Set(),
      reserved: new Set(),
    };

    AIController.trackPeaks(p);
    MilitaryPlanner.updateAnalysis(p);
    const next = AIController.nextState(p);
    if (next !== memory.state) {
      ctx.logger.log(`AI ${playerId}: ${memory.state} → ${next}`, 'ai');
      memory.state = next;
    }

    const commands: Command[] = [];
    for (const planner of PLANNERS[next]) commands.push(...planner(p));
    memory.lastDecisionAt = now;
    return { commands, memory };
  },

  /** Writes a decision's memory into the draft. */
  commit(draft: WorldState, memory: AIPlayerState): StateChange[] {
    const previous = draft.aiPlayers[memory.playerId];
    draft.aiPlayers[memory.playerId] = memory;
    if (!previous || previous.state === memory.state) return [];
    return [{ type: 'aiStateChanged', playerId: memory.playerId, from: previous.state, to: memory.state }];
  },
};
