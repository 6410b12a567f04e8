// ─────────────────────────────────────────────
//  AI Player Types
// ─────────────────────────────────────────────

import type { ResearchCategory } from './Research';
import type { CombatantRef } from './Combat';

export type AIBehaviorState = 'peace' | 'alert' | 'defense' | 'attack' | 'retreat';

export type AIDifficulty = 'easy' | 'medium' | 'hard';

export interface AIDifficultyProfile {
  decisionInterval: number;
  attackThreshold: number;
  alertThreshold: number;
  retreatHealthRatio: number;
  coordinatesArmies: boolean;
}

/** Research preference while in one behaviour state */
export interface ResearchPriority {
  favours: ResearchCategory;
  categoryBonus: number;
  /** Applied to research outside the favoured category */
  otherBonus: number;
  /** Extra score per research line, favoured category only */
  lines: Record<string, number>;
}

export type PlannerKey =
  | 'economicBuild'
  | 'militaryTrain'
  | 'scout'
  | 'campBuild'
  | 'defenseBuild'
  | 'garrisonCheck'
  | 'researchCheck'
  | 'enemyAnalysis'
  | 'entrenchCheck';

/** Shares of the visible enemy force by unit category, 0..1 */
export interface EnemyAnalysis {
  cavalry: number;
  ranged: number;
  infantry: number;
  siege: number;
  totalUnits: number;
  weightedStrength: number;
}

export interface AIPlayerState {
  playerId: string;
  difficulty: AIDifficulty;
  state: AIBehaviorState;
  lastDecisionAt: number | null;
  lastRun: Partial<Record<PlannerKey, number>>;
  consecutiveDefenses: number;
  /** Kept across decisions until destroyed or the attack is called off */
  attackTarget: CombatantRef | null;
  enemyAnalysis: EnemyAnalysis | null;
  /** Highest weighted strength seen per own army, for the retreat-health check */
  peakStrength: Record<string, number>;
}

export function createAIPlayerState(playerId: string, difficulty: AIDifficulty = 'medium'): AIPlayerState {
  return {
    playerId,
    difficulty,
    state: 'peace',
    lastDecisionAt: null,
    lastRun: {},
    consecutiveDefenses: 0,
    attackTarget: null,
    enemyAnalysis: null,
    peakStrength: {},
  };
}
