// ─────────────────────────────────────────────
//  Threat Assessment
//  Read-only strength and threat queries the AI
//  planners make against a committed snapshot.
// ─────────────────────────────────────────────

import type { WorldState } from '@/engine/state/WorldState';
import type { HexCoord } from '@/engine/data/types/Hex';
import type { ArmyState } from '@/engine/data/types/Army';
import type { BuildingState } from '@/engine/data/types/Building';
import type { Composition, UnitCategory } from '@/engine/data/types/Unit';
import type { EnemyAnalysis } from '@/engine/data/types/AI';
import type { SimulationContext } from '@/engine/simulation/SimulationContext';
import { WorldStateQuery } from '@/engine/state/WorldState';
import { compositionEntries, compositionTotal } from '@/engine/data/types/Unit';
import { DamageCalc } from '@/engine/systems/combat/DamageCalc';
import { VisionSystem } from '@/engine/systems/vision/VisionSystem';
import { HexMath } from '@/engine/utils/HexMath';
import { MathUtils } from '@/engine/utils/MathUtils';

export type CategoryCounts = Record<UnitCategory, number>;

function emptyCounts(): CategoryCounts {
  return { infantry: 0, ranged: 0, cavalry: 0, siege: 0 };
}

export const ThreatAssessment = {
  enemyArmiesNear(state: WorldState, playerId: string, c: HexCoord, range: number): ArmyState[] {
    return WorldStateQuery.enemyArmiesOf(state, playerId).filter(a => HexMath.distance(a.coord, c) <= range);
  },

  nearestEnemyArmy(state: WorldState, playerId: string, c: HexCoord): ArmyState | undefined {
    let best: ArmyState | undefined;
    let bestDist = Number.POSITIVE_INFINITY;
    for (const a of WorldStateQuery.enemyArmiesOf(state, playerId)) {
      const d = HexMath.distance(a.coord, c);
      if (d < bestDist) {
        best = a;
        bestDist = d;
      }
    }
    return best;
  },

  /** Σ enemy units / max(1, distance) over enemy armies within the threat radius. */
  threatLevel(state: WorldState, playerId: string, c: HexCoord, ctx: SimulationContext): number {
    let threat = 0;
    for (const enemy of ThreatAssessment.enemyArmiesNear(state, playerId, c, ctx.config.ai.threatRadius)) {
      threat += compositionTotal(enemy.composition) / Math.max(1, HexMath.distance(c, enemy.coord));
    }
    return threat;
  },

  armyStrength(army: ArmyState, ctx: SimulationContext): number {
    return DamageCalc.weightedStrength(army.composition, ctx);
  },

  /** Weighted strength of every army and garrison the player owns. */
  militaryStrength(state: WorldState, playerId: string, ctx: SimulationContext): number {
    let strength = 0;
    for (const a of WorldStateQuery.armiesOf(state, playerId)) strength += DamageCalc.weightedStrength(a.composition, ctx);
    for (const b of WorldStateQuery.buildingsOf(state, playerId)) strength += DamageCalc.weightedStrength(b.garrison, ctx);
    return strength;
  },

  categoryCounts(comp: Composition, ctx: SimulationContext, into: CategoryCounts = emptyCounts()): CategoryCounts {
    for (const [type, count] of compositionEntries(comp)) into[ctx.catalog.units[type].category] += count;
    return into;
  },

  visibleEnemyBuildings(state: WorldState, playerId: string): BuildingState[] {
    return Object.values(state.buildings).filter(b =>
      b.state !== 'destroyed'
      && WorldStateQuery.isHostile(state, playerId, b.ownerId)
      && b.occupied.some(o => VisionSystem.visibility(state, playerId, o) === 'visible'));
  },

  /** Category shares of the enemy forces the player can see; null when none are seen. */
  analyzeEnemies(state: WorldState, playerId: string, ctx: SimulationContext): EnemyAnalysis | null {
    const counts = emptyCounts();
    let weighted = 0;
    for (const a of WorldStateQuery.enemyArmiesOf(state, playerId)) {
      if (VisionSystem.visibility(state, playerId, a.coord) !== 'visible') continue;
      ThreatAssessment.categoryCounts(a.composition, ctx, counts);
      weighted += DamageCalc.weightedStrength(a.composition, ctx);
    }
    for (const b of ThreatAssessment.visibleEnemyBuildings(state, playerId)) {
      ThreatAssessment.categoryCounts(b.garrison, ctx, counts);
      weighted += DamageCalc.weightedStrength(b.garrison, ctx);
    }
    const total = counts.infantry + counts.ranged + counts.cavalry + counts.siege;
    if (total === 0) return null;
    return {
      cavalry: counts.cavalry / total,
      ranged: counts.ranged / total,
      infantry: counts.infantry / total,
      siege: counts.siege / total,
      totalUnits: total,
      weightedStrength: weighted,
    };
  },

  /** Attack-strength multiplier from how our mix counters theirs, 0.5..1.5. */
  compositionModifier(state: WorldState, playerId: string, enemy: EnemyAnalysis | null, ctx: SimulationContext): number {
    if (!enemy) return 1;
    const ours = emptyCounts();
    for (const a of WorldStateQuery.armiesOf(state, playerId)) ThreatAssessment.categoryCounts(a.composition, ctx, ours);
    const total = ours.infantry + ours.ranged + ours.cavalry + ours.siege;
    if (total === 0) return 1;
    const infantry = ours.infantry / total;
    const ranged = ours.ranged / total;
    const cavalry = ours.cavalry / total;

    let modifier = 1;
    if (enemy.cavalry > 0.35 && infantry > 0.3) modifier += 0.2;
    if (enemy.ranged > 0.35 && cavalry > 0.3) modifier += 0.2;
    if (enemy.infantry > 0.4 && ranged > 0.3) modifier += 0.15;
    if (cavalry > 0.35 && enemy.infantry > 0.3) modifier -= 0.2;
    if (ranged > 0.35 && enemy.cavalry > 0.3) modifier -= 0.2;
    return MathUtils.clamp(modifier, 0.5, 1.5);
  },

  /** Enemy strength close by exceeds ours by the configured ratio. */
  isLocallyOutnumbered(state: WorldState, army: ArmyState, ctx: SimulationContext): boolean {
    const cfg = ctx.config.ai;
    let enemy = 0;
    for (const e of ThreatAssessment.enemyArmiesNear(state, army.ownerId, army.coord, cfg.outnumberedRadius)) {
      enemy += DamageCalc.weightedStrength(e.composition, ctx);
    }
    return enemy > DamageCalc.weightedStrength(army.composition, ctx) * cfg.outnumberedRatio;
  },
};
