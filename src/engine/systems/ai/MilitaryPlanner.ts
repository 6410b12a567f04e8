// ─────────────────────────────────────────────
//  Military Planner — counter-training, deploying,
//  interception, attack targeting and retreat
// ─────────────────────────────────────────────

import type { Command } from '@/engine/state/commands/Command';
import type { ArmyState } from '@/engine/data/types/Army';
import type { BuildingState, BuildingType } from '@/engine/data/types/Building';
import type { CombatantRef } from '@/engine/data/types/Combat';
import type { HexCoord } from '@/engine/data/types/Hex';
import type { MilitaryUnitType } from '@/engine/data/types/Unit';
import type { EnemyAnalysis } from '@/engine/data/types/AI';
import type { PlanningContext } from './PlanningContext';
import { WorldStateQuery } from '@/engine/state/WorldState';
import { isOperational } from '@/engine/data/types/Building';
import { compositionTotal } from '@/engine/data/types/Unit';
import { TrainCommand } from '@/engine/state/commands/TrainCommand';
import { DeployCommand } from '@/engine/state/commands/DeployCommand';
import { AttackCommand } from '@/engine/state/commands/AttackCommand';
import { MoveCommand } from '@/engine/state/commands/MoveCommand';
import { TrainingSystem } from '@/engine/systems/economy/TrainingSystem';
import { MovementSystem } from '@/engine/systems/movement/MovementSystem';
import { canGarrisonInto, deploymentTile } from '@/engine/systems/military/ArmySystem';
import { createPathGrid, Pathfinding } from '@/engine/systems/movement/Pathfinding';
import { VisionSystem } from '@/engine/systems/vision/VisionSystem';
import { HexMath } from '@/engine/utils/HexMath';
import { ThreatAssessment } from './ThreatAssessment';
import { Planning } from './PlanningContext';

type TrainingBuilding = 'barracks' | 'archeryRange' | 'stable' | 'siegeWorkshop';

const TRAINING_BUILDINGS: readonly TrainingBuilding[] = ['barracks', 'archeryRange', 'stable', 'siegeWorkshop'];

function isTrainingBuilding(type: BuildingType): type is TrainingBuilding {
  return TRAINING_BUILDINGS.some(t => t === type);
}

export interface ScoredTarget {
  ref: CombatantRef;
  coord: HexCoord;
  score: number;
}

export const MilitaryPlanner = {
  /** Refreshes the cached enemy composition on its own cadence. */
  updateAnalysis(p: PlanningContext): void {
    if (!Planning.claim(p, 'enemyAnalysis')) return;
    p.memory.enemyAnalysis = ThreatAssessment.analyzeEnemies(p.state, p.playerId, p.ctx);
  },

  /** The unit a building should train to counter what the enemy fields. */
  counterUnit(type: TrainingBuilding, enemy: EnemyAnalysis | null): MilitaryUnitType {
    switch (type) {
      case 'barracks':
        return enemy && enemy.cavalry > 0.35 ? 'pikeman' : 'swordsman';
      case 'archeryRange':
        return enemy && enemy.infantry > 0.4 ? 'crossbow' : 'archer';
      case 'stable':
        return enemy && enemy.ranged > 0.4 ? 'knight' : 'scout';
      case 'siegeWorkshop':
        return 'mangonel';
    }
  },

  train(p: PlanningContext): Command[] {
    if (!Planning.claim(p, 'militaryTrain')) return [];
    const commands: Command[] = [];
    for (const b of WorldStateQuery.buildingsOf(p.state, p.playerId)) {
      if (!isTrainingBuilding(b.type) || !isOperational(b) || b.trainingQueue.length > 0) continue;
      const unit = MilitaryPlanner.counterUnit(b.type, p.memory.enemyAnalysis);
      if (TrainingSystem.blocker(p.state, b, unit, 1, p.ctx) !== null) continue;
      if (!Planning.spend(p, p.ctx.catalog.units[unit].cost)) continue;
      commands.push(new TrainCommand(p.playerId, p.now, b.id, unit, 1));
    }
    return commands;
  },

  /** Empties the first training building holding a full squad. */
  deploy(p: PlanningContext): Command[] {
    const threshold = p.ctx.config.ai.armyDeployThreshold;
    const source = WorldStateQuery.buildingsOf(p.state, p.playerId).find(b =>
      isTrainingBuilding(b.type)
      && isOperational(b)
      && compositionTotal(b.garrison) >= threshold
      && deploymentTile(p.state, b, p.ctx) !== null);
    if (!source) return [];
    return [new DeployCommand(p.playerId, p.now, source.id, { ...source.garrison })];
  },

  /** Idle armies engage the nearest enemy close to the city centre. */
  intercept(p: PlanningContext): Command[] {
    const base = p.base;
    if (!base) return [];
    const enemies = ThreatAssessment.enemyArmiesNear(p.state, p.playerId, base.anchor, p.ctx.config.ai.nearbyEnemyRadius);
    if (enemies.length === 0) return [];

    const commands: Command[] = [];
    for (const army of Planning.idleArmies(p)) {
      const target = nearest(enemies, army.coord);
      if (!target) break;
      p.assigned.add(army.id);
      commands.push(new AttackCommand(p.playerId, p.now, army.id, { kind: 'army', id: target.id }));
    }
    return commands;
  },

  scoreArmy(army: ArmyState, from: HexCoord): number {
    const units = compositionTotal(army.composition);
    const distance = Math.max(1, HexMath.distance(army.coord, from));
    let score = 50 - units + 20 / distance;
    if (units < 10) score += 15;
    return score;
  },

  scoreBuilding(p: PlanningContext, building: BuildingState, from: HexCoord): number {
    const distance = Math.max(1, HexMath.distance(building.anchor, from));
    return p.ctx.catalog.buildings[building.type].targetValue - 2 * compositionTotal(building.garrison) + 15 / distance;
  },

  /** Best visible enemy army or building, scored from the city centre. */
  chooseTarget(p: PlanningContext, from: HexCoord): ScoredTarget | null {
    const options: ScoredTarget[] = [];
    for (const a of WorldStateQuery.enemyArmiesOf(p.state, p.playerId)) {
      if (VisionSystem.visibility(p.state, p.playerId, a.coord) !== 'visible') continue;
      options.push({ ref: { kind: 'army', id: a.id }, coord: a.coord, score: MilitaryPlanner.scoreArmy(a, from) });
    }
    for (const b of ThreatAssessment.visibleEnemyBuildings(p.state, p.playerId)) {
      options.push({ ref: { kind: 'building', id: b.id }, coord: b.anchor, score: MilitaryPlanner.scoreBuilding(p, b, from) });
    }
    options.sort((a, b) => b.score - a.score);
    return options[0] ?? null;
  },

  /** The remembered target while it still stands, else a fresh pick. */
  currentTarget(p: PlanningContext, from: HexCoord): { ref: CombatantRef; coord: HexCoord } | null {
    const kept = p.memory.attackTarget;
    if (kept) {
      const tiles = MovementSystem.targetTiles(p.state, kept);
      const owner = WorldStateQuery.ownerOf(p.state, kept);
      const first = tiles[0];
      if (first && owner !== null && WorldStateQuery.isHostile(p.state, p.playerId, owner)) return { ref: kept, coord: first };
    }
    const picked = MilitaryPlanner.chooseTarget(p, from);
    p.memory.attackTarget = picked ? picked.ref : null;
    return picked;
  },

  attack(p: PlanningContext): Command[] {
    const base = p.base;
    if (!base) return [];
    const target = MilitaryPlanner.currentTarget(p, base.anchor);
    if (!target) return [];
    const armies = Planning.idleArmies(p);
    if (armies.length === 0) return [];

    const commands: Command[] = [];
    const leader = p.profile.coordinatesArmies ? nearest(armies, target.coord) : undefined;
    for (const army of armies) {
      p.assigned.add(army.id);
      // stragglers join the leading army before the assault
      if (leader && army.id !== leader.id
        && HexMath.distance(army.coord, leader.coord) > p.ctx.config.ai.coordinationDistance) {
        commands.push(new MoveCommand(p.playerId, p.now, { kind: 'army', id: army.id }, leader.coord));
        continue;
      }
      commands.push(new AttackCommand(p.playerId, p.now, army.id, target.ref));
    }
    return commands;
  },

  /** Below its retreat-health share of the strongest it has been. */
  isWorn(p: PlanningContext, army: ArmyState): boolean {
    const peak = p.memory.peakStrength[army.id];
    if (peak === undefined || peak <= 0) return false;
    return ThreatAssessment.armyStrength(army, p.ctx) < peak * p.profile.retreatHealthRatio;
  },

  /** Far from home and outnumbered or worn down. */
  shouldRetreat(p: PlanningContext, army: ArmyState, base: BuildingState): boolean {
    if (army.inCombat) return false;
    if (HexMath.distance(army.coord, base.anchor) <= p.ctx.config.ai.retreatMinDistance) return false;
    return ThreatAssessment.isLocallyOutnumbered(p.state, army, p.ctx) || MilitaryPlanner.isWorn(p, army);
  },

  /** Pulls threatened or depleted armies back to the city centre. */
  retreat(p: PlanningContext): Command[] {
    const base = p.base;
    if (!base) return [];
    const cfg = p.ctx.config.ai;
    const commands: Command[] = [];
    for (const army of WorldStateQuery.armiesOf(p.state, p.playerId)) {
      if (p.assigned.has(army.id) || army.inCombat) continue;
      if (army.movement?.intent.kind === 'retreat' || army.movement?.intent.kind === 'garrison') continue;
      if (HexMath.distance(army.coord, base.anchor) <= cfg.retreatMinDistance) continue;
      const small = compositionTotal(army.composition) < cfg.retreatMinUnits;
      if (!small && p.memory.state !== 'retreat' && !MilitaryPlanner.shouldRetreat(p, army, base)) continue;

      const grid = createPathGrid(p.state, p.playerId, p.ctx, { ignoreCapacityAt: [army.coord] });
      const path = Pathfinding.findPathAdjacent(army.coord, base.occupied, grid);
      const destination = path ? path[path.length - 1] : undefined;
      if (!destination) continue;
      const garrison = canGarrisonInto(p.state, army, base, p.ctx) ? base.id : null;
      p.assigned.add(army.id);
      commands.push(new MoveCommand(p.playerId, p.now, { kind: 'army', id: army.id }, destination, true, garrison));
    }
    if (commands.length > 0) {
      p.memory.attackTarget = null;
      p.ctx.logger.log(`AI ${p.playerId} pulls ${commands.length} army(s) back to base`, 'ai');
    }
    return commands;
  },
};

function nearest<T extends { coord: HexCoord }>(items: readonly T[], to: HexCoord): T | undefined {
  let best: T | undefined;
  let bestDist = Number.POSITIVE_INFINITY;
  for (const item of items) {
    const d = HexMath.distance(item.coord, to);
    if (d < bestDist) {
      best = item;
      bestDist = d;
    }
  }
  return best;
}
