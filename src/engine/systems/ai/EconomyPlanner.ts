// ─────────────────────────────────────────────
//  Economy Planner — villagers, gathering,
//  farms, housing, camps and scouting
// ─────────────────────────────────────────────

import type { Command } from '@/engine/state/commands/Command';
import type { HexCoord } from '@/engine/data/types/Hex';
import type { ResourcePointState, ResourceType } from '@/engine/data/types/Resource';
import type { PlanningContext } from './PlanningContext';
import { WorldStateQuery } from '@/engine/state/WorldState';
import { isOperational } from '@/engine/data/types/Building';
import { TERRAIN } from '@/engine/data/types/Terrain';
import { TrainVillagersCommand } from '@/engine/state/commands/TrainVillagersCommand';
import { DeployVillagersCommand } from '@/engine/state/commands/DeployVillagersCommand';
import { GatherCommand } from '@/engine/state/commands/GatherCommand';
import { MoveCommand } from '@/engine/state/commands/MoveCommand';
import { TrainingSystem } from '@/engine/systems/economy/TrainingSystem';
import { ResourceSystem } from '@/engine/systems/economy/ResourceSystem';
import { VillagerSystem } from '@/engine/systems/economy/VillagerSystem';
import { BuildingStats } from '@/engine/systems/economy/BuildingStats';
import { ResearchSystem } from '@/engine/systems/economy/ResearchSystem';
import { VisionSystem } from '@/engine/systems/vision/VisionSystem';
import { HexMath } from '@/engine/utils/HexMath';
import { MathUtils } from '@/engine/utils/MathUtils';
import { Planning } from './PlanningContext';

export const EconomyPlanner = {
  /**
   * How badly the player needs more of a resource, 0..2.
   * Low balances, food, and wood for a small town push it up.
   */
  urgency(p: PlanningContext, type: ResourceType): number {
    const current = p.player.resources[type];
    let score = 1 - current / p.ctx.config.ai.resourceTarget;
    if (current < 100) score += 0.5;
    if (type === 'food') score *= 1.2;
    if (type === 'wood' && WorldStateQuery.buildingsOf(p.state, p.playerId).length < 10) score *= 1.15;
    if (p.player.collectionRates[type] < 0.1 && score > 0.2) score += 0.1;
    return MathUtils.clamp(score, 0, 2);
  },

  plan(p: PlanningContext): Command[] {
    if (!p.base) return [];
    return [
      ...EconomyPlanner.trainVillagers(p),
      ...EconomyPlanner.deployVillagers(p),
      ...EconomyPlanner.assignGatherers(p),
      ...EconomyPlanner.buildEconomy(p),
    ];
  },

  /** Camps next to uncovered resources, then scouting. */
  expand(p: PlanningContext): Command[] {
    if (!p.base) return [];
    return [...EconomyPlanner.buildCamps(p), ...EconomyPlanner.scout(p)];
  },

  villagerCount(p: PlanningContext): number {
    let total = 0;
    for (const g of WorldStateQuery.villagerGroupsOf(p.state, p.playerId)) total += g.count;
    for (const b of WorldStateQuery.buildingsOf(p.state, p.playerId)) {
      total += b.villagerGarrison;
      for (const e of b.villagerTrainingQueue) total += e.quantity;
    }
    return total;
  },

  trainVillagers(p: PlanningContext): Command[] {
    const base = p.base;
    if (!base || !isOperational(base) || base.villagerTrainingQueue.length > 0) return [];
    if (!Planning.claim(p, 'militaryTrain')) return [];
    if (EconomyPlanner.villagerCount(p) >= p.ctx.config.ai.maxVillagers) return [];
    if (TrainingSystem.villagerBlocker(p.state, base, 1, p.ctx) !== null) return [];
    if (!Planning.spend(p, p.ctx.config.training.villagerCost)) return [];
    return [new TrainVillagersCommand(p.playerId, p.now, base.id, 1)];
  },

  deployVillagers(p: PlanningContext): Command[] {
    const threshold = p.ctx.config.ai.villagerDeployThreshold;
    const source = WorldStateQuery.buildingsOf(p.state, p.playerId)
      .find(b => isOperational(b) && b.villagerGarrison >= threshold);
    if (!source) return [];
    return [new DeployVillagersCommand(p.playerId, p.now, source.id, source.villagerGarrison)];
  },

  /** Idle groups go to the most urgent explored resource near the city centre. */
  assignGatherers(p: PlanningContext): Command[] {
    const base = p.base;
    if (!base) return [];
    const cfg = p.ctx.config.ai;
    const candidates = Object.values(p.state.resourcePoints).filter(point =>
      point.remaining > 0
      && point.assignedGroupIds.length < cfg.maxGroupsPerResource
      && HexMath.distance(point.coord, base.anchor) <= cfg.gatherRadius
      && VisionSystem.visibility(p.state, p.playerId, point.coord) !== 'unexplored'
      && EconomyPlanner.urgency(p, p.ctx.catalog.resources[point.type].yields) >= cfg.minGatherUrgency);
    if (candidates.length === 0) return [];

    const commands: Command[] = [];
    const taken = new Set<string>();
    for (const group of Planning.idleVillagers(p)) {
      const ranked = candidates
        .filter(point => !taken.has(point.id) && ResourceSystem.hasCapacity(point, group.id, p.ctx))
        .map(point => ({
          point,
          urgency: EconomyPlanner.urgency(p, p.ctx.catalog.resources[point.type].yields),
          distance: HexMath.distance(group.coord, point.coord),
        }))
        .sort((a, b) => Math.abs(a.urgency - b.urgency) > 0.1 ? b.urgency - a.urgency : a.distance - b.distance);

      const pick = ranked.find(r => VillagerSystem.routeAdjacent(p.state, group, [r.point.coord], p.ctx) !== null);
      if (!pick) continue;
      taken.add(pick.point.id);
      p.assigned.add(group.id);
      commands.push(new GatherCommand(p.playerId, p.now, group.id, pick.point.id));
    }
    return commands;
  },

  /** Housing when population nears capacity, otherwise farms when food runs short. */
  buildEconomy(p: PlanningContext): Command[] {
    const base = p.base;
    if (!base || !Planning.isDue(p, 'economicBuild')) return [];
    const cfg = p.ctx.config.ai;
    const bonuses = ResearchSystem.bonuses(p.state, p.playerId, p.ctx);
    const pop = BuildingStats.population(p.state, p.playerId, bonuses, p.ctx);

    let type: 'neighborhood' | 'farm' | null = null;
    let radius = 0;
    if (pop.capacity > 0 && pop.current >= pop.capacity * cfg.neighborhoodPopulationRatio) {
      type = 'neighborhood';
      radius = cfg.neighborhoodSearchRadius;
    } else if (EconomyPlanner.urgency(p, 'food') > 0.5 || p.player.collectionRates.food < 2) {
      type = 'farm';
      radius = cfg.farmSearchRadius;
    }
    if (!type) return [];

    const site = Planning.findBuildSite(p, type, base.anchor, 1, radius);
    if (!site) return [];
    const command = Planning.build(p, type, site);
    if (!command) return [];
    Planning.markRun(p, 'economicBuild');
    return [command];
  },

  /** One lumber or mining camp beside the best-scoring uncovered resource. */
  buildCamps(p: PlanningContext): Command[] {
    const base = p.base;
    if (!base || !Planning.claim(p, 'campBuild')) return [];
    const cfg = p.ctx.config.ai;

    const scored: { point: ResourcePointState; camp: 'lumberCamp' | 'miningCamp'; score: number }[] = [];
    for (const point of Object.values(p.state.resourcePoints)) {
      const data = p.ctx.catalog.resources[point.type];
      const camp = data.campType;
      if (!camp || point.remaining <= 0) continue;
      const distance = HexMath.distance(point.coord, base.anchor);
      if (distance > cfg.campRadius) continue;
      if (VisionSystem.visibility(p.state, p.playerId, point.coord) === 'unexplored') continue;
      if (ResourceSystem.hasAdjacentCamp(p.state, point, p.playerId, p.ctx)) continue;
      if (WorldStateQuery.countBuildings(p.state, p.playerId, camp) >= cfg.maxCampsPerType) continue;
      const score = EconomyPlanner.urgency(p, data.yields) * point.remaining / (100 * Math.max(1, distance));
      scored.push({ point, camp, score });
    }
    scored.sort((a, b) => b.score - a.score);

    for (const { point, camp } of scored) {
      const site = HexMath.neighbors(point.coord).find(c => Planning.canPlace(p, camp, c));
      if (!site) continue;
      const command = Planning.build(p, camp, site);
      return command ? [command] : [];
    }
    return [];
  },

  nearestUnexplored(p: PlanningContext, from: HexCoord): HexCoord | null {
    for (let radius = 1; radius <= p.ctx.config.ai.scoutRange; radius++) {
      for (const c of HexMath.ring(from, radius)) {
        const tile = WorldStateQuery.tile(p.state, c);
        if (!tile || !TERRAIN[tile.terrain].walkable) continue;
        if (VisionSystem.visibility(p.state, p.playerId, c) === 'unexplored') return c;
      }
    }
    return null;
  },

  /** Sends an idle army (villagers in peace time) toward the nearest unexplored tile. */
  scout(p: PlanningContext): Command[] {
    const base = p.base;
    if (!base || !Planning.claim(p, 'scout')) return [];
    const target = EconomyPlanner.nearestUnexplored(p, base.anchor);
    if (!target) return [];

    const army = Planning.idleArmies(p)[0];
    if (army) {
      p.assigned.add(army.id);
      return [new MoveCommand(p.playerId, p.now, { kind: 'army', id: army.id }, target)];
    }
    if (p.memory.state !== 'peace') return [];
    const group = Planning.idleVillagers(p)[0];
    if (!group) return [];
    p.assigned.add(group.id);
    return [new MoveCommand(p.playerId, p.now, { kind: 'villagerGroup', id: group.id }, target)];
  },
};
