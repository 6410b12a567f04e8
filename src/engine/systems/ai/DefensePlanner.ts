// ─────────────────────────────────────────────
//  Defense Planner — towers and forts, manning
//  them with ranged armies, digging in near home
// ─────────────────────────────────────────────

import type { Command } from '@/engine/state/commands/Command';
import type { ArmyState } from '@/engine/data/types/Army';
import type { BuildingType } from '@/engine/data/types/Building';
import type { PlanningContext } from './PlanningContext';
import { WorldStateQuery } from '@/engine/state/WorldState';
import { isOperational } from '@/engine/data/types/Building';
import { compositionEntries, compositionTotal } from '@/engine/data/types/Unit';
import { MoveCommand } from '@/engine/state/commands/MoveCommand';
import { EntrenchCommand } from '@/engine/state/commands/EntrenchCommand';
import { canGarrisonInto } from '@/engine/systems/military/ArmySystem';
import { createPathGrid, Pathfinding } from '@/engine/systems/movement/Pathfinding';
import { HexMath } from '@/engine/utils/HexMath';
import { ThreatAssessment } from './ThreatAssessment';
import { Planning } from './PlanningContext';

const MANNED_TYPES: readonly BuildingType[] = ['tower', 'castle', 'woodenFort'];

export const DefensePlanner = {
  /** Whether this decision should put up a defensive structure at all. */
  wantsDefenses(p: PlanningContext, threat: number): boolean {
    const cfg = p.ctx.config.ai;
    if (p.memory.state === 'peace') {
      return p.player.resources.wood > cfg.peaceDefenseWood && p.player.resources.stone > cfg.peaceDefenseStone;
    }
    return threat >= cfg.minThreatForDefenseBuilding || p.memory.state === 'defense';
  },

  /** Towers up to the cap, then forts while alert or defending. */
  buildDefenses(p: PlanningContext): Command[] {
    const base = p.base;
    if (!base || !Planning.isDue(p, 'defenseBuild')) return [];
    const cfg = p.ctx.config.ai;
    const threat = ThreatAssessment.threatLevel(p.state, p.playerId, base.anchor, p.ctx);
    if (!DefensePlanner.wantsDefenses(p, threat)) return [];

    const plan: { type: BuildingType; maxRadius: number }[] = [];
    if (WorldStateQuery.countBuildings(p.state, p.playerId, 'tower') < cfg.maxTowers) {
      plan.push({ type: 'tower', maxRadius: 4 });
    }
    if (WorldStateQuery.countBuildings(p.state, p.playerId, 'woodenFort') < cfg.maxForts
      && (p.memory.state === 'defense' || p.memory.state === 'alert')) {
      plan.push({ type: 'woodenFort', maxRadius: 5 });
    }

    for (const { type, maxRadius } of plan) {
      const site = Planning.findBuildSite(p, type, base.anchor, 2, maxRadius);
      if (!site) continue;
      const command = Planning.build(p, type, site);
      if (!command) continue;
      Planning.markRun(p, 'defenseBuild');
      return [command];
    }
    return [];
  },

  /** Armies carrying units that fire from a garrison. */
  canMan(army: ArmyState, p: PlanningContext): boolean {
    return compositionEntries(army.composition).some(([type]) => p.ctx.catalog.units[type].garrisonDamage !== undefined);
  },

  /** Sends idle ranged armies into empty towers, castles and forts nearby. */
  garrison(p: PlanningContext): Command[] {
    if (!Planning.claim(p, 'garrisonCheck')) return [];
    const radius = p.ctx.config.ai.garrisonSearchRadius;
    const empty = WorldStateQuery.buildingsOf(p.state, p.playerId).filter(b =>
      MANNED_TYPES.includes(b.type) && isOperational(b) && compositionTotal(b.garrison) === 0);
    if (empty.length === 0) return [];

    const commands: Command[] = [];
    const manned = new Set<string>();
    for (const army of Planning.idleArmies(p)) {
      if (!DefensePlanner.canMan(army, p)) continue;
      const building = empty.find(b =>
        !manned.has(b.id)
        && HexMath.distance(army.coord, b.anchor) <= radius
        && canGarrisonInto(p.state, army, b, p.ctx));
      if (!building) continue;

      const grid = createPathGrid(p.state, p.playerId, p.ctx, { ignoreCapacityAt: [army.coord] });
      const path = Pathfinding.findPathAdjacent(army.coord, building.occupied, grid);
      if (!path) continue;
      const destination = path[path.length - 1] ?? army.coord;
      manned.add(building.id);
      p.assigned.add(army.id);
      commands.push(new MoveCommand(p.playerId, p.now, { kind: 'army', id: army.id }, destination, false, building.id));
    }
    return commands;
  },

  /** Digs in one idle army close to home while the city is threatened. */
  entrench(p: PlanningContext): Command[] {
    const base = p.base;
    if (!base || !Planning.claim(p, 'entrenchCheck')) return [];
    const cfg = p.ctx.config.ai;
    if (ThreatAssessment.threatLevel(p.state, p.playerId, base.anchor, p.ctx) <= 0) return [];
    if (p.budget.wood < cfg.entrenchMinWood) return [];

    const dug = WorldStateQuery.armiesOf(p.state, p.playerId).filter(a => a.entrenchment !== 'none').length;
    if (dug >= cfg.maxEntrenchedArmies) return [];

    const army = Planning.idleArmies(p).find(a => HexMath.distance(a.coord, base.anchor) <= cfg.entrenchRadius);
    if (!army || !Planning.spend(p, { wood: p.ctx.config.entrenchment.woodCost })) return [];
    p.assigned.add(army.id);
    return [new EntrenchCommand(p.playerId, p.now, army.id)];
  },
};
