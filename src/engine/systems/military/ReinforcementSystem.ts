// ─────────────────────────────────────────────
//  Reinforcement System — garrison units marching
//  to join a field army. They turn back when the
//  target is lost and fight at reduced strength
//  when caught en route.
// ─────────────────────────────────────────────

import type { WorldState } from '@/engine/state/WorldState';
import type { ArmyState } from '@/engine/data/types/Army';
import type { BuildingState } from '@/engine/data/types/Building';
import type { Composition } from '@/engine/data/types/Unit';
import type { HexCoord } from '@/engine/data/types/Hex';
import type { PathGrid } from '@/engine/systems/movement/Pathfinding';
import type { PendingReinforcement } from '@/engine/data/types/Reinforcement';
import type { StateChange } from '@/engine/data/types/StateChange';
import type { SimulationContext } from '@/engine/simulation/SimulationContext';
import { allocateId, WorldStateQuery } from '@/engine/state/WorldState';
import { compositionEntries, compositionTotal } from '@/engine/data/types/Unit';
import { HexMath } from '@/engine/utils/HexMath';
import { ResearchSystem } from '@/engine/systems/economy/ResearchSystem';
import { DamageCalc } from '@/engine/systems/combat/DamageCalc';
import { CasualtySystem } from '@/engine/systems/combat/CasualtySystem';
import { MovementSystem } from '@/engine/systems/movement/MovementSystem';
import { createPathGrid, Pathfinding } from '@/engine/systems/movement/Pathfinding';
import { addUnits, createArmy, destroyArmy, takeUnits } from './ArmySystem';

function grid(state: WorldState, ownerId: string, ctx: SimulationContext): PathGrid {
  return createPathGrid(state, ownerId, ctx, { ignoreCapacity: true });
}

export const ReinforcementSystem = {
  speed(state: WorldState, r: Pick<PendingReinforcement, 'ownerId' | 'composition'>, ctx: SimulationContext): number {
    const bonuses = ResearchSystem.bonuses(state, r.ownerId, ctx);
    return MovementSystem.compositionSpeed(r.composition, ctx)
      * ctx.config.movement.reinforcementMultiplier
      * (1 + (bonuses.militaryMarchSpeed ?? 0));
  },

  /** Units already on their way to an army. */
  pendingFor(state: WorldState, armyId: string): PendingReinforcement[] {
    return Object.values(state.reinforcements).filter(r => r.targetArmyId === armyId && r.status === 'marching');
  },

  planRoute(state: WorldState, source: BuildingState, army: ArmyState, ctx: SimulationContext): HexCoord[] | null {
    return Pathfinding.findPathAdjacent(source.anchor, [army.coord], grid(state, source.ownerId, ctx));
  },

  /** Takes units out of the garrison and starts the march; caller has validated. */
  dispatch(state: WorldState, source: BuildingState, army: ArmyState, composition: Composition, ctx: SimulationContext): StateChange[] {
    const path = ReinforcementSystem.planRoute(state, source, army, ctx);
    if (!path || !takeUnits(source.garrison, composition)) return [];
    const draft = { ownerId: source.ownerId, composition: { ...composition } };
    const speed = ReinforcementSystem.speed(state, draft, ctx);
    const eta = state.currentTime + MovementSystem.travelTime(state, source.ownerId, source.anchor, path, speed, ctx);
    const r: PendingReinforcement = {
      id: allocateId(state, 'reinforcement'),
      ownerId: source.ownerId,
      sourceBuildingId: source.id,
      targetArmyId: army.id,
      composition: draft.composition,
      coord: source.anchor,
      path,
      progress: 0,
      dispatchedAt: state.currentTime,
      eta,
      status: 'marching',
    };
    state.reinforcements[r.id] = r;
    ctx.logger.log(`Reinforcement ${r.id} (${compositionTotal(composition)} units) leaves ${source.id} for ${army.id}`, 'action');
    return [{ type: 'reinforcementDispatched', reinforcementId: r.id, targetArmyId: army.id, eta }];
  },

  update(state: WorldState, dt: number, ctx: SimulationContext): StateChange[] {
    const changes: StateChange[] = [];
    for (const r of Object.values(state.reinforcements)) {
      if (!state.reinforcements[r.id]) continue;
      changes.push(...ReinforcementSystem.advance(state, r, dt, ctx));
    }
    return changes;
  },

  advance(state: WorldState, r: PendingReinforcement, dt: number, ctx: SimulationContext): StateChange[] {
    const changes: StateChange[] = [];
    if (r.status === 'marching') {
      const target = state.armies[r.targetArmyId];
      if (!target) return ReinforcementSystem.turnBack(state, r, ctx);
      if (HexMath.distance(r.coord, target.coord) <= 1) return ReinforcementSystem.merge(state, r, target, ctx);
      const last = r.path[r.path.length - 1];
      if (!last || HexMath.distance(last, target.coord) > 1) {
        // target moved since the route was planned
        const path = Pathfinding.findPathAdjacent(r.coord, [target.coord], grid(state, r.ownerId, ctx));
        if (!path) return ReinforcementSystem.turnBack(state, r, ctx);
        r.path = path;
      }
    }

    r.progress += ReinforcementSystem.speed(state, r, ctx) * dt;
    const g = grid(state, r.ownerId, ctx);
    while (r.path.length > 0) {
      const next = r.path[0];
      if (!next) break;
      const cost = g.stepCost(r.coord, next) / ctx.config.movement.baseTileCost;
      if (r.progress < cost) break;
      r.progress -= cost;
      r.path.shift();
      r.coord = next;

      const hostile = WorldStateQuery.armiesAt(state, next).find(a => WorldStateQuery.isHostile(state, r.ownerId, a.ownerId));
      if (hostile) {
        changes.push(...ReinforcementSystem.intercept(state, r, hostile, ctx));
        if (!state.reinforcements[r.id]) return changes;
      }
    }

    if (r.path.length > 0) return changes;
    if (r.status === 'returning') {
      changes.push(...ReinforcementSystem.returnToSource(state, r, ctx));
    } else {
      const target = state.armies[r.targetArmyId];
      if (target && HexMath.distance(r.coord, target.coord) <= 1) changes.push(...ReinforcementSystem.merge(state, r, target, ctx));
    }
    return changes;
  },

  merge(state: WorldState, r: PendingReinforcement, army: ArmyState, ctx: SimulationContext): StateChange[] {
    addUnits(army.composition, r.composition);
    delete state.reinforcements[r.id];
    ctx.logger.log(`Reinforcement ${r.id} joined ${army.id}`, 'action');
    return [
      { type: 'reinforcementArrived', reinforcementId: r.id, targetArmyId: army.id },
      { type: 'armyCompositionChanged', armyId: army.id, composition: { ...army.composition } },
    ];
  },

  /** Heads back to the source garrison; without a route the units return directly. */
  turnBack(state: WorldState, r: PendingReinforcement, ctx: SimulationContext): StateChange[] {
    r.status = 'returning';
    const source = state.buildings[r.sourceBuildingId];
    if (!source) return ReinforcementSystem.returnToSource(state, r, ctx);
    const path = Pathfinding.findPathAdjacent(r.coord, source.occupied, grid(state, r.ownerId, ctx));
    if (!path || path.length === 0) return ReinforcementSystem.returnToSource(state, r, ctx);
    r.path = path;
    r.progress = 0;
    return [];
  },

  /** Back into the garrison, or a new army in the field if the source is gone. */
  returnToSource(state: WorldState, r: PendingReinforcement, ctx: SimulationContext): StateChange[] {
    delete state.reinforcements[r.id];
    const source = state.buildings[r.sourceBuildingId];
    if (source && source.state !== 'destroyed') {
      addUnits(source.garrison, r.composition);
      return [
        { type: 'reinforcementReturned', reinforcementId: r.id, buildingId: source.id },
        { type: 'unitsGarrisoned', buildingId: source.id, composition: { ...r.composition }, villagers: 0 },
      ];
    }
    const { changes } = createArmy(state, r.ownerId, r.coord, r.composition, null);
    ctx.logger.log(`Reinforcement ${r.id} lost its source and formed an army`, 'warning');
    return changes;
  },

  /**
   * Column caught by a hostile army. The column fights at reduced effectiveness;
   * the stronger side survives with losses proportional to the weaker.
   */
  intercept(state: WorldState, r: PendingReinforcement, army: ArmyState, ctx: SimulationContext): StateChange[] {
    const changes: StateChange[] = [];
    const column = DamageCalc.rawStrength(r.composition, ctx) * ctx.config.combat.reinforcementEffectiveness;
    const leadership = army.commander ? army.commander.leadership / 100 : 0;
    const defender = DamageCalc.rawStrength(army.composition, ctx) * (1 + leadership);

    if (column > defender) {
      const ratio = 1 - defender / column;
      const survivors: Composition = {};
      for (const [type, count] of compositionEntries(r.composition)) {
        const left = Math.floor(count * ratio);
        if (left > 0) survivors[type] = left;
      }
      r.composition = survivors;
      changes.push(...destroyArmy(state, army.id));
      const survived = compositionTotal(survivors) > 0;
      if (!survived) delete state.reinforcements[r.id];
      changes.push({ type: 'reinforcementIntercepted', reinforcementId: r.id, byArmyId: army.id, survived });
      ctx.logger.log(`Reinforcement ${r.id} broke through ${army.id}`, 'combat');
      return changes;
    }

    delete state.reinforcements[r.id];
    changes.push({ type: 'reinforcementIntercepted', reinforcementId: r.id, byArmyId: army.id, survived: false });
    if (defender > 0) {
      const share = (column / defender) * 0.5;
      const { killed, remaining } = CasualtySystem.applyToArmy(army, DamageCalc.hitPoints(army.composition, ctx) * share, ctx);
      if (remaining === 0) changes.push(...destroyArmy(state, army.id));
      else if (compositionTotal(killed) > 0) {
        changes.push({ type: 'armyCompositionChanged', armyId: army.id, composition: { ...army.composition } });
      }
    }
    ctx.logger.log(`Reinforcement ${r.id} destroyed by ${army.id}`, 'combat');
    return changes;
  },
};
