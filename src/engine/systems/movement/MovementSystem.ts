// ─────────────────────────────────────────────
//  Movement System — tile-by-tile advance
//  A tile is entered once accumulated distance
//  reaches its step cost / base tile cost. Each
//  entered tile is checked for hostile armies
//  before the next step is taken.
// ─────────────────────────────────────────────

import type { WorldState } from '@/engine/state/WorldState';
import type { ArmyState, MovementOrder } from '@/engine/data/types/Army';
import type { VillagerGroupState } from '@/engine/data/types/Villager';
import type { HexCoord } from '@/engine/data/types/Hex';
import type { Composition } from '@/engine/data/types/Unit';
import type { CombatantRef } from '@/engine/data/types/Combat';
import type { StateChange } from '@/engine/data/types/StateChange';
import type { SimulationContext } from '@/engine/simulation/SimulationContext';
import { WorldStateQuery } from '@/engine/state/WorldState';
import { compositionEntries } from '@/engine/data/types/Unit';
import { HexMath } from '@/engine/utils/HexMath';
import { ResearchSystem } from '@/engine/systems/economy/ResearchSystem';
import { ResourceSystem } from '@/engine/systems/economy/ResourceSystem';
import { CombatSystem } from '@/engine/systems/combat/CombatSystem';
import { garrisonArmy } from '@/engine/systems/military/ArmySystem';
import { createPathGrid, Pathfinding } from './Pathfinding';

type StepOutcome = 'moved' | 'blocked' | 'waiting';

function hostileArmyAt(state: WorldState, ownerId: string, c: HexCoord, selfId: string): ArmyState | undefined {
  return WorldStateQuery.armiesAt(state, c)
    .filter(a => a.id !== selfId && WorldStateQuery.isHostile(state, ownerId, a.ownerId))
    .sort((a, b) => a.id.localeCompare(b.id))[0];
}

/**
 * Enters path[0] when enough distance has accrued. A blocked tile triggers one
 * repath toward the final destination; if that fails the order is dropped.
 */
function step(
  state: WorldState,
  ownerId: string,
  coord: HexCoord,
  order: MovementOrder,
  ctx: SimulationContext,
): { outcome: StepOutcome; to?: HexCoord } {
  const next = order.path[0];
  if (!next) return { outcome: 'waiting' };
  const grid = createPathGrid(state, ownerId, ctx, { ignoreCapacityAt: [coord] });

  if (!grid.isWalkable(next)) {
    const goal = order.path[order.path.length - 1];
    const path = goal ? Pathfinding.findPath(coord, goal, grid) : null;
    if (!path || path.length === 0) return { outcome: 'blocked' };
    order.path = path;
    return { outcome: 'waiting' };
  }

  const cost = grid.stepCost(coord, next) / ctx.config.movement.baseTileCost;
  if (order.progress < cost) return { outcome: 'waiting' };
  order.progress -= cost;
  order.path.shift();
  return { outcome: 'moved', to: next };
}

export const MovementSystem = {
  /** Hexes per second on base-cost terrain; the slowest unit sets the pace. */
  compositionSpeed(comp: Composition, ctx: SimulationContext): number {
    const factors = compositionEntries(comp).map(([type]) => ctx.catalog.units[type].moveSpeed);
    const slowest = factors.length > 0 ? Math.max(...factors) : 1;
    return ctx.config.movement.baseSpeed / Math.max(0.1, slowest);
  },

  armySpeed(state: WorldState, army: ArmyState, ctx: SimulationContext): number {
    const bonuses = ResearchSystem.bonuses(state, army.ownerId, ctx);
    let speed = MovementSystem.compositionSpeed(army.composition, ctx) * (1 + (bonuses.militaryMarchSpeed ?? 0));
    if (army.movement?.intent.kind === 'retreat') {
      speed *= ctx.config.movement.retreatMultiplier * (1 + (bonuses.militaryRetreatSpeed ?? 0));
    }
    return speed;
  },

  villagerSpeed(state: WorldState, group: VillagerGroupState, ctx: SimulationContext): number {
    const bonuses = ResearchSystem.bonuses(state, group.ownerId, ctx);
    return ctx.config.movement.baseSpeed * ctx.config.movement.villagerMultiplier * (1 + (bonuses.villagerMarchSpeed ?? 0));
  },

  /** Seconds to walk `path` from `start` at `speed`. */
  travelTime(state: WorldState, ownerId: string, start: HexCoord, path: HexCoord[], speed: number, ctx: SimulationContext): number {
    const grid = createPathGrid(state, ownerId, ctx, { ignoreCapacity: true });
    return Pathfinding.pathCost(start, path, grid) / ctx.config.movement.baseTileCost / Math.max(1e-6, speed);
  },

  update(state: WorldState, dt: number, ctx: SimulationContext): StateChange[] {
    const changes: StateChange[] = [];
    for (const army of Object.values(state.armies)) {
      if (!state.armies[army.id] || !army.movement) continue;
      if (army.inCombat && army.movement.intent.kind !== 'retreat') continue;
      changes.push(...MovementSystem.advanceArmy(state, army, dt, ctx));
    }
    for (const group of Object.values(state.villagerGroups)) {
      if (!state.villagerGroups[group.id] || !group.movement) continue;
      changes.push(...MovementSystem.advanceVillagers(state, group, dt, ctx));
    }
    return changes;
  },

  advanceArmy(state: WorldState, army: ArmyState, dt: number, ctx: SimulationContext): StateChange[] {
    const order = army.movement;
    if (!order) return [];
    const changes: StateChange[] = [];
    order.progress += MovementSystem.armySpeed(state, army, ctx) * dt;

    while (army.movement && army.movement.path.length > 0) {
      const { outcome, to } = step(state, army.ownerId, army.coord, army.movement, ctx);
      if (outcome === 'waiting') break;
      if (outcome === 'blocked' || !to) {
        army.movement = null;
        ctx.logger.log(`Army ${army.id} stopped: path blocked`, 'warning');
        return changes;
      }
      const from = army.coord;
      army.coord = to;
      changes.push({ type: 'armyMoved', armyId: army.id, from, to });

      if (army.movement.intent.kind !== 'retreat') {
        const hostile = hostileArmyAt(state, army.ownerId, to, army.id);
        if (hostile) {
          army.movement = null;
          changes.push(...CombatSystem.startCombat(state, army.id, { kind: 'army', id: hostile.id }, ctx));
          return changes;
        }
      }
    }

    if (army.movement && army.movement.path.length === 0) changes.push(...MovementSystem.arriveArmy(state, army, ctx));
    return changes;
  },

  /** Completes the army's intent at the end of its path. */
  arriveArmy(state: WorldState, army: ArmyState, ctx: SimulationContext): StateChange[] {
    const order = army.movement;
    army.movement = null;
    if (!order) return [];
    const intent = order.intent;

    switch (intent.kind) {
      case 'move':
        return [];

      case 'attack': {
        const targets = MovementSystem.targetTiles(state, intent.target);
        if (targets.length === 0) return [];
        if (targets.some(t => HexMath.distance(t, army.coord) <= 1)) {
          return CombatSystem.startCombat(state, army.id, intent.target, ctx);
        }
        MovementSystem.chase(state, army, targets, intent, ctx);
        return [];
      }

      case 'retreat':
      case 'garrison': {
        const id = intent.kind === 'garrison' ? intent.buildingId : army.homeBaseId;
        const building = id ? state.buildings[id] : undefined;
        if (!building || !building.occupied.some(o => HexMath.distance(o, army.coord) <= 1)) return [];
        return garrisonArmy(state, army, building, ctx);
      }
    }
  },

  /** Tiles an attacker must stand next to; [] once the target is gone. */
  targetTiles(state: WorldState, target: CombatantRef): HexCoord[] {
    switch (target.kind) {
      case 'army': {
        const army = state.armies[target.id];
        return army ? [army.coord] : [];
      }
      case 'building': {
        const building = state.buildings[target.id];
        return building ? building.occupied : [];
      }
      case 'villagerGroup': {
        const group = state.villagerGroups[target.id];
        return group ? [group.coord] : [];
      }
    }
  },

  /** Re-targets an attack whose target has moved since the order was given. */
  chase(state: WorldState, army: ArmyState, targets: HexCoord[], intent: MovementOrder['intent'], ctx: SimulationContext): void {
    const grid = createPathGrid(state, army.ownerId, ctx, { ignoreCapacityAt: [army.coord] });
    const path = Pathfinding.findPathAdjacent(army.coord, targets, grid);
    if (path && path.length > 0) army.movement = { path, progress: 0, intent };
  },

  advanceVillagers(state: WorldState, group: VillagerGroupState, dt: number, ctx: SimulationContext): StateChange[] {
    const order = group.movement;
    if (!order) return [];
    const changes: StateChange[] = [];
    order.progress += MovementSystem.villagerSpeed(state, group, ctx) * dt;

    while (group.movement && group.movement.path.length > 0) {
      const { outcome, to } = step(state, group.ownerId, group.coord, group.movement, ctx);
      if (outcome === 'waiting') break;
      if (outcome === 'blocked' || !to) {
        group.movement = null;
        return changes;
      }
      const from = group.coord;
      group.coord = to;
      changes.push({ type: 'villagerGroupMoved', groupId: group.id, from, to });

      if (hostileArmyAt(state, group.ownerId, to, '')) {
        group.movement = null;
        ResourceSystem.unassign(state, group);
        if (group.task.kind !== 'idle') {
          group.task = { kind: 'idle' };
          changes.push({ type: 'villagerGroupTaskChanged', groupId: group.id, task: 'idle', targetId: null });
        }
        return changes;
      }
    }

    if (group.movement && group.movement.path.length === 0) {
      group.movement = null;
      if (group.task.kind === 'moving') {
        group.task = { kind: 'idle' };
        changes.push({ type: 'villagerGroupTaskChanged', groupId: group.id, task: 'idle', targetId: null });
      }
    }
    return changes;
  },
};
