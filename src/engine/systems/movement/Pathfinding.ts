// ─────────────────────────────────────────────
//  Pathfinding — hex A* over the world map
//  Returns null (never a partial path) when the
//  goal cannot be reached.
// ─────────────────────────────────────────────

import type { HexCoord } from '@/engine/data/types/Hex';
import type { BuildingState } from '@/engine/data/types/Building';
import type { WorldState } from '@/engine/state/WorldState';
import type { SimulationContext } from '@/engine/simulation/SimulationContext';
import { TERRAIN } from '@/engine/data/types/Terrain';
import { hexEquals, hexKey } from '@/engine/data/types/Hex';
import { WorldStateQuery } from '@/engine/state/WorldState';
import { HexMath } from '@/engine/utils/HexMath';

/** Walkability/cost view of the world for one moving player. */
export interface PathGrid {
  playerId: string;
  isWalkable(c: HexCoord): boolean;
  /** Cost of stepping from `from` into the adjacent `to` */
  stepCost(from: HexCoord, to: HexCoord): number;
}

export interface PathGridOptions {
  /** Tiles exempt from the per-tile entity cap (usually the mover's own tile) */
  ignoreCapacityAt?: HexCoord[];
  /** Skip the entity cap entirely */
  ignoreCapacity?: boolean;
}

export function canPassBuilding(state: WorldState, building: BuildingState, playerId: string, ctx: SimulationContext): boolean {
  switch (ctx.catalog.buildings[building.type].passability) {
    case 'open':
      return true;
    case 'allied':
      return WorldStateQuery.isAllied(state, building.ownerId, playerId);
    case 'blocked':
      return false;
  }
}

export function createPathGrid(
  state: WorldState,
  playerId: string,
  ctx: SimulationContext,
  options: PathGridOptions = {},
): PathGrid {
  const buildings = WorldStateQuery.occupancyIndex(state);
  const counts = WorldStateQuery.entityCounts(state);
  const exempt = new Set((options.ignoreCapacityAt ?? []).map(hexKey));
  const cap = ctx.config.movement.maxEntitiesPerTile;

  return {
    playerId,

    isWalkable(c: HexCoord): boolean {
      const tile = WorldStateQuery.tile(state, c);
      if (!tile || !TERRAIN[tile.terrain].walkable) return false;
      const key = hexKey(c);
      const building = buildings.get(key);
      if (building && !canPassBuilding(state, building, playerId, ctx)) return false;
      if (!options.ignoreCapacity && !exempt.has(key) && (counts.get(key) ?? 0) >= cap) return false;
      return true;
    },

    stepCost(from: HexCoord, to: HexCoord): number {
      const tile = WorldStateQuery.tile(state, to);
      if (!tile) return Number.POSITIVE_INFINITY;
      // roads and passable buildings are paved
      const base = buildings.has(hexKey(to)) ? 1 : TERRAIN[tile.terrain].moveCost;
      const fromTile = WorldStateQuery.tile(state, from);
      const climb = fromTile ? Math.max(0, tile.elevation - fromTile.elevation) : 0;
      return base + climb * ctx.config.movement.elevationStepCost;
    },
  };
}

export const Pathfinding = {
  /**
   * A*: shortest path from start to goal, excluding start and including goal.
   * Returns [] when start equals goal and null when unreachable.
   */
  findPath(start: HexCoord, goal: HexCoord, grid: PathGrid): HexCoord[] | null {
    if (hexEquals(start, goal)) return [];
    if (!grid.isWalkable(goal)) return null;

    const h = (c: HexCoord): number => HexMath.distance(c, goal);
    const open = new Map<string, { pos: HexCoord; g: number; f: number }>();
    const cameFrom = new Map<string, HexCoord>();
    const gScore = new Map<string, number>();
    const closed = new Set<string>();

    const startKey = hexKey(start);
    open.set(startKey, { pos: start, g: 0, f: h(start) });
    gScore.set(startKey, 0);

    while (open.size > 0) {
      // Pick node with lowest f score
      let current: { pos: HexCoord; g: number; f: number } | undefined;
      for (const v of open.values()) {
        if (!current || v.f < current.f) current = v;
      }
      if (!current) break;

      const currentKey = hexKey(current.pos);
      if (hexEquals(current.pos, goal)) {
        const path: HexCoord[] = [];
        let c: HexCoord | undefined = goal;
        while (c && hexKey(c) !== startKey) {
          path.unshift(c);
          c = cameFrom.get(hexKey(c));
        }
        return path;
      }

      open.delete(currentKey);
      closed.add(currentKey);

      for (const neighbor of HexMath.neighbors(current.pos)) {
        const nKey = hexKey(neighbor);
        if (closed.has(nKey)) continue;
        if (!grid.isWalkable(neighbor)) continue;
        const tentativeG = current.g + grid.stepCost(current.pos, neighbor);
        if (tentativeG < (gScore.get(nKey) ?? Number.POSITIVE_INFINITY)) {
          cameFrom.set(nKey, current.pos);
          gScore.set(nKey, tentativeG);
          open.set(nKey, { pos: neighbor, g: tentativeG, f: tentativeG + h(neighbor) });
        }
      }
    }
    return null;
  },

  /** Path ending on any walkable tile adjacent to one of `targets`. */
  findPathAdjacent(start: HexCoord, targets: HexCoord[], grid: PathGrid): HexCoord[] | null {
    if (targets.some(t => HexMath.distance(start, t) <= 1)) return [];
    const goals = new Map<string, HexCoord>();
    for (const t of targets) {
      for (const n of HexMath.neighbors(t)) {
        if (grid.isWalkable(n)) goals.set(hexKey(n), n);
      }
    }
    const sorted = [...goals.values()].sort((a, b) => HexMath.distance(start, a) - HexMath.distance(start, b));
    let best: HexCoord[] | null = null;
    let bestCost = Number.POSITIVE_INFINITY;
    for (const goal of sorted) {
      // no adjacent goal can beat a path already cheaper than its straight-line lower bound
      if (HexMath.distance(start, goal) >= bestCost) break;
      const path = Pathfinding.findPath(start, goal, grid);
      if (!path) continue;
      const cost = Pathfinding.pathCost(start, path, grid);
      if (cost < bestCost) {
        best = path;
        bestCost = cost;
      }
    }
    return best;
  },

  pathCost(start: HexCoord, path: HexCoord[], grid: PathGrid): number {
    let cost = 0;
    let prev = start;
    for (const step of path) {
      cost += grid.stepCost(prev, step);
      prev = step;
    }
    return cost;
  },

  /** Nearest walkable tile to `around`, searching ring by ring. */
  findNearestWalkable(around: HexCoord, grid: PathGrid, maxRadius = 5): HexCoord | null {
    for (let radius = 0; radius <= maxRadius; radius++) {
      for (const c of HexMath.ring(around, radius)) {
        if (grid.isWalkable(c)) return c;
      }
    }
    return null;
  },

  /** True when every step is adjacent to the previous and walkable. */
  isValidPath(start: HexCoord, path: HexCoord[], grid: PathGrid): boolean {
    let prev = start;
    for (const step of path) {
      if (!HexMath.isAdjacent(prev, step) || !grid.isWalkable(step)) return false;
      prev = step;
    }
    return true;
  },
};
