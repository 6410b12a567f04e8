// ─────────────────────────────────────────────
//  Vision System — fog of war per player
//  Visible = union of every owned footprint.
//  Explored is sticky: a tile never returns to
//  unexplored once seen.
// ─────────────────────────────────────────────

import type { WorldState } from '@/engine/state/WorldState';
import type { HexCoord, HexKey } from '@/engine/data/types/Hex';
import type { StateChange } from '@/engine/data/types/StateChange';
import type { SimulationContext } from '@/engine/simulation/SimulationContext';
import { WorldStateQuery } from '@/engine/state/WorldState';
import { TERRAIN } from '@/engine/data/types/Terrain';
import { hexKey, parseHexKey } from '@/engine/data/types/Hex';
import { HexMath } from '@/engine/utils/HexMath';

export const VisionSystem = {
  /** A sight-blocking tile strictly between the two ends hides the target. */
  hasLineOfSight(state: WorldState, from: HexCoord, to: HexCoord): boolean {
    if (HexMath.distance(from, to) <= 1) return true;
    const line = HexMath.line(from, to);
    for (let i = 1; i < line.length - 1; i++) {
      const c = line[i];
      if (!c) continue;
      const tile = WorldStateQuery.tile(state, c);
      if (tile && TERRAIN[tile.terrain].blocksSight) return false;
    }
    return true;
  },

  /** In-bounds tiles within `range` of `origin` that it can see. */
  footprint(state: WorldState, origin: HexCoord, range: number): HexCoord[] {
    return HexMath.spiral(origin, range).filter(
      c => WorldStateQuery.inBounds(state, c) && VisionSystem.hasLineOfSight(state, origin, c),
    );
  },

  computeVisible(state: WorldState, playerId: string, ctx: SimulationContext): Set<HexKey> {
    const visible = new Set<HexKey>();
    const add = (origin: HexCoord, range: number): void => {
      for (const c of VisionSystem.footprint(state, origin, range)) visible.add(hexKey(c));
    };

    for (const b of WorldStateQuery.buildingsOf(state, playerId)) {
      const range = b.state === 'constructing'
        ? ctx.config.vision.constructing
        : ctx.catalog.buildings[b.type].visionRange;
      for (const o of b.occupied) add(o, range);
    }
    for (const a of WorldStateQuery.armiesOf(state, playerId)) add(a.coord, ctx.config.vision.army);
    for (const g of WorldStateQuery.villagerGroupsOf(state, playerId)) add(g.coord, ctx.config.vision.villagers);
    return visible;
  },

  /** Diffs every player's visible set and reports each tile that flipped. */
  update(state: WorldState, ctx: SimulationContext): StateChange[] {
    const changes: StateChange[] = [];
    for (const player of Object.values(state.players)) {
      const next = VisionSystem.computeVisible(state, player.id, ctx);
      for (const [key, v] of Object.entries(player.visibility)) {
        if (v !== 'visible' || next.has(key)) continue;
        player.visibility[key] = 'explored';
        const coord = parseHexKey(key);
        if (coord) changes.push({ type: 'fogOfWarUpdated', playerId: player.id, coord, visibility: 'explored' });
      }
      for (const key of next) {
        if (player.visibility[key] === 'visible') continue;
        player.visibility[key] = 'visible';
        const coord = parseHexKey(key);
        if (coord) changes.push({ type: 'fogOfWarUpdated', playerId: player.id, coord, visibility: 'visible' });
      }
    }
    return changes;
  },

  /** Rebuilds vision silently, e.g. after loading a snapshot. */
  recomputeAll(state: WorldState, ctx: SimulationContext): void {
    for (const player of Object.values(state.players)) {
      for (const key of Object.keys(player.visibility)) player.visibility[key] = 'explored';
      for (const key of VisionSystem.computeVisible(state, player.id, ctx)) player.visibility[key] = 'visible';
    }
  },

  visibility(state: WorldState, playerId: string, c: HexCoord): 'unexplored' | 'explored' | 'visible' {
    return state.players[playerId]?.visibility[hexKey(c)] ?? 'unexplored';
  },
};
