// ─────────────────────────────────────────────
//  Planning Context — what one AI decision sees
//  The world is a committed (frozen) snapshot;
//  only `memory` is written while planning.
// ─────────────────────────────────────────────

import type { WorldState } from '@/engine/state/WorldState';
import type { HexCoord, HexKey } from '@/engine/data/types/Hex';
import { hexKey } from '@/engine/data/types/Hex';
import type { PlayerState } from '@/engine/data/types/Player';
import type { ArmyState } from '@/engine/data/types/Army';
import type { BuildingState, BuildingType } from '@/engine/data/types/Building';
import type { VillagerGroupState } from '@/engine/data/types/Villager';
import type { ResourceBalances, ResourceBundle } from '@/engine/data/types/Resource';
import type { AIDifficultyProfile, AIPlayerState, PlannerKey } from '@/engine/data/types/AI';
import type { SimulationContext } from '@/engine/simulation/SimulationContext';
import { WorldStateQuery } from '@/engine/state/WorldState';
import { compositionTotal } from '@/engine/data/types/Unit';
import { BuildingStats } from '@/engine/systems/economy/BuildingStats';
import { ConstructionSystem } from '@/engine/systems/economy/ConstructionSystem';
import { ResourceLedger } from '@/engine/systems/economy/ResourceLedger';
import { VillagerSystem } from '@/engine/systems/economy/VillagerSystem';
import { isUnderAttack } from '@/engine/state/commands/CommandGuards';
import { BuildCommand } from '@/engine/state/commands/BuildCommand';
import { isCooldownDue } from '@/engine/utils/Cooldown';
import { HexMath } from '@/engine/utils/HexMath';

export interface PlanningContext {
  readonly state: WorldState;
  readonly playerId: string;
  readonly player: PlayerState;
  readonly now: number;
  readonly ctx: SimulationContext;
  readonly profile: AIDifficultyProfile;
  /** Working copy of the AI record; committed after planning */
  readonly memory: AIPlayerState;
  /** Planner timestamps as they were when the decision began */
  readonly previousRuns: Readonly<AIPlayerState['lastRun']>;
  readonly base: BuildingState | undefined;
  /** Resources not yet promised to a command this decision */
  readonly budget: ResourceBalances;
  /** Army and villager ids already given an order this decision */
  readonly assigned: Set<string>;
  /** Tiles promised to buildings planned this decision */
  readonly reserved: Set<HexKey>;
}

export const Planning = {
  /** Due against the timestamps at decision start, so two planners may share a key. */
  isDue(p: PlanningContext, key: PlannerKey): boolean {
    return isCooldownDue(p.previousRuns[key] ?? null, p.now, p.ctx.config.ai.plannerIntervals[key]);
  },

  markRun(p: PlanningContext, key: PlannerKey): void {
    p.memory.lastRun[key] = p.now;
  },

  claim(p: PlanningContext, key: PlannerKey): boolean {
    if (!Planning.isDue(p, key)) return false;
    Planning.markRun(p, key);
    return true;
  },

  /** Reserves a cost against this decision's budget; false when it does not fit. */
  spend(p: PlanningContext, cost: ResourceBundle, quantity = 1): boolean {
    if (!ResourceLedger.canAfford(p.budget, cost, quantity)) return false;
    ResourceLedger.deduct(p.budget, cost, quantity);
    return true;
  },

  /** Armies free to take an order: not fighting, not marching, not dug in. */
  idleArmies(p: PlanningContext): ArmyState[] {
    return WorldStateQuery.armiesOf(p.state, p.playerId).filter(a =>
      !p.assigned.has(a.id)
      && !a.inCombat && a.movement === null && a.entrenchment === 'none' && compositionTotal(a.composition) > 0);
  },

  idleVillagers(p: PlanningContext): VillagerGroupState[] {
    return WorldStateQuery.villagerGroupsOf(p.state, p.playerId).filter(g =>
      !p.assigned.has(g.id) && g.task.kind === 'idle' && g.movement === null && !isUnderAttack(p.state, g.id));
  },

  tileIsClear(p: PlanningContext, c: HexCoord): boolean {
    return WorldStateQuery.entityCountAt(p.state, c) === 0;
  },

  /** Anchor where `type` may be placed, searching rings `minRadius..maxRadius` around `center`. */
  findBuildSite(p: PlanningContext, type: BuildingType, center: HexCoord, minRadius: number, maxRadius: number): HexCoord | null {
    for (let radius = minRadius; radius <= maxRadius; radius++) {
      for (const c of HexMath.ring(center, radius)) {
        if (Planning.canPlace(p, type, c)) return c;
      }
    }
    return null;
  },

  canPlace(p: PlanningContext, type: BuildingType, anchor: HexCoord): boolean {
    if (ConstructionSystem.placementBlocker(p.state, p.playerId, type, anchor, 0, p.ctx) !== null) return false;
    const tiles = BuildingStats.occupiedCoordinates(type, anchor, 0, p.ctx);
    return tiles.every(c => !p.reserved.has(hexKey(c)) && Planning.tileIsClear(p, c));
  },

  /** Build order for a site `canPlace` accepted; reserves the tiles and the cost. */
  build(p: PlanningContext, type: BuildingType, anchor: HexCoord): BuildCommand | null {
    if (!Planning.spend(p, p.ctx.catalog.buildings[type].cost)) return null;
    for (const c of BuildingStats.occupiedCoordinates(type, anchor, 0, p.ctx)) p.reserved.add(hexKey(c));
    p.ctx.logger.log(`AI ${p.playerId} plans ${type} at (${anchor.q},${anchor.r})`, 'ai');
    return new BuildCommand(p.playerId, p.now, type, anchor, 0, Planning.builderFor(p, anchor));
  },

  /** Nearest idle group that can reach the site, if any. */
  builderFor(p: PlanningContext, site: HexCoord): string | null {
    const groups = Planning.idleVillagers(p)
      .sort((a, b) => HexMath.distance(a.coord, site) - HexMath.distance(b.coord, site));
    for (const g of groups) {
      if (VillagerSystem.routeAdjacent(p.state, g, [site], p.ctx)) {
        p.assigned.add(g.id);
        return g.id;
      }
    }
    return null;
  },
};
