// ─────────────────────────────────────────────
//  Building Stats — derived values per type/level
// ─────────────────────────────────────────────

import type { BuildingType } from '@/engine/data/types/Building';
import type { HexCoord } from '@/engine/data/types/Hex';
import type { ResourceBundle } from '@/engine/data/types/Resource';
import type { ResearchBonusTotals } from '@/engine/data/types/Research';
import type { SimulationContext } from '@/engine/simulation/SimulationContext';
import type { WorldState } from '@/engine/state/WorldState';
import { isOperational } from '@/engine/data/types/Building';
import { compositionTotal } from '@/engine/data/types/Unit';
import { WorldStateQuery } from '@/engine/state/WorldState';
import { HexMath } from '@/engine/utils/HexMath';
import { ResourceLedger } from './ResourceLedger';

export interface PopulationStats {
  current: number;
  capacity: number;
}

export const BuildingStats = {
  /**
   * Tiles covered by a building. Size-3 buildings take the anchor plus the
   * two neighbours at `rotation` and `rotation + 1`.
   */
  occupiedCoordinates(type: BuildingType, anchor: HexCoord, rotation: number, ctx: SimulationContext): HexCoord[] {
    const size = ctx.catalog.buildings[type].size;
    if (size <= 1) return [anchor];
    return [anchor, HexMath.neighbor(anchor, rotation), HexMath.neighbor(anchor, rotation + 1)];
  },

  maxHealth(type: BuildingType, level: number, bonuses: ResearchBonusTotals, ctx: SimulationContext): number {
    const data = ctx.catalog.buildings[type];
    const levelBonus = data.defensive ? ctx.config.construction.defenseHpPerLevel * (level - 1) : 0;
    return Math.round(data.maxHealth * (1 + levelBonus) * (1 + (bonuses.buildingHP ?? 0)));
  },

  /** Cost of upgrading from `level` to `level + 1` */
  upgradeCost(type: BuildingType, level: number, ctx: SimulationContext): ResourceBundle {
    return ResourceLedger.scale(ctx.catalog.buildings[type].cost, level);
  },

  upgradeDuration(type: BuildingType, level: number, ctx: SimulationContext): number {
    return ctx.catalog.buildings[type].buildTime * ctx.config.construction.upgradeTimeFactor * level;
  },

  demolitionDuration(type: BuildingType, ctx: SimulationContext): number {
    return ctx.catalog.buildings[type].buildTime * ctx.config.construction.demolitionTimeFactor;
  },

  population(state: WorldState, playerId: string, bonuses: ResearchBonusTotals, ctx: SimulationContext): PopulationStats {
    let current = 0;
    let capacity = 0;
    for (const g of WorldStateQuery.villagerGroupsOf(state, playerId)) current += g.count;
    for (const a of WorldStateQuery.armiesOf(state, playerId)) current += compositionTotal(a.composition);
    for (const r of Object.values(state.reinforcements)) {
      if (r.ownerId === playerId) current += compositionTotal(r.composition);
    }
    for (const b of WorldStateQuery.buildingsOf(state, playerId)) {
      current += b.villagerGarrison + compositionTotal(b.garrison);
      for (const e of b.trainingQueue) current += e.quantity;
      for (const e of b.villagerTrainingQueue) current += e.quantity;
      if (isOperational(b)) {
        const data = ctx.catalog.buildings[b.type];
        capacity += data.populationCapacity + data.populationPerLevel * (b.level - 1);
      }
    }
    if (capacity > 0) capacity += bonuses.populationCapacity ?? 0;
    return { current, capacity };
  },
};
