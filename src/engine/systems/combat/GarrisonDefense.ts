// ─────────────────────────────────────────────
//  Garrison Defense — buildings with ranged
//  garrison fire on the weakest hostile army on
//  or next to their footprint, once per interval
// ─────────────────────────────────────────────

import type { WorldState } from '@/engine/state/WorldState';
import type { ArmyState } from '@/engine/data/types/Army';
import type { BuildingState } from '@/engine/data/types/Building';
import type { StateChange } from '@/engine/data/types/StateChange';
import type { SimulationContext } from '@/engine/simulation/SimulationContext';
import { WorldStateQuery } from '@/engine/state/WorldState';
import { isOperational } from '@/engine/data/types/Building';
import { compositionTotal } from '@/engine/data/types/Unit';
import { HexMath } from '@/engine/utils/HexMath';
import { ResearchSystem } from '@/engine/systems/economy/ResearchSystem';
import { destroyArmy } from '@/engine/systems/military/ArmySystem';
import { DamageCalc } from './DamageCalc';
import { CasualtySystem } from './CasualtySystem';

export const GarrisonDefense = {
  /** Hostile armies within garrison range of any occupied tile, weakest first. */
  targets(state: WorldState, building: BuildingState, ctx: SimulationContext): ArmyState[] {
    const range = ctx.config.garrison.range;
    return Object.values(state.armies)
      .filter(a => WorldStateQuery.isHostile(state, building.ownerId, a.ownerId))
      .filter(a => building.occupied.some(o => HexMath.distance(o, a.coord) <= range))
      .map(a => ({ army: a, hp: DamageCalc.hitPoints(a.composition, ctx) }))
      .sort((a, b) => a.hp - b.hp || a.army.id.localeCompare(b.army.id))
      .map(t => t.army);
  },

  update(state: WorldState, ctx: SimulationContext): StateChange[] {
    const changes: StateChange[] = [];
    const interval = ctx.config.garrison.fireInterval;
    for (const building of Object.values(state.buildings)) {
      if (!isOperational(building)) continue;
      if (!DamageCalc.hasGarrisonFire(building.garrison, ctx)) continue;
      if (state.currentTime - building.lastGarrisonFireAt < interval) continue;

      const target = GarrisonDefense.targets(state, building, ctx)[0];
      if (!target) continue;

      const bonuses = ResearchSystem.bonuses(state, building.ownerId, ctx);
      const volley = DamageCalc.garrisonVolley(building.garrison, bonuses, ctx);
      const damage = DamageCalc.mitigate(volley, target.commander, target.entrenchment === 'entrenched', ctx);
      building.lastGarrisonFireAt = state.currentTime;
      const { killed } = CasualtySystem.applyToArmy(target, damage, ctx);
      changes.push({ type: 'garrisonDefenseAttack', buildingId: building.id, targetArmyId: target.id, damage });
      if (compositionTotal(target.composition) === 0) {
        changes.push(...destroyArmy(state, target.id));
      } else if (compositionTotal(killed) > 0) {
        changes.push({ type: 'armyCompositionChanged', armyId: target.id, composition: { ...target.composition } });
      }
    }
    return changes;
  },
};
