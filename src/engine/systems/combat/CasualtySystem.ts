// ─────────────────────────────────────────────
//  Casualty System
//  Damage is split across unit types by their share
//  of total hit points; leftovers stay in carry.
// ─────────────────────────────────────────────

import type { ArmyState } from '@/engine/data/types/Army';
import type { VillagerGroupState } from '@/engine/data/types/Villager';
import type { Composition } from '@/engine/data/types/Unit';
import type { SimulationContext } from '@/engine/simulation/SimulationContext';
import { compositionEntries, compositionTotal } from '@/engine/data/types/Unit';
import { DamageCalc } from './DamageCalc';

export interface CasualtyReport {
  killed: Composition;
  remaining: number;
}

export const CasualtySystem = {
  applyToArmy(army: ArmyState, damage: number, ctx: SimulationContext): CasualtyReport {
    const killed: Composition = {};
    const totalHp = DamageCalc.hitPoints(army.composition, ctx);
    if (damage <= 0 || totalHp <= 0) return { killed, remaining: compositionTotal(army.composition) };

    for (const [type, count] of compositionEntries(army.composition)) {
      const hp = ctx.catalog.units[type].hp;
      const share = (hp * count) / totalHp;
      let carry = (army.damageCarry[type] ?? 0) + damage * share;
      const dead = Math.min(count, Math.floor(carry / hp));
      carry -= dead * hp;
      if (dead > 0) killed[type] = dead;
      if (count - dead > 0) {
        army.composition[type] = count - dead;
        army.damageCarry[type] = carry;
      } else {
        delete army.composition[type];
        delete army.damageCarry[type];
      }
    }
    return { killed, remaining: compositionTotal(army.composition) };
  },

  /** Returns the number of villagers killed. */
  applyToVillagers(group: VillagerGroupState, damage: number, ctx: SimulationContext): number {
    if (damage <= 0 || group.count <= 0) return 0;
    const hp = ctx.config.combat.villagerHp;
    let carry = group.damageCarry + damage;
    const dead = Math.min(group.count, Math.floor(carry / hp));
    carry -= dead * hp;
    group.count -= dead;
    group.damageCarry = group.count > 0 ? carry : 0;
    return dead;
  },
};
