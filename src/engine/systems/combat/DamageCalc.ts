// ─────────────────────────────────────────────
//  Damage Calculation System
//  Pure functions — no side effects, fully testable.
//  Three channels (melee, pierce, bludgeon) each
//  reduced by the matching armour, floored at 0.
// ─────────────────────────────────────────────

import type { Commander } from '@/engine/data/types/Army';
import type { Composition, DamageProfile, UnitCategory } from '@/engine/data/types/Unit';
import type { ResearchBonusTotals } from '@/engine/data/types/Research';
import type { SimulationContext } from '@/engine/simulation/SimulationContext';
import { compositionEntries } from '@/engine/data/types/Unit';
import { ResearchSystem } from '@/engine/systems/economy/ResearchSystem';

export interface AttackModifiers {
  bonuses: ResearchBonusTotals;
  commander: Commander | null;
  /** First-phase charge for the attacking side */
  charge: boolean;
  vsBuilding?: boolean;
  /** Restrict output to these categories (e.g. the ranged volley) */
  categories?: readonly UnitCategory[];
}

const ZERO: DamageProfile = { melee: 0, pierce: 0, bludgeon: 0 };

export const DamageCalc = {
  channelDamage(damage: DamageProfile, armor: DamageProfile): number {
    return Math.max(0, damage.melee - armor.melee)
      + Math.max(0, damage.pierce - armor.pierce)
      + Math.max(0, damage.bludgeon - armor.bludgeon);
  },

  /** Hit-point weighted armour of a mixed composition. */
  averageArmor(comp: Composition, bonuses: ResearchBonusTotals, ctx: SimulationContext): DamageProfile {
    let weight = 0;
    const sum = { melee: 0, pierce: 0, bludgeon: 0 };
    for (const [type, count] of compositionEntries(comp)) {
      const stats = ctx.catalog.units[type];
      const { armor } = ResearchSystem.effectiveStats(stats, bonuses);
      const w = stats.hp * count;
      weight += w;
      sum.melee += armor.melee * w;
      sum.pierce += armor.pierce * w;
      sum.bludgeon += armor.bludgeon * w;
    }
    if (weight === 0) return { ...ZERO };
    return { melee: sum.melee / weight, pierce: sum.pierce / weight, bludgeon: sum.bludgeon / weight };
  },

  buildingArmor(ownerBonuses: ResearchBonusTotals): DamageProfile {
    return { melee: 0, pierce: 0, bludgeon: ownerBonuses.buildingBludgeonArmor ?? 0 };
  },

  /** Damage a composition deals in one phase against the given armour. */
  output(comp: Composition, targetArmor: DamageProfile, mods: AttackModifiers, ctx: SimulationContext): number {
    const cfg = ctx.config.combat;
    let total = 0;
    for (const [type, count] of compositionEntries(comp)) {
      const stats = ctx.catalog.units[type];
      if (mods.categories && !mods.categories.includes(stats.category)) continue;
      const { damage } = ResearchSystem.effectiveStats(stats, mods.bonuses);
      let perUnit = DamageCalc.channelDamage(damage, targetArmor) / Math.max(0.1, stats.attackSpeed);
      if (mods.vsBuilding && stats.category === 'siege') perUnit *= cfg.siegeVsBuildingMultiplier;
      if (mods.charge) {
        if (stats.category === 'cavalry') perUnit *= 1 + cfg.chargeBonus.cavalry;
        else if (stats.category === 'infantry') perUnit *= 1 + cfg.chargeBonus.infantry;
      }
      total += perUnit * count;
    }
    const leadership = mods.commander ? mods.commander.leadership / 100 : 0;
    return total * (1 + leadership);
  },

  /** Damage after the receiving side's commander tactics and entrenchment. */
  mitigate(damage: number, commander: Commander | null, entrenched: boolean, ctx: SimulationContext): number {
    let result = damage;
    if (commander) result *= 1 - Math.min(0.9, commander.tactics / 100);
    if (entrenched) result *= 1 - ctx.config.entrenchment.defenseBonus;
    return result;
  },

  /** Raw volley of a building garrison. */
  garrisonVolley(garrison: Composition, bonuses: ResearchBonusTotals, ctx: SimulationContext): number {
    let total = 0;
    for (const [type, count] of compositionEntries(garrison)) {
      const stats = ctx.catalog.units[type];
      if (stats.garrisonDamage === undefined) continue;
      const bonus = stats.damage.pierce > 0 ? bonuses.piercingDamage ?? 0 : bonuses.siegeBludgeonDamage ?? 0;
      total += (stats.garrisonDamage + bonus) * count;
    }
    return total;
  },

  hasGarrisonFire(garrison: Composition, ctx: SimulationContext): boolean {
    return compositionEntries(garrison).some(([type]) => ctx.catalog.units[type].garrisonDamage !== undefined);
  },

  /** Total hit points of a composition. */
  hitPoints(comp: Composition, ctx: SimulationContext): number {
    let total = 0;
    for (const [type, count] of compositionEntries(comp)) total += ctx.catalog.units[type].hp * count;
    return total;
  },

  /** Sum of all damage channels × count, before armour. */
  rawStrength(comp: Composition, ctx: SimulationContext): number {
    let total = 0;
    for (const [type, count] of compositionEntries(comp)) {
      const d = ctx.catalog.units[type].damage;
      total += (d.melee + d.pierce + d.bludgeon) * count;
    }
    return total;
  },

  /** Strength used by AI planning: hit points plus ten times damage per unit. */
  weightedStrength(comp: Composition, ctx: SimulationContext): number {
    let total = 0;
    for (const [type, count] of compositionEntries(comp)) {
      const s = ctx.catalog.units[type];
      total += count * (s.hp + (s.damage.melee + s.damage.pierce + s.damage.bludgeon) * 10);
    }
    return total;
  },
};
