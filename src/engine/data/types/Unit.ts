// ─────────────────────────────────────────────
//  Military Unit Types
// ─────────────────────────────────────────────

import type { ResourceBundle } from './Resource';
import type { BuildingType } from './Building';

export type MilitaryUnitType =
  | 'swordsman'
  | 'pikeman'
  | 'archer'
  | 'crossbow'
  | 'scout'
  | 'knight'
  | 'heavyCavalry'
  | 'mangonel'
  | 'trebuchet';

export const MILITARY_UNIT_TYPES: readonly MilitaryUnitType[] = [
  'swordsman', 'pikeman', 'archer', 'crossbow', 'scout', 'knight', 'heavyCavalry', 'mangonel', 'trebuchet',
];

export type UnitCategory = 'infantry' | 'ranged' | 'cavalry' | 'siege';

export type DamageChannel = 'melee' | 'pierce' | 'bludgeon';

export type DamageProfile = Record<DamageChannel, number>;

export interface UnitStats {
  category: UnitCategory;
  hp: number;
  damage: DamageProfile;
  armor: DamageProfile;
  attackSpeed: number;
  /** Seconds per tile relative to the base speed; higher is slower */
  moveSpeed: number;
  trainingTime: number;
  cost: ResourceBundle;
  trainedAt: BuildingType;
  /** Per-unit damage when firing from a building garrison */
  garrisonDamage?: number;
}

/** Unit type → count. Missing keys are zero. */
export type Composition = Partial<Record<MilitaryUnitType, number>>;

export function compositionTotal(c: Composition): number {
  let total = 0;
  for (const t of MILITARY_UNIT_TYPES) total += c[t] ?? 0;
  return total;
}

export function compositionEntries(c: Composition): [MilitaryUnitType, number][] {
  const out: [MilitaryUnitType, number][] = [];
  for (const t of MILITARY_UNIT_TYPES) {
    const n = c[t] ?? 0;
    if (n > 0) out.push([t, n]);
  }
  return out;
}
