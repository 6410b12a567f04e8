// ─────────────────────────────────────────────
//  Research Types
// ─────────────────────────────────────────────

import type { ResourceBundle } from './Resource';

export type ResearchCategory = 'economic' | 'military';

/** Percentage bonuses are fractions (0.1 = +10%); armour/attack bonuses are flat points. */
export type ResearchBonusType =
  | 'farmGatheringRate'
  | 'lumberCampGatheringRate'
  | 'miningCampGatheringRate'
  | 'villagerMarchSpeed'
  | 'populationCapacity'
  | 'foodConsumption'
  | 'buildingSpeed'
  | 'militaryMarchSpeed'
  | 'militaryRetreatSpeed'
  | 'militaryTrainingSpeed'
  | 'militaryFoodConsumption'
  | 'buildingHP'
  | 'infantryMeleeAttack'
  | 'cavalryMeleeAttack'
  | 'infantryMeleeArmor'
  | 'cavalryMeleeArmor'
  | 'archerMeleeArmor'
  | 'piercingDamage'
  | 'infantryPierceArmor'
  | 'cavalryPierceArmor'
  | 'archerPierceArmor'
  | 'siegeBludgeonDamage'
  | 'buildingBludgeonArmor';

export interface ResearchBonus {
  type: ResearchBonusType;
  value: number;
}

export interface ResearchData {
  id: string;
  name: string;
  category: ResearchCategory;
  /** Shared by the three tiers of one upgrade line */
  line: string;
  tier: number;
  cost: ResourceBundle;
  duration: number;
  prerequisites: string[];
  cityCenterLevel: number;
  bonuses: ResearchBonus[];
}

export interface ActiveResearch {
  researchId: string;
  startedAt: number;
  duration: number;
}

export type ResearchBonusTotals = Partial<Record<ResearchBonusType, number>>;
