// ─────────────────────────────────────────────
//  Simulation tuning constants
//  Times in seconds of simulation time.
// ─────────────────────────────────────────────

import type { AIDifficulty, AIDifficultyProfile, PlannerKey } from '@/engine/data/types/AI';

const DEFAULTS = {
  intervals: {
    movement: 0.1,
    combat: 1.0,
    vision: 0.25,
    building: 0.5,
    training: 1.0,
    resource: 0.5,
    research: 1.0,
    ai: 0.5,
  },

  movement: {
    /** Hexes per second for a unit with move speed 1 on cost-3 terrain */
    baseSpeed: 0.75,
    baseTileCost: 3,
    retreatMultiplier: 1.1,
    villagerMultiplier: 0.8,
    reinforcementMultiplier: 0.7,
    elevationStepCost: 1,
    maxEntitiesPerTile: 5,
  },

  combat: {
    phaseInterval: 1.0,
    maxPhases: 10,
    siegeVsBuildingMultiplier: 1.5,
    chargeBonus: { cavalry: 0.2, infantry: 0.1 },
    /** Retreat when below this share of starting strength */
    retreatThreshold: 0.25,
    villagerHp: 5,
    villagerDamage: 1,
    /** Reinforcements fight at this share of their strength when intercepted */
    reinforcementEffectiveness: 0.75,
    buildingDamagedRatio: 0.5,
  },

  garrison: {
    fireInterval: 1.0,
    range: 1,
  },

  entrenchment: {
    buildTime: 10,
    woodCost: 100,
    defenseBonus: 0.1,
  },

  gathering: {
    perVillagerRate: 0.2,
    campAdjacencyBonus: 0.25,
    huntDamagePerVillager: 2,
    foodPerPopulation: 0.1,
  },

  construction: {
    builderRatio: 0.8,
    upgradeTimeFactor: 0.5,
    demolitionTimeFactor: 0.5,
    demolitionRefund: 0.5,
    defenseHpPerLevel: 0.2,
  },

  training: {
    villagerTime: 10,
    villagerCost: { food: 50 },
  },

  vision: {
    army: 3,
    villagers: 2,
    constructing: 1,
  },

  background: {
    /** Eight hours */
    maxOfflineSeconds: 8 * 60 * 60,
  },

  ai: {
    plannerIntervals: {
      economicBuild: 2,
      militaryTrain: 3,
      scout: 30,
      campBuild: 5,
      defenseBuild: 10,
      garrisonCheck: 5,
      researchCheck: 5,
      enemyAnalysis: 10,
      entrenchCheck: 8,
    } satisfies Record<PlannerKey, number>,
    difficulty: {
      easy:   { decisionInterval: 5,   attackThreshold: 2.0, alertThreshold: 30, retreatHealthRatio: 0.4, coordinatesArmies: false },
      medium: { decisionInterval: 3,   attackThreshold: 1.5, alertThreshold: 20, retreatHealthRatio: 0.3, coordinatesArmies: false },
      hard:   { decisionInterval: 1.5, attackThreshold: 1.2, alertThreshold: 10, retreatHealthRatio: 0.2, coordinatesArmies: true },
    } satisfies Record<AIDifficulty, AIDifficultyProfile>,
    threatRadius: 10,
    nearbyEnemyRadius: 5,
    minAttackStrength: 2000,
    defenseRetreatStrength: 500,
    attackAbortStrength: 1000,
    retreatRecoverStrength: 1500,
    maxConsecutiveDefenses: 3,
    maxVillagers: 20,
    villagerDeployThreshold: 3,
    armyDeployThreshold: 5,
    gatherRadius: 8,
    maxGroupsPerResource: 2,
    minGatherUrgency: 0.15,
    campRadius: 10,
    maxCampsPerType: 3,
    scoutRange: 12,
    maxTowers: 4,
    maxForts: 2,
    minThreatForDefenseBuilding: 15,
    peaceDefenseWood: 500,
    peaceDefenseStone: 400,
    garrisonSearchRadius: 6,
    entrenchRadius: 8,
    entrenchMinWood: 300,
    maxEntrenchedArmies: 2,
    retreatMinUnits: 5,
    retreatMinDistance: 3,
    /** Enemy strength within this radius decides local outnumbering */
    outnumberedRadius: 3,
    outnumberedRatio: 1.5,
    /** Balance at which a resource is no longer urgent */
    resourceTarget: 1000,
    farmSearchRadius: 4,
    neighborhoodSearchRadius: 5,
    neighborhoodPopulationRatio: 0.8,
    /** Hard AI regroups armies spread further apart than this */
    coordinationDistance: 5,
  },
};

type DeepPartial<T> = { [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K] };
type DeepReadonly<T> = { readonly [K in keyof T]: T[K] extends object ? DeepReadonly<T[K]> : T[K] };

export type SimulationSettings = typeof DEFAULTS;
export type SimulationOverrides = DeepPartial<SimulationSettings>;

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  const values: unknown[] = Object.values(obj);
  for (const v of values) {
    if (typeof v === 'object' && v !== null) deepFreeze(v);
  }
  return Object.freeze(obj);
}

/** Frozen defaults; a context works on its own resolved copy. */
export const SimulationConfig: DeepReadonly<SimulationSettings> = deepFreeze(DEFAULTS);

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function mergeInto(target: Record<string, unknown>, source: Record<string, unknown>): void {
  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) continue;
    const existing = target[key];
    if (isPlainObject(existing) && isPlainObject(value)) {
      mergeInto(existing, value);
    } else {
      target[key] = value;
    }
  }
}

/** Deep-merge overrides onto a fresh copy of the defaults. */
export function resolveSettings(overrides: SimulationOverrides = {}): SimulationSettings {
  const settings: SimulationSettings = structuredClone(DEFAULTS);
  mergeInto(settings, overrides);
  return settings;
}
