// ─────────────────────────────────────────────
//  CatalogLoader
//  Reads the static game data (units, buildings,
//  resources, research, AI research priorities)
//  from the bundled JSON and validates it into
//  typed records.
// ─────────────────────────────────────────────

import type { BuildingData, BuildingType } from '@/engine/data/types/Building';
import type { DamageProfile, MilitaryUnitType, UnitStats } from '@/engine/data/types/Unit';
import type { ResourceBundle, ResourcePointData, ResourcePointType } from '@/engine/data/types/Resource';
import type { ResearchBonus, ResearchBonusType, ResearchData } from '@/engine/data/types/Research';
import type { AIBehaviorState, ResearchPriority } from '@/engine/data/types/AI';
import { RESOURCE_TYPES } from '@/engine/data/types/Resource';
import { JsonReader, type JsonObject } from './JsonReader';

import unitsJson from '@/engine/data/catalog/units.json';
import buildingsJson from '@/engine/data/catalog/buildings.json';
import resourcesJson from '@/engine/data/catalog/resources.json';
import researchJson from '@/engine/data/catalog/research.json';
import aiResearchJson from '@/engine/data/catalog/aiResearch.json';

export interface Catalog {
  units: Record<MilitaryUnitType, UnitStats>;
  buildings: Record<BuildingType, BuildingData>;
  resources: Record<ResourcePointType, ResourcePointData>;
  research: Record<string, ResearchData>;
  /** Same entries as `research`, in file order */
  researchList: ResearchData[];
  aiResearch: Record<AIBehaviorState, ResearchPriority>;
}

export const BUILDING_TYPES: readonly BuildingType[] = [
  'cityCenter', 'farm', 'neighborhood', 'blacksmith', 'market', 'miningCamp', 'lumberCamp',
  'warehouse', 'university', 'castle', 'barracks', 'archeryRange', 'stable', 'siegeWorkshop',
  'tower', 'woodenFort', 'wall', 'gate', 'road',
];

export const RESOURCE_POINT_TYPES: readonly ResourcePointType[] = [
  'trees', 'forage', 'oreMine', 'stoneQuarry', 'deer', 'wildBoar', 'deerCarcass', 'boarCarcass', 'farmland',
];

const RESEARCH_BONUS_TYPES: readonly ResearchBonusType[] = [
  'farmGatheringRate', 'lumberCampGatheringRate', 'miningCampGatheringRate', 'villagerMarchSpeed',
  'populationCapacity', 'foodConsumption', 'buildingSpeed', 'militaryMarchSpeed', 'militaryRetreatSpeed',
  'militaryTrainingSpeed', 'militaryFoodConsumption', 'buildingHP', 'infantryMeleeAttack', 'cavalryMeleeAttack',
  'infantryMeleeArmor', 'cavalryMeleeArmor', 'archerMeleeArmor', 'piercingDamage', 'infantryPierceArmor',
  'cavalryPierceArmor', 'archerPierceArmor', 'siegeBludgeonDamage', 'buildingBludgeonArmor',
];

export function readBundle(v: unknown, path: string): ResourceBundle {
  const obj = JsonReader.object(v, path);
  const bundle: ResourceBundle = {};
  for (const key of Object.keys(obj)) {
    const type = RESOURCE_TYPES.find(t => t === key);
    if (type === undefined) return JsonReader.fail(`${path}.${key}`, RESOURCE_TYPES.join(' | '));
    bundle[type] = JsonReader.number(obj, key, path);
  }
  return bundle;
}

function readDamage(v: unknown, path: string): DamageProfile {
  const obj = JsonReader.object(v, path);
  return {
    melee: JsonReader.number(obj, 'melee', path),
    pierce: JsonReader.number(obj, 'pierce', path),
    bludgeon: JsonReader.number(obj, 'bludgeon', path),
  };
}

function keyed(raw: unknown, path: string): (key: string) => [JsonObject, string] {
  const root = JsonReader.object(raw, path);
  return key => [JsonReader.object(root[key], `${path}.${key}`), `${path}.${key}`];
}

export function parseUnit(obj: JsonObject, path: string): UnitStats {
  return {
    category: JsonReader.oneOf(obj, 'category', ['infantry', 'ranged', 'cavalry', 'siege'], path),
    hp: JsonReader.number(obj, 'hp', path),
    damage: readDamage(obj['damage'], `${path}.damage`),
    armor: readDamage(obj['armor'], `${path}.armor`),
    attackSpeed: JsonReader.number(obj, 'attackSpeed', path),
    moveSpeed: JsonReader.number(obj, 'moveSpeed', path),
    trainingTime: JsonReader.number(obj, 'trainingTime', path),
    cost: readBundle(obj['cost'], `${path}.cost`),
    trainedAt: JsonReader.oneOf(obj, 'trainedAt', BUILDING_TYPES, path),
    garrisonDamage: JsonReader.optionalNumber(obj, 'garrisonDamage', path),
  };
}

export function parseBuilding(obj: JsonObject, path: string): BuildingData {
  return {
    category: JsonReader.oneOf(obj, 'category', ['economic', 'military', 'infrastructure'], path),
    cost: readBundle(obj['cost'], `${path}.cost`),
    buildTime: JsonReader.number(obj, 'buildTime', path),
    maxHealth: JsonReader.number(obj, 'maxHealth', path),
    maxLevel: JsonReader.number(obj, 'maxLevel', path),
    size: JsonReader.number(obj, 'size', path),
    visionRange: JsonReader.number(obj, 'visionRange', path),
    passability: JsonReader.oneOf(obj, 'passability', ['open', 'allied', 'blocked'], path),
    requiredCityCenterLevel: JsonReader.number(obj, 'requiredCityCenterLevel', path),
    populationCapacity: JsonReader.number(obj, 'populationCapacity', path),
    populationPerLevel: JsonReader.number(obj, 'populationPerLevel', path),
    garrisonCapacity: JsonReader.number(obj, 'garrisonCapacity', path),
    trainsVillagers: JsonReader.boolean(obj, 'trainsVillagers', path),
    produces: obj['produces'] === undefined ? undefined : readBundle(obj['produces'], `${path}.produces`),
    targetValue: JsonReader.number(obj, 'targetValue', path),
    defensive: JsonReader.boolean(obj, 'defensive', path),
  };
}

export function parseResourcePoint(obj: JsonObject, path: string): ResourcePointData {
  return {
    yields: JsonReader.oneOf(obj, 'yields', RESOURCE_TYPES, path),
    initialAmount: JsonReader.number(obj, 'initialAmount', path),
    baseGatherRate: JsonReader.number(obj, 'baseGatherRate', path),
    huntable: JsonReader.boolean(obj, 'huntable', path),
    carcass: obj['carcass'] === undefined ? undefined : JsonReader.oneOf(obj, 'carcass', RESOURCE_POINT_TYPES, path),
    health: JsonReader.number(obj, 'health', path),
    campType: obj['campType'] === undefined
      ? undefined
      : JsonReader.oneOf<'lumberCamp' | 'miningCamp'>(obj, 'campType', ['lumberCamp', 'miningCamp'], path),
    maxGatherers: JsonReader.number(obj, 'maxGatherers', path),
  };
}

export function parseResearch(obj: JsonObject, path: string): ResearchData {
  const bonuses: ResearchBonus[] = JsonReader.array(obj['bonuses'], `${path}.bonuses`).map((b, i) => {
    const bp = `${path}.bonuses[${i}]`;
    const bo = JsonReader.object(b, bp);
    return {
      type: JsonReader.oneOf(bo, 'type', RESEARCH_BONUS_TYPES, bp),
      value: JsonReader.number(bo, 'value', bp),
    };
  });
  return {
    id: JsonReader.string(obj, 'id', path),
    name: JsonReader.string(obj, 'name', path),
    category: JsonReader.oneOf(obj, 'category', ['economic', 'military'], path),
    line: JsonReader.string(obj, 'line', path),
    tier: JsonReader.number(obj, 'tier', path),
    cost: readBundle(obj['cost'], `${path}.cost`),
    duration: JsonReader.number(obj, 'duration', path),
    prerequisites: JsonReader.stringArray(obj, 'prerequisites', path),
    cityCenterLevel: JsonReader.number(obj, 'cityCenterLevel', path),
    bonuses,
  };
}

export function parseResearchPriority(obj: JsonObject, path: string): ResearchPriority {
  const linesObj = JsonReader.object(obj['lines'], `${path}.lines`);
  const lines: Record<string, number> = {};
  for (const key of Object.keys(linesObj)) lines[key] = JsonReader.number(linesObj, key, `${path}.lines`);
  return {
    favours: JsonReader.oneOf(obj, 'favours', ['economic', 'military'], path),
    categoryBonus: JsonReader.number(obj, 'categoryBonus', path),
    otherBonus: JsonReader.number(obj, 'otherBonus', path),
    lines,
  };
}

export interface RawCatalog {
  units: unknown;
  buildings: unknown;
  resources: unknown;
  research: unknown;
  aiResearch: unknown;
}

/** Validates raw catalog JSON. Throws SimulationError('INVALID_DATA') naming the bad path. */
export function parseCatalog(raw: RawCatalog): Catalog {
  const researchList = JsonReader.array(raw.research, 'research')
    .map((r, i) => parseResearch(JsonReader.object(r, `research[${i}]`), `research[${i}]`));
  const research: Record<string, ResearchData> = {};
  for (const r of researchList) research[r.id] = r;

  const unit = keyed(raw.units, 'units');
  const u = (k: MilitaryUnitType): UnitStats => parseUnit(...unit(k));
  const building = keyed(raw.buildings, 'buildings');
  const b = (k: BuildingType): BuildingData => parseBuilding(...building(k));
  const resource = keyed(raw.resources, 'resources');
  const r = (k: ResourcePointType): ResourcePointData => parseResourcePoint(...resource(k));
  const priority = keyed(raw.aiResearch, 'aiResearch');
  const p = (k: AIBehaviorState): ResearchPriority => parseResearchPriority(...priority(k));

  return {
    units: {
      swordsman: u('swordsman'), pikeman: u('pikeman'), archer: u('archer'), crossbow: u('crossbow'),
      scout: u('scout'), knight: u('knight'), heavyCavalry: u('heavyCavalry'),
      mangonel: u('mangonel'), trebuchet: u('trebuchet'),
    },
    buildings: {
      cityCenter: b('cityCenter'), farm: b('farm'), neighborhood: b('neighborhood'), blacksmith: b('blacksmith'),
      market: b('market'), miningCamp: b('miningCamp'), lumberCamp: b('lumberCamp'), warehouse: b('warehouse'),
      university: b('university'), castle: b('castle'), barracks: b('barracks'), archeryRange: b('archeryRange'),
      stable: b('stable'), siegeWorkshop: b('siegeWorkshop'), tower: b('tower'), woodenFort: b('woodenFort'),
      wall: b('wall'), gate: b('gate'), road: b('road'),
    },
    resources: {
      trees: r('trees'), forage: r('forage'), oreMine: r('oreMine'), stoneQuarry: r('stoneQuarry'),
      deer: r('deer'), wildBoar: r('wildBoar'), deerCarcass: r('deerCarcass'), boarCarcass: r('boarCarcass'),
      farmland: r('farmland'),
    },
    research,
    researchList,
    aiResearch: {
      peace: p('peace'), alert: p('alert'), defense: p('defense'), attack: p('attack'), retreat: p('retreat'),
    },
  };
}

let defaultCatalog: Catalog | null = null;

/** The bundled catalog, parsed once. */
export function loadCatalog(): Catalog {
  if (!defaultCatalog) {
    defaultCatalog = parseCatalog({
      units: unitsJson,
      buildings: buildingsJson,
      resources: resourcesJson,
      research: researchJson,
      aiResearch: aiResearchJson,
    });
  }
  return defaultCatalog;
}
