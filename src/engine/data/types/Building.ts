// ─────────────────────────────────────────────
//  Building Types
//  Lifecycle: constructing → completed ⇄ damaged
//             completed → upgrading → completed
//             completed → demolishing → (removed)
//             any → destroyed
// ─────────────────────────────────────────────

import type { HexCoord } from './Hex';
import type { ResourceBundle } from './Resource';
import type { Composition, MilitaryUnitType } from './Unit';

export type BuildingType =
  | 'cityCenter'
  | 'farm'
  | 'neighborhood'
  | 'blacksmith'
  | 'market'
  | 'miningCamp'
  | 'lumberCamp'
  | 'warehouse'
  | 'university'
  | 'castle'
  | 'barracks'
  | 'archeryRange'
  | 'stable'
  | 'siegeWorkshop'
  | 'tower'
  | 'woodenFort'
  | 'wall'
  | 'gate'
  | 'road';

export type BuildingCategory = 'economic' | 'military' | 'infrastructure';

export type BuildingLifecycle =
  | 'constructing'
  | 'completed'
  | 'damaged'
  | 'upgrading'
  | 'demolishing'
  | 'destroyed';

/** Who may walk through a building's tiles */
export type BuildingPassability = 'open' | 'allied' | 'blocked';

export interface BuildingData {
  category: BuildingCategory;
  cost: ResourceBundle;
  buildTime: number;
  maxHealth: number;
  maxLevel: number;
  /** Number of tiles; 1 or 3 */
  size: number;
  visionRange: number;
  passability: BuildingPassability;
  requiredCityCenterLevel: number;
  populationCapacity: number;
  populationPerLevel: number;
  garrisonCapacity: number;
  trainsVillagers: boolean;
  /** Passive production per second, per level */
  produces?: ResourceBundle;
  /** Base score when chosen as an attack target */
  targetValue: number;
  /** Gains +20% max health per level above 1 */
  defensive: boolean;
}

export interface TrainingEntry {
  unitType: MilitaryUnitType;
  quantity: number;
  startedAt: number;
}

export interface VillagerTrainingEntry {
  quantity: number;
  startedAt: number;
}

/** Work paced by builders; `startedAt` is rebased whenever `builders` changes */
export interface TimedWork {
  startedAt: number;
  duration: number;
  builders: number;
}

export interface UpgradeWork extends TimedWork {
  cost: ResourceBundle;
}

export interface BuildingState {
  id: string;
  type: BuildingType;
  ownerId: string;
  anchor: HexCoord;
  rotation: number;
  occupied: HexCoord[];
  level: number;
  health: number;
  maxHealth: number;
  state: BuildingLifecycle;
  construction: TimedWork | null;
  upgrade: UpgradeWork | null;
  demolition: TimedWork | null;
  garrison: Composition;
  villagerGarrison: number;
  trainingQueue: TrainingEntry[];
  villagerTrainingQueue: VillagerTrainingEntry[];
  lastGarrisonFireAt: number;
}

export function isOperational(b: Pick<BuildingState, 'state'>): boolean {
  return b.state === 'completed' || b.state === 'damaged' || b.state === 'upgrading';
}
