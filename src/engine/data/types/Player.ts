// ─────────────────────────────────────────────
//  Player State
// ─────────────────────────────────────────────

import type { HexKey } from './Hex';
import type { ResourceBalances } from './Resource';
import type { ActiveResearch } from './Research';

export type DiplomacyStatus = 'ally' | 'neutral' | 'enemy';

/** Absent key = unexplored */
export type TileVisibility = 'explored' | 'visible';

export type Visibility = 'unexplored' | TileVisibility;

export interface PlayerState {
  id: string;
  name: string;
  isAI: boolean;
  resources: ResourceBalances;
  /** Net per-second rates, recomputed by the resource update */
  collectionRates: ResourceBalances;
  /** Fractional food (production net of upkeep) not yet applied */
  consumptionCarry: number;
  /** Keyed by other player id; missing = neutral */
  diplomacy: Record<string, DiplomacyStatus>;
  visibility: Record<HexKey, TileVisibility>;
  completedResearch: string[];
  activeResearch: ActiveResearch | null;
}
