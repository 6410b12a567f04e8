// ─────────────────────────────────────────────
//  Resource Types
// ─────────────────────────────────────────────

import type { HexCoord } from './Hex';

export type ResourceType = 'wood' | 'food' | 'stone' | 'ore';

export const RESOURCE_TYPES: readonly ResourceType[] = ['wood', 'food', 'stone', 'ore'];

export type ResourceBundle = Partial<Record<ResourceType, number>>;
export type ResourceBalances = Record<ResourceType, number>;

export type ResourcePointType =
  | 'trees'
  | 'forage'
  | 'oreMine'
  | 'stoneQuarry'
  | 'deer'
  | 'wildBoar'
  | 'deerCarcass'
  | 'boarCarcass'
  | 'farmland';

export interface ResourcePointData {
  yields: ResourceType;
  initialAmount: number;
  baseGatherRate: number;
  /** Live animals must be hunted before gathering */
  huntable: boolean;
  /** Carcass type a hunted animal turns into */
  carcass?: ResourcePointType;
  health: number;
  /** Camp type granting the adjacency bonus */
  campType?: 'lumberCamp' | 'miningCamp';
  maxGatherers: number;
}

export interface ResourcePointState {
  id: string;
  type: ResourcePointType;
  coord: HexCoord;
  remaining: number;
  health: number;
  assignedGroupIds: string[];
  /** Fractional gather credit not yet rounded into the player's balance */
  carry: number;
}

export function emptyBalances(): ResourceBalances {
  return { wood: 0, food: 0, stone: 0, ore: 0 };
}
