// ─────────────────────────────────────────────
//  Pending Reinforcement — units marching from a
//  garrison to join an army in the field
// ─────────────────────────────────────────────

import type { HexCoord } from './Hex';
import type { Composition } from './Unit';

export type ReinforcementStatus = 'marching' | 'returning';

export interface PendingReinforcement {
  id: string;
  ownerId: string;
  sourceBuildingId: string;
  targetArmyId: string;
  composition: Composition;
  coord: HexCoord;
  path: HexCoord[];
  progress: number;
  dispatchedAt: number;
  /** Estimated arrival, seconds of simulation time */
  eta: number;
  status: ReinforcementStatus;
}
