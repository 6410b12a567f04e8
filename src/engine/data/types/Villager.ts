// ─────────────────────────────────────────────
//  Villager Group State
// ─────────────────────────────────────────────

import type { HexCoord } from './Hex';
import type { MovementOrder } from './Army';

export type VillagerTask =
  | { kind: 'idle' }
  | { kind: 'moving' }
  | { kind: 'gathering'; resourcePointId: string }
  | { kind: 'hunting'; resourcePointId: string }
  | { kind: 'building'; buildingId: string }
  | { kind: 'upgrading'; buildingId: string }
  | { kind: 'demolishing'; buildingId: string };

export type VillagerTaskKind = VillagerTask['kind'];

export interface VillagerGroupState {
  id: string;
  ownerId: string;
  coord: HexCoord;
  count: number;
  task: VillagerTask;
  movement: MovementOrder | null;
  /** Damage absorbed that has not yet killed a villager */
  damageCarry: number;
}

export function taskTargetId(task: VillagerTask): string | null {
  switch (task.kind) {
    case 'idle':
    case 'moving':
      return null;
    case 'gathering':
    case 'hunting':
      return task.resourcePointId;
    case 'building':
    case 'upgrading':
    case 'demolishing':
      return task.buildingId;
  }
}
