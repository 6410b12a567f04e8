// ─────────────────────────────────────────────
//  Army State
//  Constraint: composition counts are never negative
//  Constraint: an empty army is removed, never kept
// ─────────────────────────────────────────────

import type { HexCoord } from './Hex';
import type { Composition, MilitaryUnitType } from './Unit';
import type { CombatantRef } from './Combat';

export type EntrenchmentState = 'none' | 'entrenching' | 'entrenched';

export interface Commander {
  name: string;
  /** Percent bonus to damage dealt */
  leadership: number;
  /** Percent reduction of damage taken */
  tactics: number;
}

export type MovementIntent =
  | { kind: 'move' }
  | { kind: 'retreat' }
  | { kind: 'attack'; target: CombatantRef }
  | { kind: 'garrison'; buildingId: string };

export interface MovementOrder {
  /** Remaining tiles, next tile first */
  path: HexCoord[];
  /** Distance covered toward path[0], in base-tile units */
  progress: number;
  intent: MovementIntent;
}

export interface ArmyState {
  id: string;
  ownerId: string;
  coord: HexCoord;
  commander: Commander | null;
  composition: Composition;
  /** Damage absorbed per unit type that has not yet killed a unit */
  damageCarry: Partial<Record<MilitaryUnitType, number>>;
  entrenchment: EntrenchmentState;
  entrenchmentStartedAt: number | null;
  movement: MovementOrder | null;
  inCombat: boolean;
  /** Building retreated toward when defeated */
  homeBaseId: string | null;
}
