// ─────────────────────────────────────────────
//  Combat Types
//  An ActiveCombat exists only while unresolved.
// ─────────────────────────────────────────────

import type { HexCoord } from './Hex';
import type { Composition } from './Unit';

export type CombatantRef =
  | { kind: 'army'; id: string }
  | { kind: 'building'; id: string }
  | { kind: 'villagerGroup'; id: string };

export interface CombatSideSnapshot {
  ownerId: string;
  composition: Composition;
  /** Hit points (units) or health (building) at engagement */
  strength: number;
}

export interface ActiveCombat {
  id: string;
  attackerId: string;
  defender: CombatantRef;
  location: HexCoord;
  startedAt: number;
  phase: number;
  lastPhaseAt: number;
  attackerStart: CombatSideSnapshot;
  defenderStart: CombatSideSnapshot;
  attackerDamageDealt: number;
  defenderDamageDealt: number;
}

export type CombatOutcome = 'attackerVictory' | 'defenderVictory' | 'disengaged' | 'retreat';

export function combatPairKey(attackerId: string, defender: CombatantRef): string {
  return `${attackerId}->${defender.kind}:${defender.id}`;
}
