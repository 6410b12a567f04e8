// ─────────────────────────────────────────────
//  StateChange — immutable record of a mutation
//  that actually happened. Returned in batches
//  from commands and engine updates.
// ─────────────────────────────────────────────

import type { HexCoord } from './Hex';
import type { BuildingType } from './Building';
import type { Composition } from './Unit';
import type { ResourceBalances, ResourceType } from './Resource';
import type { CombatantRef, CombatOutcome } from './Combat';
import type { Visibility } from './Player';
import type { VillagerTaskKind } from './Villager';
import type { AIBehaviorState } from './AI';
import type { MilitaryUnitType } from './Unit';

export type StateChange =
  // Buildings
  | { type: 'buildingPlaced'; buildingId: string; buildingType: BuildingType; coord: HexCoord; ownerId: string; rotation: number }
  | { type: 'buildingConstructionStarted'; buildingId: string }
  | { type: 'buildingConstructionProgress'; buildingId: string; progress: number }
  | { type: 'buildingCompleted'; buildingId: string }
  | { type: 'buildingUpgradeStarted'; buildingId: string; toLevel: number }
  | { type: 'buildingUpgradeCompleted'; buildingId: string; level: number }
  | { type: 'buildingUpgradeCancelled'; buildingId: string }
  | { type: 'buildingDemolitionStarted'; buildingId: string }
  | { type: 'buildingDemolitionCancelled'; buildingId: string }
  | { type: 'buildingDemolished'; buildingId: string; coord: HexCoord }
  | { type: 'buildingDamaged'; buildingId: string; health: number; maxHealth: number }
  | { type: 'buildingDestroyed'; buildingId: string; coord: HexCoord }
  // Armies
  | { type: 'armyCreated'; armyId: string; ownerId: string; coord: HexCoord; composition: Composition }
  | { type: 'armyMoved'; armyId: string; from: HexCoord; to: HexCoord }
  | { type: 'armyCompositionChanged'; armyId: string; composition: Composition }
  | { type: 'armyDestroyed'; armyId: string; ownerId: string; coord: HexCoord }
  | { type: 'armyDisbanded'; armyId: string; intoBuildingId: string }
  | { type: 'armyRetreating'; armyId: string; toward: HexCoord }
  | { type: 'armyEntrenchmentStarted'; armyId: string }
  | { type: 'armyEntrenched'; armyId: string }
  | { type: 'armyEntrenchmentCancelled'; armyId: string }
  // Villagers
  | { type: 'villagerGroupCreated'; groupId: string; ownerId: string; coord: HexCoord; count: number }
  | { type: 'villagerGroupMoved'; groupId: string; from: HexCoord; to: HexCoord }
  | { type: 'villagerGroupCountChanged'; groupId: string; count: number }
  | { type: 'villagerGroupDestroyed'; groupId: string }
  | { type: 'villagerGroupTaskChanged'; groupId: string; task: VillagerTaskKind; targetId: string | null }
  | { type: 'villagerCasualties'; groupId: string; ownerId: string; killed: number; remaining: number }
  // Training
  | { type: 'trainingStarted'; buildingId: string; unitType: MilitaryUnitType; quantity: number }
  | { type: 'trainingCompleted'; buildingId: string; unitType: MilitaryUnitType; quantity: number }
  | { type: 'villagerTrainingStarted'; buildingId: string; quantity: number }
  | { type: 'villagerTrainingCompleted'; buildingId: string; quantity: number }
  | { type: 'unitsGarrisoned'; buildingId: string; composition: Composition; villagers: number }
  // Combat
  | { type: 'combatStarted'; combatId: string; attackerId: string; defender: CombatantRef; coord: HexCoord }
  | { type: 'combatPhaseCompleted'; combatId: string; phase: number; attackerDamage: number; defenderDamage: number }
  | { type: 'combatEnded'; combatId: string; outcome: CombatOutcome }
  | { type: 'garrisonDefenseAttack'; buildingId: string; targetArmyId: string; damage: number }
  // Resources
  | { type: 'resourcesChanged'; playerId: string; resources: ResourceBalances }
  | { type: 'resourcePointAmountChanged'; resourcePointId: string; remaining: number }
  | { type: 'resourcePointDepleted'; resourcePointId: string; coord: HexCoord; resource: ResourceType }
  | { type: 'resourcePointConverted'; resourcePointId: string; into: string }
  // Vision
  | { type: 'fogOfWarUpdated'; playerId: string; coord: HexCoord; visibility: Visibility }
  // Research
  | { type: 'researchStarted'; playerId: string; researchId: string }
  | { type: 'researchCompleted'; playerId: string; researchId: string }
  // Reinforcements
  | { type: 'reinforcementDispatched'; reinforcementId: string; targetArmyId: string; eta: number }
  | { type: 'reinforcementArrived'; reinforcementId: string; targetArmyId: string }
  | { type: 'reinforcementReturned'; reinforcementId: string; buildingId: string }
  | { type: 'reinforcementIntercepted'; reinforcementId: string; byArmyId: string; survived: boolean }
  // AI
  | { type: 'aiStateChanged'; playerId: string; from: AIBehaviorState; to: AIBehaviorState };

export type StateChangeType = StateChange['type'];

export type StateChangeOf<K extends StateChangeType> = Extract<StateChange, { type: K }>;
