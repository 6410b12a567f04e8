// ─────────────────────────────────────────────
//  Combat System — phased engagements
//  Each phase: ranged/garrison volley, simultaneous
//  melee exchange, then resolution (casualties,
//  destruction, retreat, phase limit).
// ─────────────────────────────────────────────

import type { WorldState } from '@/engine/state/WorldState';
import type { ActiveCombat, CombatantRef, CombatOutcome, CombatSideSnapshot } from '@/engine/data/types/Combat';
import type { ArmyState } from '@/engine/data/types/Army';
import type { BuildingState } from '@/engine/data/types/Building';
import type { VillagerGroupState } from '@/engine/data/types/Villager';
import type { StateChange } from '@/engine/data/types/StateChange';
import type { SimulationContext } from '@/engine/simulation/SimulationContext';
import { allocateId, WorldStateQuery } from '@/engine/state/WorldState';
import { combatPairKey } from '@/engine/data/types/Combat';
import { compositionTotal } from '@/engine/data/types/Unit';
import { isOperational } from '@/engine/data/types/Building';
import { ResearchSystem } from '@/engine/systems/economy/ResearchSystem';
import { ConstructionSystem } from '@/engine/systems/economy/ConstructionSystem';
import { ResourceSystem } from '@/engine/systems/economy/ResourceSystem';
import { cancelEntrenchment, destroyArmy } from '@/engine/systems/military/ArmySystem';
import { createPathGrid, Pathfinding } from '@/engine/systems/movement/Pathfinding';
import { DamageCalc } from './DamageCalc';
import { CasualtySystem } from './CasualtySystem';
import { GarrisonDefense } from './GarrisonDefense';

type Defender =
  | { kind: 'army'; entity: ArmyState }
  | { kind: 'building'; entity: BuildingState }
  | { kind: 'villagerGroup'; entity: VillagerGroupState };

const RANGED = ['ranged', 'siege'] as const;

function resolveDefender(state: WorldState, ref: CombatantRef): Defender | null {
  switch (ref.kind) {
    case 'army': {
      const entity = state.armies[ref.id];
      return entity && compositionTotal(entity.composition) > 0 ? { kind: 'army', entity } : null;
    }
    case 'building': {
      const entity = state.buildings[ref.id];
      return entity && entity.state !== 'destroyed' && entity.health > 0 ? { kind: 'building', entity } : null;
    }
    case 'villagerGroup': {
      const entity = state.villagerGroups[ref.id];
      return entity && entity.count > 0 ? { kind: 'villagerGroup', entity } : null;
    }
  }
}

function defenderLocation(d: Defender): ActiveCombat['location'] {
  return d.kind === 'building' ? d.entity.anchor : d.entity.coord;
}

function snapshot(d: Defender, ctx: SimulationContext): CombatSideSnapshot {
  switch (d.kind) {
    case 'army':
      return { ownerId: d.entity.ownerId, composition: { ...d.entity.composition }, strength: DamageCalc.hitPoints(d.entity.composition, ctx) };
    case 'building':
      return { ownerId: d.entity.ownerId, composition: { ...d.entity.garrison }, strength: d.entity.health };
    case 'villagerGroup':
      return { ownerId: d.entity.ownerId, composition: {}, strength: d.entity.count * ctx.config.combat.villagerHp };
  }
}

/** Emits the composition change or the destruction of an army that lost units. */
function settleArmy(state: WorldState, army: ArmyState, unitsBefore: number): StateChange[] {
  const units = compositionTotal(army.composition);
  if (units === 0) return destroyArmy(state, army.id);
  if (units === unitsBefore) return [];
  return [{ type: 'armyCompositionChanged', armyId: army.id, composition: { ...army.composition } }];
}

function damageBuilding(state: WorldState, building: BuildingState, damage: number, ctx: SimulationContext): StateChange[] {
  if (damage <= 0) return [];
  building.health = Math.max(0, building.health - damage);
  if (building.health <= 0) return ConstructionSystem.destroyBuilding(state, building, ctx);
  if (building.state === 'completed' && building.health < building.maxHealth * ctx.config.combat.buildingDamagedRatio) {
    building.state = 'damaged';
  }
  return [{ type: 'buildingDamaged', buildingId: building.id, health: building.health, maxHealth: building.maxHealth }];
}

function homeBase(state: WorldState, army: ArmyState): BuildingState | undefined {
  const base = army.homeBaseId ? state.buildings[army.homeBaseId] : undefined;
  if (base && base.ownerId === army.ownerId && isOperational(base)) return base;
  return WorldStateQuery.cityCenter(state, army.ownerId);
}

export const CombatSystem = {
  findCombat(state: WorldState, attackerId: string, defender: CombatantRef): ActiveCombat | undefined {
    const key = combatPairKey(attackerId, defender);
    return Object.values(state.combats).find(c => combatPairKey(c.attackerId, c.defender) === key);
  },

  /**
   * Engages `defender`. Returns [] when either side is missing or empty,
   * when the pair is already fighting, or when the attacker is busy.
   */
  startCombat(state: WorldState, attackerId: string, defenderRef: CombatantRef, ctx: SimulationContext): StateChange[] {
    const attacker = state.armies[attackerId];
    if (!attacker || compositionTotal(attacker.composition) === 0) return [];
    const defender = resolveDefender(state, defenderRef);
    if (!defender) return [];
    if (!WorldStateQuery.isHostile(state, attacker.ownerId, defender.entity.ownerId)) return [];
    if (CombatSystem.findCombat(state, attackerId, defenderRef)) return [];
    if (attacker.inCombat) return [];

    const changes: StateChange[] = [];
    const combat: ActiveCombat = {
      id: allocateId(state, 'combat'),
      attackerId,
      defender: { ...defenderRef },
      location: defenderLocation(defender),
      startedAt: state.currentTime,
      phase: 0,
      lastPhaseAt: state.currentTime,
      attackerStart: {
        ownerId: attacker.ownerId,
        composition: { ...attacker.composition },
        strength: DamageCalc.hitPoints(attacker.composition, ctx),
      },
      defenderStart: snapshot(defender, ctx),
      attackerDamageDealt: 0,
      defenderDamageDealt: 0,
    };
    state.combats[combat.id] = combat;

    attacker.inCombat = true;
    attacker.movement = null;
    changes.push(...cancelEntrenchment(attacker));
    if (defender.kind === 'army') {
      defender.entity.inCombat = true;
      defender.entity.movement = null;
    } else if (defender.kind === 'villagerGroup') {
      defender.entity.movement = null;
    }

    changes.push({ type: 'combatStarted', combatId: combat.id, attackerId, defender: combat.defender, coord: combat.location });
    ctx.logger.log(`Combat ${combat.id}: ${attackerId} engages ${defenderRef.kind} ${defenderRef.id}`, 'combat');
    return changes;
  },

  /** Runs every due phase, then the standing garrison volleys. */
  update(state: WorldState, ctx: SimulationContext): StateChange[] {
    const changes: StateChange[] = [];
    const interval = ctx.config.combat.phaseInterval;
    let progressed = true;
    while (progressed) {
      progressed = false;
      for (const combat of Object.values(state.combats)) {
        if (!state.combats[combat.id]) continue;
        if (state.currentTime - combat.lastPhaseAt < interval) continue;
        changes.push(...CombatSystem.runPhase(state, combat.id, ctx));
        progressed = true;
      }
    }
    changes.push(...GarrisonDefense.update(state, ctx));
    return changes;
  },

  runPhase(state: WorldState, combatId: string, ctx: SimulationContext): StateChange[] {
    const combat = state.combats[combatId];
    if (!combat) return [];
    const attacker = state.armies[combat.attackerId];
    const defender = resolveDefender(state, combat.defender);
    if (!attacker || compositionTotal(attacker.composition) === 0) {
      return CombatSystem.endCombat(state, combat, 'defenderVictory', ctx);
    }
    if (!defender) return CombatSystem.endCombat(state, combat, 'attackerVictory', ctx);

    combat.phase += 1;
    combat.lastPhaseAt += ctx.config.combat.phaseInterval;
    const charge = combat.phase === 1;
    const changes: StateChange[] = [];
    const attackerBonuses = ResearchSystem.bonuses(state, attacker.ownerId, ctx);
    const defenderBonuses = ResearchSystem.bonuses(state, defender.entity.ownerId, ctx);
    const attackerUnits = compositionTotal(attacker.composition);
    let attackerDealt = 0;
    let defenderDealt = 0;

    switch (defender.kind) {
      case 'army': {
        const army = defender.entity;
        const defenderUnits = compositionTotal(army.composition);
        const entrenched = army.entrenchment === 'entrenched';
        // 1. entrenched ranged volley
        if (entrenched) {
          const volley = DamageCalc.output(
            army.composition,
            DamageCalc.averageArmor(attacker.composition, attackerBonuses, ctx),
            { bonuses: defenderBonuses, commander: army.commander, charge: false, categories: RANGED },
            ctx,
          );
          const taken = DamageCalc.mitigate(volley, attacker.commander, false, ctx);
          CasualtySystem.applyToArmy(attacker, taken, ctx);
          defenderDealt += taken;
        }
        // 2. simultaneous melee
        const attackerArmor = DamageCalc.averageArmor(attacker.composition, attackerBonuses, ctx);
        const defenderArmor = DamageCalc.averageArmor(army.composition, defenderBonuses, ctx);
        const out = DamageCalc.output(attacker.composition, defenderArmor, { bonuses: attackerBonuses, commander: attacker.commander, charge }, ctx);
        const back = DamageCalc.output(
          army.composition,
          attackerArmor,
          {
            bonuses: defenderBonuses,
            commander: army.commander,
            charge: false,
            categories: entrenched ? ['infantry', 'cavalry'] : undefined,
          },
          ctx,
        );
        const toDefender = DamageCalc.mitigate(out, army.commander, entrenched, ctx);
        const toAttacker = DamageCalc.mitigate(back, attacker.commander, false, ctx);
        CasualtySystem.applyToArmy(army, toDefender, ctx);
        CasualtySystem.applyToArmy(attacker, toAttacker, ctx);
        attackerDealt += toDefender;
        defenderDealt += toAttacker;
        changes.push(...settleArmy(state, army, defenderUnits));
        break;
      }

      case 'building': {
        const building = defender.entity;
        if (isOperational(building) && DamageCalc.hasGarrisonFire(building.garrison, ctx)) {
          const volley = DamageCalc.garrisonVolley(building.garrison, defenderBonuses, ctx);
          const taken = DamageCalc.mitigate(volley, attacker.commander, attacker.entrenchment === 'entrenched', ctx);
          CasualtySystem.applyToArmy(attacker, taken, ctx);
          building.lastGarrisonFireAt = state.currentTime;
          defenderDealt += taken;
          changes.push({ type: 'garrisonDefenseAttack', buildingId: building.id, targetArmyId: attacker.id, damage: taken });
        }
        const out = DamageCalc.output(
          attacker.composition,
          DamageCalc.buildingArmor(defenderBonuses),
          { bonuses: attackerBonuses, commander: attacker.commander, charge, vsBuilding: true },
          ctx,
        );
        attackerDealt += out;
        changes.push(...damageBuilding(state, building, out, ctx));
        break;
      }

      case 'villagerGroup': {
        const group = defender.entity;
        const out = DamageCalc.output(
          attacker.composition,
          { melee: 0, pierce: 0, bludgeon: 0 },
          { bonuses: attackerBonuses, commander: attacker.commander, charge },
          ctx,
        );
        const back = DamageCalc.mitigate(group.count * ctx.config.combat.villagerDamage, attacker.commander, false, ctx);
        const killed = CasualtySystem.applyToVillagers(group, out, ctx);
        CasualtySystem.applyToArmy(attacker, back, ctx);
        attackerDealt += out;
        defenderDealt += back;
        if (killed > 0) {
          changes.push({ type: 'villagerCasualties', groupId: group.id, ownerId: group.ownerId, killed, remaining: group.count });
        }
        if (group.count === 0) {
          ResourceSystem.unassign(state, group);
          delete state.villagerGroups[group.id];
          changes.push({ type: 'villagerGroupDestroyed', groupId: group.id });
        } else if (killed > 0) {
          changes.push({ type: 'villagerGroupCountChanged', groupId: group.id, count: group.count });
        }
        break;
      }
    }

    combat.attackerDamageDealt += attackerDealt;
    combat.defenderDamageDealt += defenderDealt;
    changes.push({ type: 'combatPhaseCompleted', combatId, phase: combat.phase, attackerDamage: attackerDealt, defenderDamage: defenderDealt });
    changes.push(...settleArmy(state, attacker, attackerUnits));

    // 3. resolution
    const attackerAlive = state.armies[attacker.id] !== undefined;
    const defenderAlive = resolveDefender(state, combat.defender) !== null;
    if (!defenderAlive) {
      changes.push(...CombatSystem.endCombat(state, combat, attackerAlive ? 'attackerVictory' : 'disengaged', ctx));
      return changes;
    }
    if (!attackerAlive) {
      changes.push(...CombatSystem.endCombat(state, combat, 'defenderVictory', ctx));
      return changes;
    }

    const retreating: ArmyState[] = [];
    if (CombatSystem.shouldRetreat(state, attacker, combat.attackerStart.strength, ctx)) retreating.push(attacker);
    if (defender.kind === 'army' && CombatSystem.shouldRetreat(state, defender.entity, combat.defenderStart.strength, ctx)) {
      retreating.push(defender.entity);
    }
    if (retreating.length > 0) {
      changes.push(...CombatSystem.endCombat(state, combat, 'retreat', ctx));
      for (const army of retreating) changes.push(...CombatSystem.retreat(state, army, ctx));
      return changes;
    }

    if (combat.phase >= ctx.config.combat.maxPhases) {
      changes.push(...CombatSystem.endCombat(state, combat, 'disengaged', ctx));
    }
    return changes;
  },

  shouldRetreat(state: WorldState, army: ArmyState, startStrength: number, ctx: SimulationContext): boolean {
    if (startStrength <= 0) return false;
    const now = DamageCalc.hitPoints(army.composition, ctx);
    if (now >= startStrength * ctx.config.combat.retreatThreshold) return false;
    return homeBase(state, army) !== undefined;
  },

  /** Sends an army toward its home base; it garrisons on arrival. */
  retreat(state: WorldState, army: ArmyState, ctx: SimulationContext): StateChange[] {
    const base = homeBase(state, army);
    if (!base) return [];
    const grid = createPathGrid(state, army.ownerId, ctx, { ignoreCapacityAt: [army.coord] });
    const path = Pathfinding.findPathAdjacent(army.coord, base.occupied, grid);
    if (!path) return [];
    const changes = cancelEntrenchment(army);
    army.homeBaseId = base.id;
    army.movement = { path, progress: 0, intent: { kind: 'retreat' } };
    changes.push({ type: 'armyRetreating', armyId: army.id, toward: base.anchor });
    ctx.logger.log(`Army ${army.id} retreats toward ${base.type} ${base.id}`, 'combat');
    return changes;
  },

  endCombat(state: WorldState, combat: ActiveCombat, outcome: CombatOutcome, ctx: SimulationContext): StateChange[] {
    delete state.combats[combat.id];
    const ids = [combat.attackerId];
    if (combat.defender.kind === 'army') ids.push(combat.defender.id);
    for (const id of ids) {
      const army = state.armies[id];
      if (army) army.inCombat = WorldStateQuery.combatsInvolvingArmy(state, id).length > 0;
    }
    ctx.logger.log(`Combat ${combat.id} ended: ${outcome} after ${combat.phase} phases`, 'combat');
    return [{ type: 'combatEnded', combatId: combat.id, outcome }];
  },
};
