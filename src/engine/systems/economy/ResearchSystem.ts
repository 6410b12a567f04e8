// ─────────────────────────────────────────────
//  Research System — unlocks, bonuses, completion
// ─────────────────────────────────────────────

import type { WorldState } from '@/engine/state/WorldState';
import type { ResearchBonusTotals, ResearchBonusType, ResearchData } from '@/engine/data/types/Research';
import type { StateChange } from '@/engine/data/types/StateChange';
import type { DamageProfile, UnitStats } from '@/engine/data/types/Unit';
import type { SimulationContext } from '@/engine/simulation/SimulationContext';
import { WorldStateQuery } from '@/engine/state/WorldState';
import { ResourceLedger } from './ResourceLedger';
import { BuildingStats } from './BuildingStats';

export type ResearchBlocker =
  | 'unknown'
  | 'completed'
  | 'active'
  | 'busy'
  | 'cityCenterLevel'
  | 'prerequisites'
  | 'resources';

export const ResearchSystem = {
  /** Summed bonuses of every completed research. */
  bonuses(state: WorldState, playerId: string, ctx: SimulationContext): ResearchBonusTotals {
    const totals: ResearchBonusTotals = {};
    const player = state.players[playerId];
    if (!player) return totals;
    for (const id of player.completedResearch) {
      const data = ctx.catalog.research[id];
      if (!data) continue;
      for (const b of data.bonuses) totals[b.type] = (totals[b.type] ?? 0) + b.value;
    }
    return totals;
  },

  bonus(totals: ResearchBonusTotals, type: ResearchBonusType): number {
    return totals[type] ?? 0;
  },

  /** First reason a research cannot start, or null when it can. */
  blocker(state: WorldState, playerId: string, researchId: string, ctx: SimulationContext): ResearchBlocker | null {
    const data = ctx.catalog.research[researchId];
    const player = state.players[playerId];
    if (!data || !player) return 'unknown';
    if (player.completedResearch.includes(researchId)) return 'completed';
    if (player.activeResearch?.researchId === researchId) return 'active';
    if (player.activeResearch) return 'busy';
    if (WorldStateQuery.cityCenterLevel(state, playerId) < data.cityCenterLevel) return 'cityCenterLevel';
    if (!data.prerequisites.every(p => player.completedResearch.includes(p))) return 'prerequisites';
    if (!ResourceLedger.canAfford(player.resources, data.cost)) return 'resources';
    return null;
  },

  /** Research the player could start right now. Unaffordable entries are excluded. */
  available(state: WorldState, playerId: string, ctx: SimulationContext): ResearchData[] {
    return ctx.catalog.researchList.filter(r => ResearchSystem.blocker(state, playerId, r.id, ctx) === null);
  },

  /** Deducts the cost and marks the research active. Caller has checked `blocker`. */
  start(state: WorldState, playerId: string, researchId: string, ctx: SimulationContext): StateChange[] {
    const data = ctx.catalog.research[researchId];
    const player = state.players[playerId];
    if (!data || !player) return [];
    ResourceLedger.deduct(player.resources, data.cost);
    player.activeResearch = { researchId, startedAt: state.currentTime, duration: data.duration };
    return [
      { type: 'researchStarted', playerId, researchId },
      { type: 'resourcesChanged', playerId, resources: ResourceLedger.snapshot(player.resources) },
    ];
  },

  /** Completes every active research whose end time has passed. */
  update(state: WorldState, ctx: SimulationContext): StateChange[] {
    const changes: StateChange[] = [];
    for (const player of Object.values(state.players)) {
      const active = player.activeResearch;
      if (!active) continue;
      if (state.currentTime < active.startedAt + active.duration) continue;
      player.activeResearch = null;
      if (!player.completedResearch.includes(active.researchId)) {
        player.completedResearch.push(active.researchId);
      }
      changes.push({ type: 'researchCompleted', playerId: player.id, researchId: active.researchId });
      ctx.logger.log(`${player.name} completed ${active.researchId}`, 'economy');

      // fortification research raises max health of standing buildings
      const bonuses = ResearchSystem.bonuses(state, player.id, ctx);
      for (const b of WorldStateQuery.buildingsOf(state, player.id)) {
        const max = BuildingStats.maxHealth(b.type, b.level, bonuses, ctx);
        if (max > b.maxHealth) {
          const gained = max - b.maxHealth;
          b.maxHealth = max;
          if (b.state !== 'constructing') b.health += gained;
        }
      }
    }
    return changes;
  },

  /** Unit stats with the owner's flat attack/armour research applied. */
  effectiveStats(stats: UnitStats, bonuses: ResearchBonusTotals): { damage: DamageProfile; armor: DamageProfile } {
    const damage = { ...stats.damage };
    const armor = { ...stats.armor };
    const b = (t: ResearchBonusType): number => bonuses[t] ?? 0;
    switch (stats.category) {
      case 'infantry':
        damage.melee += b('infantryMeleeAttack');
        armor.melee += b('infantryMeleeArmor');
        armor.pierce += b('infantryPierceArmor');
        break;
      case 'cavalry':
        damage.melee += b('cavalryMeleeAttack');
        armor.melee += b('cavalryMeleeArmor');
        armor.pierce += b('cavalryPierceArmor');
        break;
      case 'ranged':
        if (damage.pierce > 0) damage.pierce += b('piercingDamage');
        armor.melee += b('archerMeleeArmor');
        armor.pierce += b('archerPierceArmor');
        break;
      case 'siege':
        if (damage.bludgeon > 0) damage.bludgeon += b('siegeBludgeonDamage');
        break;
    }
    return { damage, armor };
  },
};
