// ─────────────────────────────────────────────
//  Resource System — gathering, hunting, passive
//  production, food upkeep and collection rates
// ─────────────────────────────────────────────

import type { WorldState } from '@/engine/state/WorldState';
import type { ResourcePointState, ResourceBalances, ResourceType } from '@/engine/data/types/Resource';
import type { ResearchBonusTotals } from '@/engine/data/types/Research';
import type { StateChange } from '@/engine/data/types/StateChange';
import type { VillagerGroupState } from '@/engine/data/types/Villager';
import type { SimulationContext } from '@/engine/simulation/SimulationContext';
import { WorldStateQuery } from '@/engine/state/WorldState';
import { emptyBalances, RESOURCE_TYPES } from '@/engine/data/types/Resource';
import { isOperational } from '@/engine/data/types/Building';
import { compositionTotal } from '@/engine/data/types/Unit';
import { HexMath } from '@/engine/utils/HexMath';
import { ResearchSystem } from './ResearchSystem';
import { ResourceLedger } from './ResourceLedger';

const EPSILON = 1e-9;

export interface Upkeep {
  villagers: number;
  military: number;
}

export const ResourceSystem = {
  /** Drops a group from every point's gatherer list. */
  unassign(state: WorldState, group: VillagerGroupState): void {
    for (const p of Object.values(state.resourcePoints)) {
      const i = p.assignedGroupIds.indexOf(group.id);
      if (i >= 0) p.assignedGroupIds.splice(i, 1);
    }
  },

  assign(state: WorldState, group: VillagerGroupState, point: ResourcePointState): void {
    ResourceSystem.unassign(state, group);
    point.assignedGroupIds.push(group.id);
  },

  hasCapacity(point: ResourcePointState, groupId: string, ctx: SimulationContext): boolean {
    if (point.assignedGroupIds.includes(groupId)) return true;
    return point.assignedGroupIds.length < ctx.catalog.resources[point.type].maxGatherers;
  },

  /** Arrived next to the point and no longer walking. */
  isWorking(group: VillagerGroupState, point: ResourcePointState): boolean {
    return group.movement === null && HexMath.distance(group.coord, point.coord) <= 1;
  },

  hasAdjacentCamp(state: WorldState, point: ResourcePointState, ownerId: string, ctx: SimulationContext): boolean {
    const camp = ctx.catalog.resources[point.type].campType;
    if (!camp) return false;
    return WorldStateQuery.buildingsOf(state, ownerId).some(
      b => b.type === camp && isOperational(b) && b.occupied.some(o => HexMath.distance(o, point.coord) <= 1),
    );
  },

  researchMultiplier(point: ResourcePointState, bonuses: ResearchBonusTotals, ctx: SimulationContext): number {
    const data = ctx.catalog.resources[point.type];
    if (data.campType === 'lumberCamp') return 1 + (bonuses.lumberCampGatheringRate ?? 0);
    if (data.campType === 'miningCamp') return 1 + (bonuses.miningCampGatheringRate ?? 0);
    if (data.yields === 'food') return 1 + (bonuses.farmGatheringRate ?? 0);
    return 1;
  },

  /** Units per second one group extracts from a point. */
  gatherRate(state: WorldState, group: VillagerGroupState, point: ResourcePointState, ctx: SimulationContext): number {
    const data = ctx.catalog.resources[point.type];
    const bonuses = ResearchSystem.bonuses(state, group.ownerId, ctx);
    let rate = data.baseGatherRate + group.count * ctx.config.gathering.perVillagerRate;
    rate *= ResourceSystem.researchMultiplier(point, bonuses, ctx);
    if (ResourceSystem.hasAdjacentCamp(state, point, group.ownerId, ctx)) rate *= 1 + ctx.config.gathering.campAdjacencyBonus;
    return rate;
  },

  upkeep(state: WorldState, playerId: string): Upkeep {
    let villagers = 0;
    let military = 0;
    for (const g of WorldStateQuery.villagerGroupsOf(state, playerId)) villagers += g.count;
    for (const a of WorldStateQuery.armiesOf(state, playerId)) military += compositionTotal(a.composition);
    for (const r of Object.values(state.reinforcements)) {
      if (r.ownerId === playerId) military += compositionTotal(r.composition);
    }
    for (const b of WorldStateQuery.buildingsOf(state, playerId)) {
      villagers += b.villagerGarrison;
      military += compositionTotal(b.garrison);
    }
    return { villagers, military };
  },

  /** Food eaten per second. */
  foodConsumption(state: WorldState, playerId: string, ctx: SimulationContext): number {
    const bonuses = ResearchSystem.bonuses(state, playerId, ctx);
    const { villagers, military } = ResourceSystem.upkeep(state, playerId);
    const perHead = ctx.config.gathering.foodPerPopulation;
    return villagers * perHead * Math.max(0, 1 - (bonuses.foodConsumption ?? 0))
      + military * perHead * Math.max(0, 1 - (bonuses.militaryFoodConsumption ?? 0));
  },

  /** Passive building output per second. */
  production(state: WorldState, playerId: string, ctx: SimulationContext): ResourceBalances {
    const out = emptyBalances();
    const bonuses = ResearchSystem.bonuses(state, playerId, ctx);
    for (const b of WorldStateQuery.buildingsOf(state, playerId)) {
      const produces = ctx.catalog.buildings[b.type].produces;
      if (!produces || !isOperational(b)) continue;
      for (const t of RESOURCE_TYPES) {
        const base = produces[t] ?? 0;
        const mult = t === 'food' ? 1 + (bonuses.farmGatheringRate ?? 0) : 1;
        out[t] += base * b.level * mult;
      }
    }
    return out;
  },

  /** Advances the economy by `dt` seconds. */
  update(state: WorldState, dt: number, ctx: SimulationContext): StateChange[] {
    if (dt <= 0) return [];
    const changes: StateChange[] = [];
    const touched = new Set<string>();

    changes.push(...ResourceSystem.hunt(state, dt, ctx));
    changes.push(...ResourceSystem.gather(state, dt, ctx, touched));

    for (const player of Object.values(state.players)) {
      const production = ResourceSystem.production(state, player.id, ctx);
      // farm food net of upkeep, fractions carried
      const net = (production.food - ResourceSystem.foodConsumption(state, player.id, ctx)) * dt + player.consumptionCarry;
      const whole = net >= 0 ? Math.floor(net + EPSILON) : -Math.floor(-net + EPSILON);
      player.consumptionCarry = net - whole;
      if (whole !== 0) {
        const before = player.resources.food;
        player.resources.food = Math.max(0, player.resources.food + whole);
        if (player.resources.food === 0) player.consumptionCarry = Math.max(0, player.consumptionCarry);
        if (player.resources.food !== before) touched.add(player.id);
      }
    }

    for (const id of touched) {
      const player = state.players[id];
      if (player) changes.push({ type: 'resourcesChanged', playerId: id, resources: ResourceLedger.snapshot(player.resources) });
    }
    ResourceSystem.recomputeRates(state, ctx);
    return changes;
  },

  /** Live animals lose health to hunters and turn into carcasses at zero. */
  hunt(state: WorldState, dt: number, ctx: SimulationContext): StateChange[] {
    const changes: StateChange[] = [];
    for (const group of Object.values(state.villagerGroups)) {
      if (group.task.kind !== 'hunting') continue;
      const point = state.resourcePoints[group.task.resourcePointId];
      if (!point || !ResourceSystem.isWorking(group, point)) continue;
      const data = ctx.catalog.resources[point.type];
      if (!data.huntable || !data.carcass) continue;

      point.health = Math.max(0, point.health - group.count * ctx.config.gathering.huntDamagePerVillager * dt);
      if (point.health > 0) continue;

      point.type = data.carcass;
      changes.push({ type: 'resourcePointConverted', resourcePointId: point.id, into: data.carcass });
      ctx.logger.log(`Hunt finished at (${point.coord.q},${point.coord.r})`, 'economy');
      for (const id of point.assignedGroupIds) {
        const hunter = state.villagerGroups[id];
        if (!hunter || hunter.task.kind !== 'hunting') continue;
        hunter.task = { kind: 'gathering', resourcePointId: point.id };
        changes.push({ type: 'villagerGroupTaskChanged', groupId: hunter.id, task: 'gathering', targetId: point.id });
      }
    }
    return changes;
  },

  gather(state: WorldState, dt: number, ctx: SimulationContext, touched: Set<string>): StateChange[] {
    const changes: StateChange[] = [];
    const amounts = new Map<string, number>();

    for (const group of Object.values(state.villagerGroups)) {
      if (group.task.kind !== 'gathering') continue;
      const point = state.resourcePoints[group.task.resourcePointId];
      if (!point || !ResourceSystem.isWorking(group, point)) continue;
      const player = state.players[group.ownerId];
      if (!player) continue;

      const amount = Math.min(point.remaining, ResourceSystem.gatherRate(state, group, point, ctx) * dt);
      if (amount <= 0) continue;
      point.remaining -= amount;
      const total = point.carry + amount;
      const whole = Math.floor(total + EPSILON);
      point.carry = Math.max(0, total - whole);
      const resource: ResourceType = ctx.catalog.resources[point.type].yields;
      if (whole > 0) {
        player.resources[resource] += whole;
        touched.add(player.id);
      }
      amounts.set(point.id, point.remaining);
    }

    for (const [pointId, remaining] of amounts) {
      const point = state.resourcePoints[pointId];
      if (!point) continue;
      if (remaining > EPSILON) {
        changes.push({ type: 'resourcePointAmountChanged', resourcePointId: pointId, remaining });
        continue;
      }
      changes.push(...ResourceSystem.deplete(state, point, ctx));
    }
    return changes;
  },

  /** Idles the point's gatherers, reports the depletion once, then removes the point. */
  deplete(state: WorldState, point: ResourcePointState, ctx: SimulationContext): StateChange[] {
    const changes: StateChange[] = [];
    for (const group of Object.values(state.villagerGroups)) {
      if ((group.task.kind === 'gathering' || group.task.kind === 'hunting') && group.task.resourcePointId === point.id) {
        group.task = { kind: 'idle' };
        changes.push({ type: 'villagerGroupTaskChanged', groupId: group.id, task: 'idle', targetId: null });
      }
    }
    const resource = ctx.catalog.resources[point.type].yields;
    changes.push({ type: 'resourcePointDepleted', resourcePointId: point.id, coord: point.coord, resource });
    delete state.resourcePoints[point.id];
    ctx.logger.log(`${point.type} at (${point.coord.q},${point.coord.r}) depleted`, 'economy');
    return changes;
  },

  /** Net per-second income by resource. */
  recomputeRates(state: WorldState, ctx: SimulationContext): void {
    for (const player of Object.values(state.players)) {
      const rates = ResourceSystem.production(state, player.id, ctx);
      for (const group of WorldStateQuery.villagerGroupsOf(state, player.id)) {
        if (group.task.kind !== 'gathering') continue;
        const point = state.resourcePoints[group.task.resourcePointId];
        if (!point || !ResourceSystem.isWorking(group, point)) continue;
        rates[ctx.catalog.resources[point.type].yields] += ResourceSystem.gatherRate(state, group, point, ctx);
      }
      rates.food -= ResourceSystem.foodConsumption(state, player.id, ctx);
      player.collectionRates = rates;
    }
  },
};
