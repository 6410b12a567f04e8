import { describe, it, expect } from 'vitest';
import { EconomyPlanner } from '@/engine/systems/ai/EconomyPlanner';
import { MilitaryPlanner } from '@/engine/systems/ai/MilitaryPlanner';
import { DefensePlanner } from '@/engine/systems/ai/DefensePlanner';
import { BuildCommand } from '@/engine/state/commands/BuildCommand';
import { TrainCommand } from '@/engine/state/commands/TrainCommand';
import { TrainVillagersCommand } from '@/engine/state/commands/TrainVillagersCommand';
import { GatherCommand } from '@/engine/state/commands/GatherCommand';
import { AttackCommand } from '@/engine/state/commands/AttackCommand';
import { EntrenchCommand } from '@/engine/state/commands/EntrenchCommand';
import { MoveCommand } from '@/engine/state/commands/MoveCommand';
import { hex, hexKey } from '@/engine/data/types/Hex';
import { HexMath } from '@/engine/utils/HexMath';
import { makeContext, addArmy, addBuilding, addVillagers, addResourcePoint } from '../helpers';
import { planning, aiWorld } from './fixtures';

describe('EconomyPlanner.urgency', () => {
  it('weighs empty food highest and a full stockpile not at all', () => {
    const ctx = makeContext();
    const p = planning(aiWorld(ctx, { wood: 500, stone: 1000 }), ctx);

    // (1 + 0.5) × 1.2 + 0.1 with no food income
    expect(EconomyPlanner.urgency(p, 'food')).toBeCloseTo(1.9, 9);
    // 0.5 × 1.15 for a small town + 0.1
    expect(EconomyPlanner.urgency(p, 'wood')).toBeCloseTo(0.675, 9);
    expect(EconomyPlanner.urgency(p, 'stone')).toBe(0);
  });
});

describe('EconomyPlanner budget', () => {
  it('plans a farm and reserves its cost and tile', () => {
    const ctx = makeContext();
    const p = planning(aiWorld(ctx, { wood: 50, stone: 20 }), ctx);

    const commands = EconomyPlanner.buildEconomy(p);

    expect(commands).toHaveLength(1);
    const build = commands[0];
    if (!(build instanceof BuildCommand)) throw new Error('expected a build order');
    expect(build.buildingType).toBe('farm');
    expect(HexMath.distance(build.anchor, hex(5, 5))).toBe(1);
    expect(p.reserved.has(hexKey(build.anchor))).toBe(true);
    expect(p.budget).toEqual({ wood: 0, food: 0, stone: 0, ore: 0 });
    expect(p.memory.lastRun.economicBuild).toBe(100);
  });

  it('plans nothing once another order has taken the budget', () => {
    const ctx = makeContext();
    const p = planning(aiWorld(ctx, { wood: 50, stone: 20 }), ctx);
    p.budget.wood = 0;

    expect(EconomyPlanner.buildEconomy(p)).toEqual([]);
    expect(p.reserved.size).toBe(0);
  });

  it('queues one villager per decision within the budget', () => {
    const ctx = makeContext();
    const p = planning(aiWorld(ctx, { food: 50 }), ctx);

    const first = EconomyPlanner.trainVillagers(p);
    expect(first).toHaveLength(1);
    expect(first[0]).toBeInstanceOf(TrainVillagersCommand);
    expect(p.budget.food).toBe(0);
    // the stockpile still shows 50, the budget does not
    expect(EconomyPlanner.trainVillagers(p)).toEqual([]);
  });
});

describe('EconomyPlanner.assignGatherers', () => {
  it('sends an idle group to an explored resource near the base', () => {
    const ctx = makeContext();
    const state = aiWorld(ctx);
    const group = addVillagers(state, 'ai', hex(9, 5), 3);
    const trees = addResourcePoint(state, ctx, 'trees', hex(10, 5));
    addResourcePoint(state, ctx, 'trees', hex(5, 9));
    const player = state.players['ai'];
    if (player) player.visibility[hexKey(trees.coord)] = 'explored';
    const p = planning(state, ctx);

    const commands = EconomyPlanner.assignGatherers(p);

    expect(commands).toHaveLength(1);
    const order = commands[0];
    if (!(order instanceof GatherCommand)) throw new Error('expected a gather order');
    expect(order.villagerGroupId).toBe(group.id);
    expect(order.resourcePointId).toBe(trees.id);
    expect(p.assigned.has(group.id)).toBe(true);
  });
});

describe('MilitaryPlanner.counterUnit', () => {
  const analysis = { cavalry: 0, ranged: 0, infantry: 0, siege: 0, totalUnits: 10, weightedStrength: 1000 };

  it('answers the enemy mix', () => {
    expect(MilitaryPlanner.counterUnit('barracks', null)).toBe('swordsman');
    expect(MilitaryPlanner.counterUnit('barracks', { ...analysis, cavalry: 0.5 })).toBe('pikeman');
    expect(MilitaryPlanner.counterUnit('archeryRange', { ...analysis, infantry: 0.5 })).toBe('crossbow');
    expect(MilitaryPlanner.counterUnit('archeryRange', { ...analysis, infantry: 0.3 })).toBe('archer');
    expect(MilitaryPlanner.counterUnit('stable', { ...analysis, ranged: 0.5 })).toBe('knight');
    expect(MilitaryPlanner.counterUnit('stable', null)).toBe('scout');
    expect(MilitaryPlanner.counterUnit('siegeWorkshop', null)).toBe('mangonel');
  });
});

describe('MilitaryPlanner.train', () => {
  it('stops at the first building the budget cannot cover', () => {
    const ctx = makeContext();
    const state = aiWorld(ctx, { food: 50, ore: 25 });
    const first = addBuilding(state, ctx, 'ai', 'barracks', hex(9, 9));
    addBuilding(state, ctx, 'ai', 'barracks', hex(11, 9));
    const p = planning(state, ctx);

    const commands = MilitaryPlanner.train(p);

    expect(commands).toHaveLength(1);
    const order = commands[0];
    if (!(order instanceof TrainCommand)) throw new Error('expected a training order');
    expect(order.buildingId).toBe(first.id);
    expect(order.unitType).toBe('swordsman');
    expect(p.budget).toEqual({ wood: 0, food: 0, stone: 0, ore: 0 });
  });
});

describe('MilitaryPlanner.intercept', () => {
  it('sends idle armies, not entrenched ones, at an enemy near the base', () => {
    const ctx = makeContext();
    const state = aiWorld(ctx);
    const enemy = addArmy(state, 'human', hex(8, 5), { swordsman: 5 });
    const idle = addArmy(state, 'ai', hex(3, 5), { swordsman: 5 });
    const dug = addArmy(state, 'ai', hex(4, 7), { swordsman: 5 });
    dug.entrenchment = 'entrenched';
    const p = planning(state, ctx, 'defense');

    const commands = MilitaryPlanner.intercept(p);

    expect(commands).toHaveLength(1);
    const order = commands[0];
    if (!(order instanceof AttackCommand)) throw new Error('expected an attack order');
    expect(order.armyId).toBe(idle.id);
    expect(order.target).toEqual({ kind: 'army', id: enemy.id });
    expect(order.cancelEntrenchment).toBe(false);
    expect(p.assigned.has(dug.id)).toBe(false);
  });

  it('stays home when no enemy is close', () => {
    const ctx = makeContext();
    const state = aiWorld(ctx);
    addArmy(state, 'human', hex(15, 5), { swordsman: 5 });
    addArmy(state, 'ai', hex(3, 5), { swordsman: 5 });
    expect(MilitaryPlanner.intercept(planning(state, ctx, 'alert'))).toEqual([]);
  });
});

describe('DefensePlanner.wantsDefenses', () => {
  it('builds at peace only with a surplus, otherwise on threat or while defending', () => {
    const ctx = makeContext();
    const rich = planning(aiWorld(ctx, { wood: 600, stone: 500 }), ctx);
    const poor = planning(aiWorld(ctx, { wood: 600, stone: 100 }), ctx);
    const alert = planning(aiWorld(ctx), ctx, 'alert');
    const defending = planning(aiWorld(ctx), ctx, 'defense');

    expect(DefensePlanner.wantsDefenses(rich, 0)).toBe(true);
    expect(DefensePlanner.wantsDefenses(poor, 100)).toBe(false);
    expect(DefensePlanner.wantsDefenses(alert, 15)).toBe(true);
    expect(DefensePlanner.wantsDefenses(alert, 14)).toBe(false);
    expect(DefensePlanner.wantsDefenses(defending, 0)).toBe(true);
  });
});

describe('DefensePlanner.entrench', () => {
  it('digs in an idle army near home and reserves the wood', () => {
    const ctx = makeContext();
    const state = aiWorld(ctx, { wood: 300 });
    addArmy(state, 'human', hex(8, 5), { swordsman: 5 });
    const army = addArmy(state, 'ai', hex(3, 5), { swordsman: 5 });
    const p = planning(state, ctx, 'defense');

    const commands = DefensePlanner.entrench(p);

    expect(commands).toHaveLength(1);
    const order = commands[0];
    if (!(order instanceof EntrenchCommand)) throw new Error('expected an entrench order');
    expect(order.armyId).toBe(army.id);
    expect(p.budget.wood).toBe(200);
  });

  it('holds off below the wood floor', () => {
    const ctx = makeContext();
    const state = aiWorld(ctx, { wood: 299 });
    addArmy(state, 'human', hex(8, 5), { swordsman: 5 });
    addArmy(state, 'ai', hex(3, 5), { swordsman: 5 });
    expect(DefensePlanner.entrench(planning(state, ctx, 'defense'))).toEqual([]);
  });
});

describe('DefensePlanner.garrison', () => {
  it('mans an empty tower with a nearby ranged army', () => {
    const ctx = makeContext();
    const state = aiWorld(ctx);
    const tower = addBuilding(state, ctx, 'ai', 'tower', hex(9, 9));
    addArmy(state, 'ai', hex(9, 11), { swordsman: 5 });
    const archers = addArmy(state, 'ai', hex(10, 9), { archer: 5 });
    const p = planning(state, ctx);

    const commands = DefensePlanner.garrison(p);

    expect(commands).toHaveLength(1);
    const order = commands[0];
    if (!(order instanceof MoveCommand)) throw new Error('expected a move order');
    expect(order.entity).toEqual({ kind: 'army', id: archers.id });
    expect(order.destination).toEqual(hex(10, 9));
    expect(order.garrisonBuildingId).toBe(tower.id);
  });
});
