import type { WorldState } from '@/engine/state/WorldState';
import type { SimulationContext } from '@/engine/simulation/SimulationContext';
import type { PlanningContext } from '@/engine/systems/ai/PlanningContext';
import type { AIBehaviorState } from '@/engine/data/types/AI';
import type { ResourceBalances } from '@/engine/data/types/Resource';
import { createAIPlayerState } from '@/engine/data/types/AI';
import { WorldStateQuery } from '@/engine/state/WorldState';
import { ResourceLedger } from '@/engine/systems/economy/ResourceLedger';
import { hex } from '@/engine/data/types/Hex';
import { makeWorld, addPlayer, addBuilding, makeEnemies } from '../helpers';

/** One decision's view for player 'ai' at t = 100. */
export function planning(state: WorldState, ctx: SimulationContext, behaviour: AIBehaviorState = 'peace'): PlanningContext {
  const player = state.players['ai'];
  if (!player) throw new Error('ai player missing');
  const memory = { ...createAIPlayerState('ai'), state: behaviour };
  return {
    state,
    playerId: 'ai',
    player,
    now: 100,
    ctx,
    profile: ctx.config.ai.difficulty.medium,
    memory,
    previousRuns: {},
    base: WorldStateQuery.cityCenter(state, 'ai'),
    budget: ResourceLedger.snapshot(player.resources),
    assigned: new Set(),
    reserved: new Set(),
  };
}

/** 24×24 plains; 'ai' has a city centre at (5,5) covering (6,5) and (6,4); 'human' is its enemy. */
export function aiWorld(ctx: SimulationContext, resources: Partial<ResourceBalances> = {}): WorldState {
  const state = makeWorld(24, 24);
  addPlayer(state, 'ai', resources, { isAI: true });
  addPlayer(state, 'human');
  makeEnemies(state, 'ai', 'human');
  addBuilding(state, ctx, 'ai', 'cityCenter', hex(5, 5));
  state.aiPlayers['ai'] = createAIPlayerState('ai');
  return state;
}
