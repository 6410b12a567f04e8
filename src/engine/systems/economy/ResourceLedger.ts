// ─────────────────────────────────────────────
//  Resource Ledger — balance arithmetic
//  Balances are integers and never negative.
// ─────────────────────────────────────────────

import type { ResourceBalances, ResourceBundle } from '@/engine/data/types/Resource';
import { RESOURCE_TYPES } from '@/engine/data/types/Resource';
import { SimulationError } from '@/engine/utils/SimulationError';

export const ResourceLedger = {
  canAfford(balances: ResourceBalances, cost: ResourceBundle, quantity = 1): boolean {
    return RESOURCE_TYPES.every(t => balances[t] >= (cost[t] ?? 0) * quantity);
  },

  /** First resource the player is short of, for failure messages */
  shortfall(balances: ResourceBalances, cost: ResourceBundle, quantity = 1): string | null {
    const missing = RESOURCE_TYPES.find(t => balances[t] < (cost[t] ?? 0) * quantity);
    return missing ?? null;
  },

  /** Throws when unaffordable so the enclosing recipe is discarded. */
  deduct(balances: ResourceBalances, cost: ResourceBundle, quantity = 1): void {
    if (!ResourceLedger.canAfford(balances, cost, quantity)) {
      throw new SimulationError('INSUFFICIENT_RESOURCES', 'Insufficient resources');
    }
    for (const t of RESOURCE_TYPES) balances[t] -= (cost[t] ?? 0) * quantity;
  },

  credit(balances: ResourceBalances, bundle: ResourceBundle, factor = 1): void {
    for (const t of RESOURCE_TYPES) {
      balances[t] += Math.floor((bundle[t] ?? 0) * factor);
    }
  },

  scale(bundle: ResourceBundle, factor: number): ResourceBundle {
    const out: ResourceBundle = {};
    for (const t of RESOURCE_TYPES) {
      const v = bundle[t];
      if (v !== undefined) out[t] = Math.floor(v * factor);
    }
    return out;
  },

  snapshot(balances: ResourceBalances): ResourceBalances {
    return { wood: balances.wood, food: balances.food, stone: balances.stone, ore: balances.ore };
  },
};
