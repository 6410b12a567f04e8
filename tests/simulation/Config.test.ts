import { describe, it, expect } from 'vitest';
import { SimulationConfig, resolveSettings } from '@/config';
import { makeContext } from '../helpers';

describe('SimulationConfig', () => {
  it('is frozen all the way down', () => {
    expect(Object.isFrozen(SimulationConfig)).toBe(true);
    expect(Object.isFrozen(SimulationConfig.movement)).toBe(true);
    expect(Object.isFrozen(SimulationConfig.combat.chargeBonus)).toBe(true);
    expect(Object.isFrozen(SimulationConfig.ai.difficulty.medium)).toBe(true);
  });

  it('resolves overrides onto a private copy', () => {
    const settings = resolveSettings({ movement: { baseSpeed: 1 }, combat: { chargeBonus: { cavalry: 0.5 } } });

    expect(settings.movement.baseSpeed).toBe(1);
    expect(settings.movement.baseTileCost).toBe(3);
    expect(settings.combat.chargeBonus).toEqual({ cavalry: 0.5, infantry: 0.1 });
    expect(SimulationConfig.movement.baseSpeed).toBe(0.75);
    expect(SimulationConfig.combat.chargeBonus.cavalry).toBe(0.2);
    expect(Object.isFrozen(settings.movement)).toBe(false);
  });

  it('gives each context its own settings', () => {
    const tuned = makeContext({ config: { garrison: { fireInterval: 2 } } });
    const plain = makeContext();

    expect(tuned.config.garrison.fireInterval).toBe(2);
    expect(plain.config.garrison.fireInterval).toBe(1);
  });
});
