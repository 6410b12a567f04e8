import { describe, it, expect } from 'vitest';
import { DamageCalc } from '@/engine/systems/combat/DamageCalc';
import { makeContext } from '../helpers';

const NO_ARMOR = { melee: 0, pierce: 0, bludgeon: 0 };

describe('DamageCalc.output', () => {
  const ctx = makeContext();
  const base = { bonuses: {}, commander: null, charge: false };

  it('multiplies siege output against buildings only', () => {
    expect(DamageCalc.output({ mangonel: 2 }, NO_ARMOR, base, ctx)).toBeCloseTo(6.4, 9);
    expect(DamageCalc.output({ mangonel: 2 }, NO_ARMOR, { ...base, vsBuilding: true }, ctx)).toBeCloseTo(9.6, 9);
    expect(DamageCalc.output({ swordsman: 10 }, NO_ARMOR, { ...base, vsBuilding: true }, ctx)).toBe(20);
  });

  it('adds the charge bonus for cavalry and infantry', () => {
    const knights = DamageCalc.output({ knight: 5 }, NO_ARMOR, base, ctx);
    expect(DamageCalc.output({ knight: 5 }, NO_ARMOR, { ...base, charge: true }, ctx)).toBeCloseTo(knights * 1.2, 9);
    expect(DamageCalc.output({ swordsman: 10 }, NO_ARMOR, { ...base, charge: true }, ctx)).toBeCloseTo(22, 9);
    expect(DamageCalc.output({ archer: 10 }, NO_ARMOR, { ...base, charge: true }, ctx)).toBe(20);
  });

  it('scales by commander leadership', () => {
    const commander = { name: 'Test Captain', leadership: 50, tactics: 0 };
    expect(DamageCalc.output({ swordsman: 10 }, NO_ARMOR, { ...base, commander }, ctx)).toBe(30);
  });
});

describe('DamageCalc.mitigate', () => {
  const ctx = makeContext();

  it('applies commander tactics and then the entrenchment bonus', () => {
    const commander = { name: 'Test Captain', leadership: 0, tactics: 20 };
    expect(DamageCalc.mitigate(100, null, false, ctx)).toBe(100);
    expect(DamageCalc.mitigate(100, null, true, ctx)).toBeCloseTo(90, 9);
    expect(DamageCalc.mitigate(100, commander, false, ctx)).toBeCloseTo(80, 9);
    expect(DamageCalc.mitigate(100, commander, true, ctx)).toBeCloseTo(72, 9);
  });
});
