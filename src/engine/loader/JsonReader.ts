// ─────────────────────────────────────────────
//  JsonReader — narrowing helpers for untyped JSON
//  Every failure names the offending path.
// ─────────────────────────────────────────────

import { SimulationError } from '@/engine/utils/SimulationError';

export type JsonObject = Record<string, unknown>;

function fail(path: string, expected: string): never {
  throw new SimulationError('INVALID_DATA', `${path}: expected ${expected}`);
}

export const JsonReader = {
  fail,

  isObject(v: unknown): v is JsonObject {
    return typeof v === 'object' && v !== null && !Array.isArray(v);
  },

  object(v: unknown, path: string): JsonObject {
    if (!JsonReader.isObject(v)) fail(path, 'object');
    return v;
  },

  array(v: unknown, path: string): unknown[] {
    if (!Array.isArray(v)) fail(path, 'array');
    return v;
  },

  number(obj: JsonObject, key: string, path: string): number {
    const v = obj[key];
    if (typeof v !== 'number' || !Number.isFinite(v)) fail(`${path}.${key}`, 'number');
    return v;
  },

  optionalNumber(obj: JsonObject, key: string, path: string): number | undefined {
    return obj[key] === undefined ? undefined : JsonReader.number(obj, key, path);
  },

  string(obj: JsonObject, key: string, path: string): string {
    const v = obj[key];
    if (typeof v !== 'string') fail(`${path}.${key}`, 'string');
    return v;
  },

  boolean(obj: JsonObject, key: string, path: string): boolean {
    const v = obj[key];
    if (typeof v !== 'boolean') fail(`${path}.${key}`, 'boolean');
    return v;
  },

  oneOf<T extends string>(obj: JsonObject, key: string, allowed: readonly T[], path: string): T {
    const v = obj[key];
    const match = allowed.find(a => a === v);
    if (match === undefined) fail(`${path}.${key}`, allowed.join(' | '));
    return match;
  },

  stringArray(obj: JsonObject, key: string, path: string): string[] {
    return JsonReader.array(obj[key], `${path}.${key}`).map((item, i) => {
      if (typeof item !== 'string') fail(`${path}.${key}[${i}]`, 'string');
      return item;
    });
  },
};
