// ─────────────────────────────────────────────
//  Entity references — closed tagged union
//  Entities point at each other by id only.
// ─────────────────────────────────────────────

export type EntityRef =
  | { kind: 'army'; id: string }
  | { kind: 'villagerGroup'; id: string }
  | { kind: 'building'; id: string }
  | { kind: 'resourcePoint'; id: string };

export type MobileRef = Extract<EntityRef, { kind: 'army' | 'villagerGroup' }>;
