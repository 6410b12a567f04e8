// ─────────────────────────────────────────────
//  Cooldown — pure interval gate shared by the
//  tick loop and the AI planners
// ─────────────────────────────────────────────

/** True when `interval` seconds have passed since `last`, or it never ran. */
export function isCooldownDue(last: number | null, now: number, interval: number): boolean {
  if (last === null) return true;
  return now - last >= interval;
}
