// ─────────────────────────────────────────────
//  SimulationError — internal inconsistency raised
//  inside a mutation recipe. Caught at the store
//  boundary; the draft is discarded.
// ─────────────────────────────────────────────

export type SimulationErrorCode =
  | 'STALE_REFERENCE'
  | 'INSUFFICIENT_RESOURCES'
  | 'INVALID_STATE'
  | 'INVALID_DATA';

export class SimulationError extends Error {
  constructor(
    readonly code: SimulationErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'SimulationError';
  }
}
