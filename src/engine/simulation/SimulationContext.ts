// ─────────────────────────────────────────────
//  Simulation Context — collaborators handed to
//  every subsystem call (no global engine access)
// ─────────────────────────────────────────────

import type { Catalog } from '@/engine/loader/CatalogLoader';
import { loadCatalog } from '@/engine/loader/CatalogLoader';
import { resolveSettings, type SimulationOverrides, type SimulationSettings } from '@/config';
import { Logger } from '@/engine/utils/Logger';

export interface SimulationContext {
  readonly catalog: Catalog;
  readonly config: SimulationSettings;
  readonly logger: typeof Logger;
  /** Wall clock in seconds, used for background catch-up */
  readonly clock: () => number;
}

export interface SimulationContextOptions {
  catalog?: Catalog;
  config?: SimulationOverrides;
  clock?: () => number;
}

export function createSimulationContext(options: SimulationContextOptions = {}): SimulationContext {
  return {
    catalog: options.catalog ?? loadCatalog(),
    config: resolveSettings(options.config),
    logger: Logger,
    clock: options.clock ?? (() => Date.now() / 1000),
  };
}
