// ─────────────────────────────────────────────
//  Map Types
// ─────────────────────────────────────────────

import type { HexCoord, HexKey } from './Hex';
import type { TerrainType } from './Terrain';

export interface MapTile {
  coord: HexCoord;
  terrain: TerrainType;
  elevation: number;
}

export interface WorldMap {
  width: number;
  height: number;
  /** Every in-bounds tile, keyed by hexKey */
  tiles: Record<HexKey, MapTile>;
}
