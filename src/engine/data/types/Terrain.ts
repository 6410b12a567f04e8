// ─────────────────────────────────────────────
//  Terrain Types
// ─────────────────────────────────────────────

export type TerrainType = 'plains' | 'water' | 'mountain' | 'desert' | 'hill';

export interface TerrainData {
  type: TerrainType;
  /** Whether any entity can stand here */
  walkable: boolean;
  /** Interrupts line of sight to tiles behind it */
  blocksSight: boolean;
  /** Pathfinding cost off-road */
  moveCost: number;
}

export const TERRAIN: Readonly<Record<TerrainType, TerrainData>> = {
  plains:   { type: 'plains',   walkable: true,  blocksSight: false, moveCost: 3 },
  desert:   { type: 'desert',   walkable: true,  blocksSight: false, moveCost: 3 },
  hill:     { type: 'hill',     walkable: true,  blocksSight: false, moveCost: 4 },
  mountain: { type: 'mountain', walkable: true,  blocksSight: true,  moveCost: 5 },
  water:    { type: 'water',    walkable: false, blocksSight: false, moveCost: Number.POSITIVE_INFINITY },
};

export const TERRAIN_TYPES: readonly TerrainType[] = ['plains', 'water', 'mountain', 'desert', 'hill'];
