import type { WorldState } from '@/engine/state/WorldState';
import type { BuildingType } from '@/engine/data/types/Building';
import type { HexCoord } from '@/engine/data/types/Hex';
import type { StateChange } from '@/engine/data/types/StateChange';
import type { SimulationContext } from '@/engine/simulation/SimulationContext';
import type { PlacementBlocker } from '@/engine/systems/economy/ConstructionSystem';
import type { Command } from './Command';
import { CommandResult } from './Command';
import { BuildingStats } from '@/engine/systems/economy/BuildingStats';
import { ConstructionSystem } from '@/engine/systems/economy/ConstructionSystem';
import { ResourceLedger } from '@/engine/systems/economy/ResourceLedger';
import { VillagerSystem } from '@/engine/systems/economy/VillagerSystem';
import { checkBuilders, checkPlayer, requirePlayer, requireVillagerGroup } from './CommandGuards';

const PLACEMENT_REASONS: Record<PlacementBlocker, string> = {
  outOfBounds: 'footprint leaves the map',
  unwalkable: 'footprint covers unwalkable terrain',
  occupied: 'footprint overlaps another building',
  resourcePoint: 'footprint overlaps a resource',
  cityCenterLevel: 'city centre level too low',
};

export class BuildCommand implements Command {
  readonly type = 'BUILD';

  constructor(
    readonly playerId: string,
    readonly issuedAt: number,
    readonly buildingType: BuildingType,
    readonly anchor: HexCoord,
    readonly rotation = 0,
    readonly builderGroupId: string | null = null,
  ) {}

  validate(state: WorldState, ctx: SimulationContext): CommandResult {
    const noPlayer = checkPlayer(state, this.playerId);
    if (noPlayer) return CommandResult.fail(noPlayer);

    const blocker = ConstructionSystem.placementBlocker(state, this.playerId, this.buildingType, this.anchor, this.rotation, ctx);
    if (blocker) return CommandResult.fail(PLACEMENT_REASONS[blocker]);

    const player = state.players[this.playerId];
    const cost = ctx.catalog.buildings[this.buildingType].cost;
    const short = player ? ResourceLedger.shortfall(player.resources, cost) : null;
    if (short) return CommandResult.fail(`not enough ${short}`);

    const site = BuildingStats.occupiedCoordinates(this.buildingType, this.anchor, this.rotation, ctx);
    const builders = checkBuilders(state, this.playerId, this.builderGroupId, site, ctx);
    if (builders) return CommandResult.fail(builders);
    return CommandResult.ok();
  }

  execute(draft: WorldState, ctx: SimulationContext): StateChange[] {
    const player = requirePlayer(draft, this.playerId);
    ResourceLedger.deduct(player.resources, ctx.catalog.buildings[this.buildingType].cost);
    const { building, changes } = ConstructionSystem.placeBuilding(
      draft, this.playerId, this.buildingType, this.anchor, this.rotation, ctx,
    );
    changes.push({ type: 'resourcesChanged', playerId: player.id, resources: ResourceLedger.snapshot(player.resources) });

    if (this.builderGroupId !== null) {
      const group = requireVillagerGroup(draft, this.builderGroupId);
      changes.push(...VillagerSystem.assignWork(draft, group, building, 'building', ctx));
    }
    return changes;
  }
}
