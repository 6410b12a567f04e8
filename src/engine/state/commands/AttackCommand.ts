import type { WorldState } from '@/engine/state/WorldState';
import type { CombatantRef } from '@/engine/data/types/Combat';
import type { EntityRef } from '@/engine/data/types/Entity';
import type { HexCoord } from '@/engine/data/types/Hex';
import type { StateChange } from '@/engine/data/types/StateChange';
import type { SimulationContext } from '@/engine/simulation/SimulationContext';
import type { Command } from './Command';
import { CommandResult } from './Command';
import { WorldStateQuery } from '@/engine/state/WorldState';
import { compositionTotal } from '@/engine/data/types/Unit';
import { HexMath } from '@/engine/utils/HexMath';
import { CombatSystem } from '@/engine/systems/combat/CombatSystem';
import { MovementSystem } from '@/engine/systems/movement/MovementSystem';
import { cancelEntrenchment } from '@/engine/systems/military/ArmySystem';
import { createPathGrid, Pathfinding } from '@/engine/systems/movement/Pathfinding';
import { checkArmy, requireArmy } from './CommandGuards';

function asCombatant(ref: EntityRef): CombatantRef | null {
  switch (ref.kind) {
    case 'army':
    case 'building':
    case 'villagerGroup':
      return ref;
    case 'resourcePoint':
      return null;
  }
}

export class AttackCommand implements Command {
  readonly type = 'ATTACK';

  constructor(
    readonly playerId: string,
    readonly issuedAt: number,
    readonly armyId: string,
    readonly target: EntityRef,
    /** Lets an entrenched army leave its works to reach a distant target */
    readonly cancelEntrenchment = false,
  ) {}

  /** [] when adjacent, a path toward the target, or null when unreachable. */
  private approach(state: WorldState, target: CombatantRef, ctx: SimulationContext): HexCoord[] | null {
    const army = state.armies[this.armyId];
    const tiles = MovementSystem.targetTiles(state, target);
    if (!army || tiles.length === 0) return null;
    if (tiles.some(t => HexMath.distance(t, army.coord) <= 1)) return [];
    const grid = createPathGrid(state, army.ownerId, ctx, { ignoreCapacityAt: [army.coord] });
    return Pathfinding.findPathAdjacent(army.coord, tiles, grid);
  }

  validate(state: WorldState, ctx: SimulationContext): CommandResult {
    const bad = checkArmy(state, this.playerId, this.armyId);
    if (bad) return CommandResult.fail(bad);
    const army = state.armies[this.armyId];
    if (!army || compositionTotal(army.composition) === 0) return CommandResult.fail('army has no units');
    if (army.inCombat) return CommandResult.fail('army is already in combat');

    const target = asCombatant(this.target);
    if (!target) return CommandResult.fail('resource points cannot be attacked');
    const owner = WorldStateQuery.ownerOf(state, target);
    if (owner === null) return CommandResult.fail(`${target.kind} ${target.id} not found`);
    if (!WorldStateQuery.isHostile(state, this.playerId, owner)) return CommandResult.fail('target is not an enemy');
    const path = this.approach(state, target, ctx);
    if (!path) return CommandResult.fail('target cannot be reached');
    if (path.length > 0 && army.entrenchment !== 'none' && !this.cancelEntrenchment) {
      return CommandResult.fail('army is entrenched; moving requires cancelling the entrenchment');
    }
    return CommandResult.ok();
  }

  execute(draft: WorldState, ctx: SimulationContext): StateChange[] {
    const target = asCombatant(this.target);
    if (!target) return [];
    const path = this.approach(draft, target, ctx);
    if (!path) return [];
    if (path.length === 0) return CombatSystem.startCombat(draft, this.armyId, target, ctx);

    const army = requireArmy(draft, this.armyId);
    const changes: StateChange[] = [];
    if (army.entrenchment !== 'none') {
      ctx.logger.log(`Army ${army.id} leaves its entrenchment to attack`, 'warning');
      changes.push(...cancelEntrenchment(army));
    }
    army.movement = { path, progress: 0, intent: { kind: 'attack', target } };
    return changes;
  }
}
