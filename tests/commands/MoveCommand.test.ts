import { describe, it, expect } from 'vitest';
import { executeCommand } from '@/engine/state/commands/CommandPipeline';
import { MoveCommand } from '@/engine/state/commands/MoveCommand';
import { AttackCommand } from '@/engine/state/commands/AttackCommand';
import { MovementSystem } from '@/engine/systems/movement/MovementSystem';
import { produce } from 'immer';
import { hex } from '@/engine/data/types/Hex';
import { makeContext, makeWorld, addPlayer, makeEnemies, addBuilding, addArmy } from '../helpers';

describe('MoveCommand', () => {
  it('plans a path and walks it tile by tile', () => {
    const ctx = makeContext();
    const state = makeWorld();
    addPlayer(state, 'p1');
    const army = addArmy(state, 'p1', hex(1, 1), { swordsman: 5 });

    const { state: next, result } = executeCommand(state, new MoveCommand('p1', 0, { kind: 'army', id: army.id }, hex(4, 1)), ctx);

    expect(result.succeeded).toBe(true);
    expect(next.armies[army.id]?.movement?.path).toEqual([hex(2, 1), hex(3, 1), hex(4, 1)]);
    expect(next.armies[army.id]?.movement?.intent).toEqual({ kind: 'move' });
  });

  it('refuses the tile the army already stands on', () => {
    const ctx = makeContext();
    const state = makeWorld();
    addPlayer(state, 'p1');
    const army = addArmy(state, 'p1', hex(1, 1), { swordsman: 5 });

    const { result } = executeCommand(state, new MoveCommand('p1', 0, { kind: 'army', id: army.id }, hex(1, 1)), ctx);
    expect(result.failureReason).toBe('already at destination');
  });

  it('needs an explicit cancel to leave an entrenchment', () => {
    const ctx = makeContext();
    const state = makeWorld();
    addPlayer(state, 'p1');
    const army = addArmy(state, 'p1', hex(1, 1), { swordsman: 5 });
    army.entrenchment = 'entrenched';

    const refused = executeCommand(state, new MoveCommand('p1', 0, { kind: 'army', id: army.id }, hex(3, 1)), ctx);
    expect(refused.result.failureReason).toBe('army is entrenched; moving requires cancelling the entrenchment');

    const moved = executeCommand(state, new MoveCommand('p1', 0, { kind: 'army', id: army.id }, hex(3, 1), true), ctx);
    expect(moved.result.succeeded).toBe(true);
    expect(moved.changes).toEqual([{ type: 'armyEntrenchmentCancelled', armyId: army.id }]);
    expect(moved.state.armies[army.id]?.entrenchment).toBe('none');
  });

  it('keeps an entrenched army in place when its attack target is out of reach', () => {
    const ctx = makeContext();
    const state = makeWorld();
    addPlayer(state, 'p1');
    addPlayer(state, 'p2');
    makeEnemies(state, 'p1', 'p2');
    const army = addArmy(state, 'p1', hex(1, 1), { swordsman: 5 });
    army.entrenchment = 'entrenched';
    const enemy = addArmy(state, 'p2', hex(6, 1), { swordsman: 5 });
    const target = { kind: 'army' as const, id: enemy.id };

    const refused = executeCommand(state, new AttackCommand('p1', 0, army.id, target), ctx);
    expect(refused.result.failureReason).toBe('army is entrenched; moving requires cancelling the entrenchment');
    expect(refused.state.armies[army.id]?.entrenchment).toBe('entrenched');

    const sent = executeCommand(state, new AttackCommand('p1', 0, army.id, target, true), ctx);
    expect(sent.result.succeeded).toBe(true);
    expect(sent.changes).toEqual([{ type: 'armyEntrenchmentCancelled', armyId: army.id }]);
    expect(sent.state.armies[army.id]?.entrenchment).toBe('none');
    expect(sent.state.armies[army.id]?.movement?.intent).toEqual({ kind: 'attack', target });
  });

  it('garrisons an army standing next to an allied tower', () => {
    const ctx = makeContext();
    const state = makeWorld();
    addPlayer(state, 'p1');
    const tower = addBuilding(state, ctx, 'p1', 'tower', hex(5, 5));
    const army = addArmy(state, 'p1', hex(4, 5), { swordsman: 5 });

    const { state: next, result } = executeCommand(
      state,
      new MoveCommand('p1', 0, { kind: 'army', id: army.id }, hex(4, 5), false, tower.id),
      ctx,
    );
    expect(result.succeeded).toBe(true);
    expect(next.armies[army.id]?.movement).toEqual({ path: [], progress: 0, intent: { kind: 'garrison', buildingId: tower.id } });

    let changes: ReturnType<typeof MovementSystem.update> = [];
    const after = produce(next, draft => {
      changes = MovementSystem.update(draft, 0.1, ctx);
    });

    expect(changes).toEqual([
      { type: 'unitsGarrisoned', buildingId: tower.id, composition: { swordsman: 5 }, villagers: 0 },
      { type: 'armyDisbanded', armyId: army.id, intoBuildingId: tower.id },
    ]);
    expect(after.armies[army.id]).toBeUndefined();
    expect(after.buildings[tower.id]?.garrison).toEqual({ swordsman: 5 });
  });

  it('rejects a garrison destination away from the building', () => {
    const ctx = makeContext();
    const state = makeWorld();
    addPlayer(state, 'p1');
    const tower = addBuilding(state, ctx, 'p1', 'tower', hex(8, 8));
    const army = addArmy(state, 'p1', hex(1, 1), { swordsman: 5 });

    const { result } = executeCommand(
      state,
      new MoveCommand('p1', 0, { kind: 'army', id: army.id }, hex(3, 1), false, tower.id),
      ctx,
    );
    expect(result.failureReason).toBe('destination is not next to the building');
  });

  it('rejects an army larger than the free garrison space', () => {
    const ctx = makeContext();
    const state = makeWorld();
    addPlayer(state, 'p1');
    const tower = addBuilding(state, ctx, 'p1', 'tower', hex(5, 5));
    const army = addArmy(state, 'p1', hex(4, 5), { swordsman: 25 });

    const { result } = executeCommand(
      state,
      new MoveCommand('p1', 0, { kind: 'army', id: army.id }, hex(4, 5), false, tower.id),
      ctx,
    );
    expect(result.failureReason).toBe('building cannot take this army');
  });
});
