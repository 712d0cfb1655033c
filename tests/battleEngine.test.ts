import assert from 'node:assert';
import test from 'node:test';
import { battleScore, playRound, runToCompletion } from '../src/engine/battleEngine';
import { assertOccupancyInvariant, cloneCombatState, countDeaths } from '../src/engine/combatState';
import { RoundLimitError } from '../src/engine/errors';
import type { HitEvent, MoveEvent } from '../src/types/battle';
import { snapshot, stateOf } from './helpers';

const detourRoom = () => stateOf('#######', '#E.#..#', '#..#.G#', '#.....#', '#######');

const flanked = () => stateOf('#####', '#GEG#', '#####');

const SKIRMISH = [
  '#########',
  '#G..#..E#',
  '#.#.#.#.#',
  '#..E..G.#',
  '#.#.#.#.#',
  '#G..#..E#',
  '#########'
];

test('a wall forces both units around it over the first three rounds', () => {
  const state = detourRoom();

  assert.deepStrictEqual(playRound(state), { status: 'continuing' });
  assert.deepStrictEqual(snapshot(state), [
    ['elf-0', 1, 2, 200],
    ['goblin-0', 2, 4, 200]
  ]);

  assert.deepStrictEqual(playRound(state), { status: 'continuing' });
  assert.deepStrictEqual(snapshot(state), [
    ['elf-0', 2, 2, 200],
    ['goblin-0', 3, 4, 200]
  ]);

  assert.deepStrictEqual(playRound(state), { status: 'continuing' });
  assert.deepStrictEqual(snapshot(state), [
    ['elf-0', 3, 2, 197],
    ['goblin-0', 3, 3, 200]
  ]);
  assertOccupancyInvariant(state);
});

test('moves and hits are reported as they happen', () => {
  const state = detourRoom();
  playRound(state);
  playRound(state);

  const moves: MoveEvent[] = [];
  const hits: HitEvent[] = [];
  playRound(state, { recordMove: (e) => moves.push(e), recordHit: (e) => hits.push(e) });

  assert.deepStrictEqual(moves, [
    { unitId: 'elf-0', from: { row: 2, col: 2 }, to: { row: 3, col: 2 } },
    { unitId: 'goblin-0', from: { row: 3, col: 4 }, to: { row: 3, col: 3 } }
  ]);
  assert.deepStrictEqual(hits, [
    {
      attackerId: 'goblin-0',
      attackerFaction: 'goblin',
      targetId: 'elf-0',
      targetPosition: { row: 3, col: 2 },
      damage: 3,
      didKill: false
    }
  ]);
});

test('a one-shot kill frees the tile and drops the unit from later targeting that round', () => {
  const state = stateOf('#####', '#EG.#', '#.EG#', '#####');
  state.attackPower.elf = 200;
  const hits: HitEvent[] = [];

  const result = playRound(state, { recordMove: () => undefined, recordHit: (e) => hits.push(e) });

  // elf-1 touches both goblins; the dead one at 0 hp must not be picked
  assert.deepStrictEqual(
    hits.map((h) => [h.attackerId, h.targetId, h.didKill]),
    [
      ['elf-0', 'goblin-0', true],
      ['elf-1', 'goblin-1', true]
    ]
  );
  assert.deepStrictEqual(result, { status: 'ended', winner: 'elf', completed: true });
  assert.deepStrictEqual(Array.from(state.occupied).sort(), ['1-1', '2-2']);
  assertOccupancyInvariant(state);
});

test('a unit killed mid-round frees its tile before the next unit acts', () => {
  const state = flanked();
  state.attackPower.elf = 200;

  assert.deepStrictEqual(playRound(state), { status: 'continuing' });
  assert.deepStrictEqual(snapshot(state), [
    ['elf-0', 1, 2, 194],
    ['goblin-1', 1, 3, 200]
  ]);
  assert.strictEqual(state.occupied.has('1-1'), false);

  assert.deepStrictEqual(runToCompletion(state), { rounds: 1, remainingHp: 194, winner: 'elf' });
});

test('the round in which the last enemy disappears mid-pass is not counted', () => {
  const state = flanked();
  const outcome = runToCompletion(state);

  // the elf falls to goblin-0 in round 34 and goblin-1 finds nobody left to fight
  assert.deepStrictEqual(outcome, { rounds: 33, remainingHp: 301, winner: 'goblin' });
  assert.strictEqual(countDeaths(state, 'elf'), 1);
  assert.strictEqual(countDeaths(state, 'goblin'), 0);
  assert.strictEqual(battleScore(outcome), 9933);
});

test('a battle ending on the last unit of a round counts that round', () => {
  const state = flanked();
  state.attackPower.elf = 200;

  assert.deepStrictEqual(runToCompletion(state), { rounds: 2, remainingHp: 194, winner: 'elf' });
});

test('an empty board ends at once with no winner', () => {
  assert.deepStrictEqual(runToCompletion(stateOf('#####', '#...#', '#####')), {
    rounds: 0,
    remainingHp: 0,
    winner: null
  });
});

test('a single faction ends the battle before any round completes', () => {
  assert.deepStrictEqual(runToCompletion(stateOf('#####', '#E.E#', '#####')), {
    rounds: 0,
    remainingHp: 400,
    winner: 'elf'
  });
});

test('occupancy matches the living units after every round', () => {
  const state = stateOf(...SKIRMISH);
  for (let round = 0; round < 500; round += 1) {
    const result = playRound(state);
    assertOccupancyInvariant(state);
    if (result.status === 'ended') return;
  }
  assert.fail('battle did not end within 500 rounds');
});

test('identical starting states play out identically', () => {
  const first = stateOf(...SKIRMISH);
  const second = cloneCombatState(first);

  assert.deepStrictEqual(runToCompletion(first), runToCompletion(second));
  assert.deepStrictEqual(first.units, second.units);
});

test('the round cap stops a battle that runs too long', () => {
  assert.throws(() => runToCompletion(flanked(), { maxRounds: 5 }), RoundLimitError);
});

test('the round cap allows exactly maxRounds completed rounds', () => {
  const quick = () => {
    const state = flanked();
    state.attackPower.elf = 200;
    return state;
  };

  assert.throws(() => runToCompletion(quick(), { maxRounds: 1 }), RoundLimitError);
  assert.deepStrictEqual(runToCompletion(quick(), { maxRounds: 2 }), { rounds: 2, remainingHp: 194, winner: 'elf' });
});

test('a trailing partial round does not count against the cap', () => {
  assert.deepStrictEqual(runToCompletion(flanked(), { maxRounds: 33 }), {
    rounds: 33,
    remainingHp: 301,
    winner: 'goblin'
  });
  assert.throws(() => runToCompletion(flanked(), { maxRounds: 32 }), RoundLimitError);
});
