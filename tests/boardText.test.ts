import assert from 'node:assert';
import test from 'node:test';
import { playRound } from '../src/engine/battleEngine';
import { parseInitialState, renderState } from '../src/engine/boardText';
import { BoardParseError } from '../src/engine/errors';
import { layout, snapshot, stateOf } from './helpers';

test('parses floor, walls and both factions in reading order', () => {
  const state = stateOf('#####', '#G.E#', '#E..#', '#####');

  assert.strictEqual(state.board.rows, 4);
  assert.strictEqual(state.board.cols, 5);
  assert.strictEqual(state.board.tiles.size, 6);
  assert.deepStrictEqual(snapshot(state), [
    ['goblin-0', 1, 1, 200],
    ['elf-0', 1, 3, 200],
    ['elf-1', 2, 1, 200]
  ]);
  assert.deepStrictEqual(Array.from(state.occupied).sort(), ['1-1', '1-3', '2-1']);
  assert.deepStrictEqual(state.attackPower, { elf: 3, goblin: 3 });
});

test('starting hit points and elf power can be chosen at parse time', () => {
  const state = parseInitialState(layout('####', '#EG#', '####'), { startingHp: 50, elfPower: 9 });

  assert.deepStrictEqual(state.attackPower, { elf: 9, goblin: 3 });
  assert.deepStrictEqual(
    state.units.map((u) => u.hp),
    [50, 50]
  );
});

test('windows line endings and trailing blank lines are ignored', () => {
  const state = parseInitialState('####\r\n#EG#\r\n####\r\n\r\n');
  assert.strictEqual(state.board.rows, 3);
  assert.strictEqual(state.units.length, 2);
});

test('unknown characters are rejected with their location', () => {
  assert.throws(
    () => parseInitialState(layout('#####', '#E?G#', '#####')),
    (error: unknown) =>
      error instanceof BoardParseError &&
      error.glyph === '?' &&
      error.position.row === 1 &&
      error.position.col === 2
  );
});

test('renders the board with living units', () => {
  assert.strictEqual(renderState(stateOf('#####', '#GEG#', '#####')), '#####\n#GEG#\n#####');
});

test('rendering with hit points lists each row after a gap', () => {
  const state = stateOf('#######', '#E.#..#', '#..#.G#', '#.....#', '#######');
  playRound(state);
  playRound(state);
  playRound(state);

  assert.strictEqual(
    renderState(state, { showHp: true }),
    ['#######', '#..#..#', '#..#..#', '#.EG..#   E(197), G(200)', '#######'].join('\n')
  );
});

test('dead units disappear from the rendering', () => {
  const state = stateOf('#####', '#GEG#', '#####');
  state.attackPower.elf = 200;
  playRound(state);

  assert.strictEqual(renderState(state, { showHp: true }), '#####\n#.EG#   E(194), G(200)\n#####');
});
